/**
 * Core type definitions
 */

export type { Result, Success, Failure, ErrorCode } from './result.js';
export { success, failure, isSuccess, isFailure } from './result.js';
export type { Role, Principal } from './auth.js';
export { ROLES, isRole } from './auth.js';
export type { PaginationParams, PaginatedResult } from './pagination.js';
export {
  DEFAULT_PAGE_LIMIT,
  MAX_PAGE_LIMIT,
  normalizePaginationParams,
} from './pagination.js';
export type {
  MimeType,
  FileRecord,
  CreateFileRecordParams,
  UploadParams,
  UploadAcceptance,
} from './file.js';
export type {
  DownloadTokenClaims,
  IssuedToken,
  TokenRejectionReason,
  IssuedDownload,
  RedeemedDownload,
} from './download.js';
