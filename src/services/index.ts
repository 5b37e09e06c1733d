/**
 * Service Layer Exports
 *
 * Services are the only gateway to storage. All business rules live here;
 * the API layer only translates HTTP to service calls.
 */

// AuthService
export type { AuthService, AuthServiceDb } from './auth.service.js';
export { createAuthService } from './auth.service.js';
export { createAuthServiceDb } from './auth.db.js';

// FileService
export type {
  FileService,
  FileServiceDb,
  FileServiceStorage,
} from './file.service.js';
export { createFileService } from './file.service.js';
export { createFileServiceDb } from './file.db.js';
export { createSupabaseStorageAdapter } from './file.storage.js';

// File classifier
export type { FileClassifier } from './file-classifier.service.js';
export {
  createFileClassifier,
  detectMimeType,
  DEFAULT_ALLOWED_TYPES,
} from './file-classifier.service.js';

// Download tokens
export type { TokenCodec, TokenCodecConfig } from './token-codec.service.js';
export { createTokenCodec } from './token-codec.service.js';
export type {
  AccessPolicy,
  AccessPolicyMode,
} from './access-policy.service.js';
export { createAccessPolicy } from './access-policy.service.js';
export type {
  DownloadService,
  DownloadUrlBuilder,
} from './download.service.js';
export { createDownloadService } from './download.service.js';
export type { RedemptionLedger } from './redemption-ledger.js';
export { createRedisRedemptionLedger } from './redemption-ledger.js';
