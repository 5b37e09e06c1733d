/**
 * Download Token Types
 *
 * Tokens are never persisted. Everything needed to redeem one travels
 * inside its encrypted, authenticated payload.
 */

import type { MimeType } from './file.js';

/**
 * Decoded contents of a download token. Times are epoch milliseconds.
 */
export interface DownloadTokenClaims {
  fileId: string;
  issuedAt: number;
  expiresAt: number;
  nonce: string;
  boundTo?: string;
}

export interface IssuedToken {
  token: string;
  claims: DownloadTokenClaims;
}

/**
 * Why a token failed to redeem. Internal diagnostics only: callers outside
 * the service layer only ever see DENIED.
 */
export type TokenRejectionReason =
  | 'too_long'
  | 'not_base64url'
  | 'truncated'
  | 'unknown_version'
  | 'authentication_failed'
  | 'malformed_payload'
  | 'expired'
  | 'replayed'
  | 'unauthorized_presenter';

/**
 * Result of issuing a download
 */
export interface IssuedDownload {
  url: string;
  token: string;
  expiresAt: Date;
}

/**
 * Result of redeeming a download token
 */
export interface RedeemedDownload {
  fileId: string;
  body: ReadableStream<Uint8Array>;
  mimeType: MimeType;
  declaredName: string;
  sizeBytes: number;
}
