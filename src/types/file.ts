/**
 * File Domain Types
 *
 * A FileRecord is created once at upload and is read-only afterwards.
 * detectedType is always the classifier's verdict on the bytes, never
 * something derived from declaredName.
 */

import type { Role } from './auth.js';

/**
 * Canonical MIME type string as reported by content detection
 */
export type MimeType = string;

export interface FileRecord {
  id: string;
  ownerRole: Role;
  ownerId: string;
  declaredName: string;
  detectedType: MimeType;
  sizeBytes: number;
  storagePath: string;
  createdAt: Date;
}

/**
 * Parameters for recording a newly stored file
 */
export interface CreateFileRecordParams {
  ownerRole: Role;
  ownerId: string;
  declaredName: string;
  detectedType: MimeType;
  sizeBytes: number;
  storagePath: string;
}

/**
 * Upload payload as received from the HTTP layer
 */
export interface UploadParams {
  bytes: Uint8Array;
  declaredName: string;
}

/**
 * Outcome of content validation
 */
export interface UploadAcceptance {
  accepted: MimeType;
}
