/**
 * DownloadService Implementation
 * Issues and redeems download tokens
 *
 * Issue:  authorizeIssue -> TokenCodec.issue -> URL
 *         terminal states: issued | DENIED | NOT_FOUND | GONE
 * Redeem: TokenCodec.redeem -> authorizeRedeem -> [ledger] -> file store
 *         terminal states: served | DENIED | GONE
 *
 * GUARDRAILS:
 * - TOKEN_INVALID and TOKEN_EXPIRED leave this service as DENIED
 * - The rejection reason is logged, never returned
 * - GONE means metadata and bytes disagree; always logged as an anomaly
 * - Nothing is retried
 */

import type {
  Failure,
  IssuedDownload,
  Principal,
  RedeemedDownload,
  Result,
} from '../types/index.js';
import { success, failure } from '../types/index.js';

import type { AccessPolicy } from './access-policy.service.js';
import type { FileServiceDb, FileServiceStorage } from './file.service.js';
import type { RedemptionLedger } from './redemption-ledger.js';
import type { TokenCodec } from './token-codec.service.js';

/**
 * Turns a token into an externally reachable address
 */
export interface DownloadUrlBuilder {
  secureDownloadUrl: (token: string) => string;
}

/**
 * DownloadService interface
 */
export interface DownloadService {
  issueDownload(
    fileId: string,
    principal: Principal
  ): Promise<Result<IssuedDownload>>;
  redeemDownload(
    token: string,
    presenter?: Principal | null
  ): Promise<Result<RedeemedDownload>>;
}

// ─────────────────────────────────────────────────────────────
// HELPER FUNCTIONS
// ─────────────────────────────────────────────────────────────

function denied(reason: string): Failure {
  console.warn('Download denied:', { reason });
  return failure('DENIED', 'Download link is invalid or has expired');
}

function gone(fileId: string, detail: string): Failure {
  console.error('Integrity anomaly: file bytes unavailable', {
    fileId,
    detail,
  });
  return failure('GONE', 'File is no longer available');
}

function rejectionReason(error: Failure['error']): string {
  const reason = error.details?.['reason'];
  return typeof reason === 'string' ? reason : error.code;
}

// ─────────────────────────────────────────────────────────────
// SERVICE IMPLEMENTATION
// ─────────────────────────────────────────────────────────────

/**
 * Create DownloadService instance
 */
export function createDownloadService(deps: {
  db: Pick<FileServiceDb, 'getFile'>;
  storage: Pick<FileServiceStorage, 'get' | 'exists'>;
  codec: TokenCodec;
  policy: AccessPolicy;
  urlBuilder: DownloadUrlBuilder;
  ttlSeconds: number;
  ledger?: RedemptionLedger | null;
}): DownloadService {
  const { db, storage, codec, policy, urlBuilder, ttlSeconds } = deps;
  const ledger = deps.ledger ?? null;

  return {
    /**
     * Issue a download link for a stored file
     */
    async issueDownload(
      fileId: string,
      principal: Principal
    ): Promise<Result<IssuedDownload>> {
      if (fileId.trim() === '') {
        return failure('VALIDATION_ERROR', 'File ID is required');
      }

      const file = await db.getFile(fileId);
      if (file === null) {
        return failure('NOT_FOUND', 'File not found');
      }

      if (!policy.authorizeIssue(principal, file)) {
        return failure('DENIED', 'Download not permitted');
      }

      if (!(await storage.exists(file.storagePath))) {
        return gone(file.id, 'missing at issue');
      }

      const boundTo = policy.bindingFor(principal);
      const issued = codec.issue(
        file.id,
        ttlSeconds,
        boundTo !== undefined ? { boundTo } : {}
      );
      if (!issued.success) {
        return issued;
      }

      return success({
        url: urlBuilder.secureDownloadUrl(issued.data.token),
        token: issued.data.token,
        expiresAt: new Date(issued.data.claims.expiresAt),
      });
    },

    /**
     * Redeem a download token for the file's bytes
     */
    async redeemDownload(
      token: string,
      presenter: Principal | null = null
    ): Promise<Result<RedeemedDownload>> {
      const redeemed = codec.redeem(token);
      if (!redeemed.success) {
        return denied(rejectionReason(redeemed.error));
      }
      const claims = redeemed.data;

      if (!policy.authorizeRedeem({ claims, presenter })) {
        return denied('unauthorized_presenter');
      }

      if (ledger !== null) {
        const firstUse = await ledger.claim(claims.nonce, claims.expiresAt);
        if (!firstUse) {
          return denied('replayed');
        }
      }

      const file = await db.getFile(claims.fileId);
      if (file === null) {
        return gone(claims.fileId, 'metadata missing');
      }

      const blob = await storage.get(file.storagePath);
      if (blob === null) {
        return gone(file.id, 'bytes missing');
      }

      return success({
        fileId: file.id,
        body: blob.stream(),
        mimeType: file.detectedType,
        declaredName: file.declaredName,
        sizeBytes: blob.size,
      });
    },
  };
}
