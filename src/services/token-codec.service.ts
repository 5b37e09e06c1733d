/**
 * Token Codec Service
 * Encrypted, expiring download tokens
 *
 * A token is the base64url encoding of
 *
 *   version (1 byte) | iv (12 bytes) | auth tag (16 bytes) | ciphertext
 *
 * where the ciphertext is the AES-256-GCM encryption of a small JSON
 * payload and the version byte is bound in as associated data. Any change
 * to any bit of the token fails authentication or the canonical-encoding
 * check, so redeem never returns a file id for a tampered token.
 *
 * GUARDRAILS:
 * - Secret is injected at construction, never read from the environment
 * - Every issuance draws a fresh IV and a fresh 128-bit nonce
 * - Expiry is checked against TOKEN_EXPIRY_SKEW_MS and nothing else
 * - Failure reasons are for internal logs only
 */

import { createCipheriv, createDecipheriv, randomBytes } from 'node:crypto';

import { z } from 'zod';

import type {
  DownloadTokenClaims,
  IssuedToken,
  Result,
  TokenRejectionReason,
} from '../types/index.js';
import { success, failure } from '../types/index.js';

export const TOKEN_VERSION = 1;

/**
 * Allowance for clock drift at redemption. Kept under one second so that
 * a redemption one second after expiry is always rejected.
 */
export const TOKEN_EXPIRY_SKEW_MS = 500;

/**
 * Tokens travel in a URL path segment
 */
export const MAX_TOKEN_LENGTH = 512;
export const MAX_FILE_ID_LENGTH = 128;

const SECRET_BYTES = 32;
const IV_BYTES = 12;
const TAG_BYTES = 16;
const NONCE_BYTES = 16;
const HEADER_BYTES = 1 + IV_BYTES + TAG_BYTES;
const CIPHER = 'aes-256-gcm';
const BASE64URL = /^[A-Za-z0-9_-]+$/;

const payloadSchema = z
  .object({
    f: z.string().min(1).max(MAX_FILE_ID_LENGTH),
    iat: z.number().int().nonnegative(),
    exp: z.number().int().nonnegative(),
    n: z.string().min(1),
    b: z.string().min(1).optional(),
  })
  .strict()
  .refine((payload) => payload.exp > payload.iat);

type TokenPayload = z.infer<typeof payloadSchema>;

export interface TokenCodecConfig {
  secret: Uint8Array;
  /**
   * Epoch milliseconds. Defaults to Date.now.
   */
  clock?: () => number;
}

export interface IssueOptions {
  /**
   * userId the token is bound to under the principal-bound access policy
   */
  boundTo?: string;
}

/**
 * TokenCodec interface
 */
export interface TokenCodec {
  issue(
    fileId: string,
    validitySeconds: number,
    options?: IssueOptions
  ): Result<IssuedToken>;
  redeem(token: string): Result<DownloadTokenClaims>;
}

function rejected(reason: TokenRejectionReason): Result<never> {
  return failure('TOKEN_INVALID', 'Download token is invalid', { reason });
}

function toClaims(payload: TokenPayload): DownloadTokenClaims {
  const claims: DownloadTokenClaims = {
    fileId: payload.f,
    issuedAt: payload.iat,
    expiresAt: payload.exp,
    nonce: payload.n,
  };
  if (payload.b !== undefined) {
    claims.boundTo = payload.b;
  }
  return claims;
}

/**
 * Create TokenCodec instance
 */
export function createTokenCodec(config: TokenCodecConfig): TokenCodec {
  if (config.secret.length !== SECRET_BYTES) {
    throw new Error(`Download token secret must be ${SECRET_BYTES} bytes`);
  }
  const key = Buffer.from(config.secret);
  const clock = config.clock ?? Date.now;
  const aad = Buffer.from([TOKEN_VERSION]);

  function decrypt(raw: Buffer): Buffer | null {
    const iv = raw.subarray(1, 1 + IV_BYTES);
    const tag = raw.subarray(1 + IV_BYTES, HEADER_BYTES);
    const ciphertext = raw.subarray(HEADER_BYTES);

    try {
      const decipher = createDecipheriv(CIPHER, key, iv);
      decipher.setAAD(aad);
      decipher.setAuthTag(tag);
      return Buffer.concat([decipher.update(ciphertext), decipher.final()]);
    } catch {
      return null;
    }
  }

  return {
    issue(
      fileId: string,
      validitySeconds: number,
      options?: IssueOptions
    ): Result<IssuedToken> {
      if (fileId === '' || fileId.length > MAX_FILE_ID_LENGTH) {
        return failure('VALIDATION_ERROR', 'Invalid file id');
      }
      if (!Number.isFinite(validitySeconds) || validitySeconds <= 0) {
        return failure(
          'VALIDATION_ERROR',
          'Validity window must be a positive number of seconds'
        );
      }

      const issuedAt = clock();
      const payload: TokenPayload = {
        f: fileId,
        iat: issuedAt,
        exp: issuedAt + Math.ceil(validitySeconds * 1000),
        n: randomBytes(NONCE_BYTES).toString('base64url'),
      };
      if (options?.boundTo !== undefined) {
        payload.b = options.boundTo;
      }

      const iv = randomBytes(IV_BYTES);
      const cipher = createCipheriv(CIPHER, key, iv);
      cipher.setAAD(aad);
      const ciphertext = Buffer.concat([
        cipher.update(JSON.stringify(payload), 'utf8'),
        cipher.final(),
      ]);

      const token = Buffer.concat([
        aad,
        iv,
        cipher.getAuthTag(),
        ciphertext,
      ]).toString('base64url');

      if (token.length > MAX_TOKEN_LENGTH) {
        return failure('VALIDATION_ERROR', 'Token would exceed maximum length');
      }

      return success({ token, claims: toClaims(payload) });
    },

    redeem(token: string): Result<DownloadTokenClaims> {
      if (token.length > MAX_TOKEN_LENGTH) {
        return rejected('too_long');
      }
      if (!BASE64URL.test(token)) {
        return rejected('not_base64url');
      }

      const raw = Buffer.from(token, 'base64url');
      // Unused trailing bits would otherwise let two strings share one decoding
      if (raw.toString('base64url') !== token) {
        return rejected('not_base64url');
      }
      if (raw.length <= HEADER_BYTES) {
        return rejected('truncated');
      }
      if (raw[0] !== TOKEN_VERSION) {
        return rejected('unknown_version');
      }

      const plaintext = decrypt(raw);
      if (plaintext === null) {
        return rejected('authentication_failed');
      }

      let decoded: unknown;
      try {
        decoded = JSON.parse(plaintext.toString('utf8'));
      } catch {
        return rejected('malformed_payload');
      }
      const parsed = payloadSchema.safeParse(decoded);
      if (!parsed.success) {
        return rejected('malformed_payload');
      }

      const claims = toClaims(parsed.data);
      if (clock() > claims.expiresAt + TOKEN_EXPIRY_SKEW_MS) {
        return failure('TOKEN_EXPIRED', 'Download token has expired', {
          reason: 'expired',
          expiresAt: new Date(claims.expiresAt).toISOString(),
        });
      }

      return success(claims);
    },
  };
}
