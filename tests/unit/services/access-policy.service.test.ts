/**
 * AccessPolicy Unit Tests
 */

import { describe, it, expect } from 'vitest';

import { createAccessPolicy } from '@/services/access-policy.service.js';
import type { DownloadTokenClaims } from '@/types/index.js';

import {
  T0,
  TEST_FILE_ID,
  clientUser,
  operationUser,
  otherClientUser,
  testFile,
} from '../../fixtures/index.js';

const claims: DownloadTokenClaims = {
  fileId: TEST_FILE_ID,
  issuedAt: T0,
  expiresAt: T0 + 60_000,
  nonce: 'nonce-1',
};

describe('AccessPolicy', () => {
  describe('bearer mode', () => {
    const policy = createAccessPolicy({ kind: 'bearer' });

    it('should be the default mode', () => {
      expect(createAccessPolicy().mode).toEqual({ kind: 'bearer' });
    });

    it('should allow any authenticated principal to issue', () => {
      expect(policy.authorizeIssue(clientUser, testFile)).toBe(true);
      expect(policy.authorizeIssue(operationUser, testFile)).toBe(true);
    });

    it('should refuse a principal without a user id', () => {
      expect(
        policy.authorizeIssue({ role: 'client', userId: '  ' }, testFile)
      ).toBe(false);
    });

    it('should authorize redemption without a presenter', () => {
      expect(policy.authorizeRedeem({ claims, presenter: null })).toBe(true);
    });

    it('should not bind tokens', () => {
      expect(policy.bindingFor(clientUser)).toBeUndefined();
    });
  });

  describe('principal-bound mode', () => {
    const policy = createAccessPolicy({ kind: 'principal-bound' });
    const boundClaims = { ...claims, boundTo: clientUser.userId };

    it('should bind tokens to the issuing user', () => {
      expect(policy.bindingFor(clientUser)).toBe('client-user-1');
    });

    it('should authorize the bound user', () => {
      expect(
        policy.authorizeRedeem({ claims: boundClaims, presenter: clientUser })
      ).toBe(true);
    });

    it('should refuse a different user', () => {
      expect(
        policy.authorizeRedeem({
          claims: boundClaims,
          presenter: otherClientUser,
        })
      ).toBe(false);
    });

    it('should refuse an anonymous presenter', () => {
      expect(
        policy.authorizeRedeem({ claims: boundClaims, presenter: null })
      ).toBe(false);
    });

    it('should refuse a token issued without a binding', () => {
      expect(policy.authorizeRedeem({ claims, presenter: clientUser })).toBe(
        false
      );
    });
  });
});
