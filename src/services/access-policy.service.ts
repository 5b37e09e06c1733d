/**
 * Access Policy Service
 * Decides who may obtain a download token and who may redeem one
 *
 * Two modes share one interface:
 * - bearer: whoever presents a valid token gets the file. Transport
 *   confidentiality is a hard precondition; the URL is the credential.
 * - principal-bound: the token carries the issuing userId and redemption
 *   requires the same authenticated user.
 */

import type {
  DownloadTokenClaims,
  FileRecord,
  Principal,
} from '../types/index.js';

export type AccessPolicyMode =
  | { kind: 'bearer' }
  | { kind: 'principal-bound' };

export interface RedeemGrant {
  claims: DownloadTokenClaims;
  presenter: Principal | null;
}

/**
 * AccessPolicy interface
 */
export interface AccessPolicy {
  readonly mode: AccessPolicyMode;
  authorizeIssue(principal: Principal, file: FileRecord): boolean;
  authorizeRedeem(grant: RedeemGrant): boolean;
  /**
   * Value to embed in a token issued to this principal
   */
  bindingFor(principal: Principal): string | undefined;
}

function isAuthenticated(principal: Principal): boolean {
  return principal.userId.trim() !== '';
}

/**
 * Create AccessPolicy instance
 */
export function createAccessPolicy(
  mode: AccessPolicyMode = { kind: 'bearer' }
): AccessPolicy {
  return {
    mode,

    /**
     * Any authenticated principal may request a download link. Role
     * differentiation happens at the API layer.
     */
    authorizeIssue(principal: Principal, _file: FileRecord): boolean {
      return isAuthenticated(principal);
    },

    authorizeRedeem(grant: RedeemGrant): boolean {
      switch (mode.kind) {
        case 'bearer':
          return true;
        case 'principal-bound':
          return (
            grant.claims.boundTo !== undefined &&
            grant.presenter !== null &&
            isAuthenticated(grant.presenter) &&
            grant.presenter.userId === grant.claims.boundTo
          );
      }
    },

    bindingFor(principal: Principal): string | undefined {
      return mode.kind === 'principal-bound' ? principal.userId : undefined;
    },
  };
}
