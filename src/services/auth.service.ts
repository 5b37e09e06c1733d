/**
 * AuthService Implementation
 * Turns a verified user id into a Principal
 *
 * Identity verification (JWT) happens in the auth middleware via Supabase
 * Auth; this service only attaches the role. Users without a profile row
 * or with an unknown role are refused rather than defaulted.
 */

import type { Principal, Result } from '../types/index.js';
import { success, failure, isRole } from '../types/index.js';

export interface AuthServiceDb {
  getRole: (userId: string) => Promise<string | null>;
}

/**
 * AuthService interface
 */
export interface AuthService {
  resolvePrincipal(userId: string): Promise<Result<Principal>>;
}

export function createAuthService(deps: { db: AuthServiceDb }): AuthService {
  const { db } = deps;

  return {
    async resolvePrincipal(userId: string): Promise<Result<Principal>> {
      if (userId.trim() === '') {
        return failure('UNAUTHORIZED', 'User ID is required');
      }

      const role = await db.getRole(userId);
      if (role === null) {
        return failure('PERMISSION_DENIED', 'No profile for this user');
      }
      if (!isRole(role)) {
        console.error('Unknown role on profile:', { userId, role });
        return failure('PERMISSION_DENIED', 'No role assigned to this user');
      }

      return success({ role, userId });
    },
  };
}
