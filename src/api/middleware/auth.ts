/**
 * Auth Middleware
 * Constructs the Principal from a Supabase JWT
 *
 * The service layer trusts the Principal set here and never re-verifies
 * the credential.
 */

import type { SupabaseClient } from '@supabase/supabase-js';
import type { Context, Next } from 'hono';
import { nanoid } from 'nanoid';

import type { Principal, Result } from '../../types/index.js';

/**
 * Auth middleware dependencies
 */
export interface AuthMiddlewareDeps {
  authClient: Pick<SupabaseClient['auth'], 'getUser'>;
  authService: {
    resolvePrincipal: (userId: string) => Promise<Result<Principal>>;
  };
  /**
   * Let requests without an Authorization header through with a null
   * principal. A header that is present must still verify.
   */
  optional?: boolean;
}

/**
 * Generate a unique request ID
 */
function generateRequestId(): string {
  return nanoid();
}

function unauthorized(c: Context, message: string, requestId: string) {
  return c.json(
    {
      error: {
        code: 'UNAUTHORIZED',
        message,
        requestId,
      },
    },
    401
  );
}

/**
 * Create auth middleware for protected routes
 * Extracts JWT, verifies with Supabase, resolves the role
 */
export function createAuthMiddleware(deps: AuthMiddlewareDeps) {
  const { authClient, authService } = deps;
  const optional = deps.optional ?? false;

  return async function authMiddleware(c: Context, next: Next) {
    const requestId = generateRequestId();
    c.set('requestId', requestId);
    c.set('principal', null);

    // 1. Extract token from Authorization header
    const authHeader = c.req.header('Authorization');

    if (authHeader === undefined && optional) {
      return next();
    }

    if (authHeader === undefined || !authHeader.startsWith('Bearer ')) {
      return unauthorized(
        c,
        'Missing or invalid authorization header',
        requestId
      );
    }

    const token = authHeader.slice(7).trim();

    if (token === '') {
      return unauthorized(
        c,
        'Missing or invalid authorization header',
        requestId
      );
    }

    try {
      // 2. Verify JWT with Supabase
      const {
        data: { user },
        error,
      } = await authClient.getUser(token);

      if (error !== null || user === null) {
        return unauthorized(c, 'Invalid or expired token', requestId);
      }

      // 3. Resolve role
      const principalResult = await authService.resolvePrincipal(user.id);

      if (!principalResult.success) {
        return c.json(
          {
            error: {
              code: 'PERMISSION_DENIED',
              message: principalResult.error.message,
              requestId,
            },
          },
          403
        );
      }

      // 4. Attach to context
      c.set('principal', principalResult.data);

      return next();
    } catch (err) {
      console.error('Auth middleware error:', err);
      return c.json(
        {
          error: {
            code: 'INTERNAL_ERROR',
            message: 'Authentication failed',
            requestId,
          },
        },
        500
      );
    }
  };
}

/**
 * Create public middleware for routes that don't require auth
 */
export function createPublicMiddleware() {
  return function publicMiddleware(c: Context, next: Next) {
    c.set('requestId', generateRequestId());
    c.set('principal', null);

    return next();
  };
}
