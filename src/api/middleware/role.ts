/**
 * Role Middleware
 * Restricts a route to principals holding one of the given roles
 */

import type { Context, Next } from 'hono';

import type { Role } from '../../types/index.js';

export function createRoleMiddleware(...roles: Role[]) {
  return async function roleMiddleware(
    c: Context,
    next: Next
  ): Promise<Response | void> {
    const principal = c.get('principal') ?? null;
    const requestId = c.get('requestId') || 'unknown';

    if (principal === null) {
      return c.json(
        {
          error: {
            code: 'UNAUTHORIZED',
            message: 'Authentication required',
            requestId,
          },
        },
        401
      );
    }

    if (!roles.includes(principal.role)) {
      return c.json(
        {
          error: {
            code: 'PERMISSION_DENIED',
            message: `Requires role: ${roles.join(' or ')}`,
            requestId,
          },
        },
        403
      );
    }

    await next();
  };
}
