/**
 * Principal Types
 *
 * A Principal is the authenticated caller. It is produced by the
 * authentication middleware and never constructed by the service layer.
 */

/**
 * Operation users upload files; client users discover and download them
 */
export type Role = 'operation' | 'client';

export const ROLES: readonly Role[] = ['operation', 'client'];

export interface Principal {
  role: Role;
  userId: string;
}

/**
 * Type guard for role values read from storage
 */
export function isRole(value: unknown): value is Role {
  return value === 'operation' || value === 'client';
}
