/**
 * Redemption Ledger
 * Opt-in single-use enforcement for download tokens
 *
 * Tokens are reusable until expiry unless a ledger is wired in. The ledger
 * remembers each redeemed nonce until the token could no longer pass the
 * expiry check anyway, so it never grows beyond the live token set.
 * SET NX makes concurrent redemptions of one token race for a single win.
 */

import { TOKEN_EXPIRY_SKEW_MS } from './token-codec.service.js';

export const LEDGER_KEY_PREFIX = 'download:redeemed:';

/**
 * The slice of the Upstash Redis client the ledger needs
 */
export interface LedgerStore {
  set(
    key: string,
    value: string,
    opts: { nx: true; px: number }
  ): Promise<unknown>;
}

/**
 * RedemptionLedger interface
 */
export interface RedemptionLedger {
  /**
   * true for the first claim of a nonce, false for every later one
   */
  claim(nonce: string, expiresAt: number): Promise<boolean>;
}

/**
 * Create Upstash Redis backed ledger
 */
export function createRedisRedemptionLedger(
  redis: LedgerStore,
  options: { clock?: () => number; keyPrefix?: string } = {}
): RedemptionLedger {
  const clock = options.clock ?? Date.now;
  const keyPrefix = options.keyPrefix ?? LEDGER_KEY_PREFIX;

  return {
    async claim(nonce: string, expiresAt: number): Promise<boolean> {
      const ttlMs = Math.max(
        Math.ceil(expiresAt + TOKEN_EXPIRY_SKEW_MS - clock()),
        1
      );
      const result = await redis.set(`${keyPrefix}${nonce}`, '1', {
        nx: true,
        px: ttlMs,
      });
      return result === 'OK';
    },
  };
}
