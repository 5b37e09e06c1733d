/**
 * Upstash Redis Client Configuration
 * Backs the optional single-use download ledger
 */

import { Redis } from '@upstash/redis';

import type { RedisConfig } from '../config/env.js';

/**
 * Create a Redis client for the given connection. Built once at start-up.
 */
export function createRedis(config: RedisConfig): Redis {
  return new Redis({
    url: config.url,
    token: config.token,
  });
}
