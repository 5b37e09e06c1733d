/**
 * Shared Library Exports
 * Client factories and formatting helpers
 */

export { createSupabaseAdmin } from './supabase.js';
export { createRedis } from './redis.js';
export { createUrlBuilder, SECURE_DOWNLOAD_PATH } from './url-builder.js';
