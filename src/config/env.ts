/**
 * Environment Configuration
 *
 * Parses process.env once at start-up. The download-token secret is held
 * in the returned object and handed to the token codec explicitly; no
 * module reads it from the environment on its own.
 */

import { z } from 'zod';

import type { AccessPolicyMode } from '../services/access-policy.service.js';
import { DEFAULT_ALLOWED_TYPES } from '../services/file-classifier.service.js';

const DEFAULT_MAX_UPLOAD_BYTES = 25 * 1024 * 1024; // 25 MiB
const DEFAULT_TOKEN_TTL_SECONDS = 300;
const MAX_TOKEN_TTL_SECONDS = 24 * 60 * 60;

function commaList(value: string): string[] {
  return value
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item !== '');
}

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .default('false')
  .transform((value) => value === 'true' || value === '1');

const envSchema = z
  .object({
    NODE_ENV: z
      .enum(['development', 'test', 'production'])
      .default('development'),
    PORT: z.coerce.number().int().min(1).max(65535).default(3000),
    PUBLIC_BASE_URL: z.string().url(),
    SUPABASE_URL: z.string().url(),
    SUPABASE_SERVICE_KEY: z.string().min(1),
    DOWNLOAD_TOKEN_SECRET: z
      .string()
      .regex(/^[0-9a-fA-F]{64}$/, 'must be a 64-char hex string'),
    DOWNLOAD_TOKEN_TTL_SECONDS: z.coerce
      .number()
      .int()
      .positive()
      .max(MAX_TOKEN_TTL_SECONDS)
      .default(DEFAULT_TOKEN_TTL_SECONDS),
    DOWNLOAD_TOKEN_SINGLE_USE: booleanFlag,
    ACCESS_POLICY: z.enum(['bearer', 'principal-bound']).default('bearer'),
    MAX_UPLOAD_BYTES: z.coerce
      .number()
      .int()
      .positive()
      .default(DEFAULT_MAX_UPLOAD_BYTES),
    ALLOWED_UPLOAD_TYPES: z.string().optional(),
    ALLOWED_ORIGINS: z.string().optional(),
    UPSTASH_REDIS_URL: z.string().url().optional(),
    UPSTASH_REDIS_TOKEN: z.string().min(1).optional(),
  })
  .superRefine((env, ctx) => {
    if (
      env.NODE_ENV === 'production' &&
      !env.PUBLIC_BASE_URL.startsWith('https://')
    ) {
      // Download tokens are bearer credentials
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['PUBLIC_BASE_URL'],
        message: 'must use https in production',
      });
    }
    if (
      env.DOWNLOAD_TOKEN_SINGLE_USE &&
      (env.UPSTASH_REDIS_URL === undefined ||
        env.UPSTASH_REDIS_TOKEN === undefined)
    ) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['DOWNLOAD_TOKEN_SINGLE_USE'],
        message: 'requires UPSTASH_REDIS_URL and UPSTASH_REDIS_TOKEN',
      });
    }
  });

export interface RedisConfig {
  url: string;
  token: string;
}

export interface AppConfig {
  env: 'development' | 'test' | 'production';
  port: number;
  publicBaseUrl: string;
  supabase: {
    url: string;
    serviceKey: string;
  };
  downloads: {
    secret: Buffer;
    ttlSeconds: number;
    singleUse: boolean;
    policy: AccessPolicyMode;
  };
  uploads: {
    maxBytes: number;
    allowedTypes: string[];
  };
  allowedOrigins: string[];
  redis: RedisConfig | null;
}

export type ConfigResult =
  | { ok: true; config: AppConfig }
  | { ok: false; issues: string[] };

/**
 * Validate and normalize environment variables
 */
export function loadConfig(
  source: Record<string, string | undefined>
): ConfigResult {
  // `KEY=` in a .env file means unset
  const present = Object.fromEntries(
    Object.entries(source).filter(
      ([, value]) => value !== undefined && value.trim() !== ''
    )
  );
  const parsed = envSchema.safeParse(present);
  if (!parsed.success) {
    return {
      ok: false,
      issues: parsed.error.issues.map(
        (issue) => `${issue.path.join('.')}: ${issue.message}`
      ),
    };
  }

  const env = parsed.data;
  const allowedTypes =
    env.ALLOWED_UPLOAD_TYPES !== undefined
      ? commaList(env.ALLOWED_UPLOAD_TYPES).map((t) => t.toLowerCase())
      : [...DEFAULT_ALLOWED_TYPES];

  const redis =
    env.UPSTASH_REDIS_URL !== undefined && env.UPSTASH_REDIS_TOKEN !== undefined
      ? { url: env.UPSTASH_REDIS_URL, token: env.UPSTASH_REDIS_TOKEN }
      : null;

  return {
    ok: true,
    config: {
      env: env.NODE_ENV,
      port: env.PORT,
      publicBaseUrl: env.PUBLIC_BASE_URL.replace(/\/+$/, ''),
      supabase: {
        url: env.SUPABASE_URL,
        serviceKey: env.SUPABASE_SERVICE_KEY,
      },
      downloads: {
        secret: Buffer.from(env.DOWNLOAD_TOKEN_SECRET, 'hex'),
        ttlSeconds: env.DOWNLOAD_TOKEN_TTL_SECONDS,
        singleUse: env.DOWNLOAD_TOKEN_SINGLE_USE,
        policy: { kind: env.ACCESS_POLICY },
      },
      uploads: {
        maxBytes: env.MAX_UPLOAD_BYTES,
        allowedTypes,
      },
      allowedOrigins:
        env.ALLOWED_ORIGINS !== undefined
          ? commaList(env.ALLOWED_ORIGINS)
          : ['http://localhost:3000'],
      redis,
    },
  };
}
