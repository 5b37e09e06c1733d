/**
 * filegate-api Entry Point
 *
 * Wires together all services and starts the Hono application.
 */

import 'dotenv/config';
import { serve } from '@hono/node-server';

import { createApp } from './api/app.js';
import { loadConfig } from './config/env.js';
import {
  createRedis,
  createSupabaseAdmin,
  createUrlBuilder,
} from './lib/index.js';
import {
  createAccessPolicy,
  createAuthService,
  createAuthServiceDb,
  createDownloadService,
  createFileClassifier,
  createFileService,
  createFileServiceDb,
  createRedisRedemptionLedger,
  createSupabaseStorageAdapter,
  createTokenCodec,
} from './services/index.js';

// Validate environment
const loaded = loadConfig(process.env);
if (!loaded.ok) {
  for (const issue of loaded.issues) {
    console.error(`Invalid configuration: ${issue}`);
  }
  process.exit(1);
}
const config = loaded.config;

// Collaborators
const supabase = createSupabaseAdmin(config.supabase);
const fileDb = createFileServiceDb(supabase);
const fileStorage = createSupabaseStorageAdapter(supabase);
const ledger =
  config.downloads.singleUse && config.redis !== null
    ? createRedisRedemptionLedger(createRedis(config.redis))
    : null;

// Services
const authService = createAuthService({ db: createAuthServiceDb(supabase) });

const fileService = createFileService({
  db: fileDb,
  storage: fileStorage,
  classifier: createFileClassifier({
    allowedTypes: config.uploads.allowedTypes,
  }),
  maxUploadBytes: config.uploads.maxBytes,
});

const downloadService = createDownloadService({
  db: fileDb,
  storage: fileStorage,
  codec: createTokenCodec({ secret: config.downloads.secret }),
  policy: createAccessPolicy(config.downloads.policy),
  urlBuilder: createUrlBuilder(config.publicBaseUrl),
  ttlSeconds: config.downloads.ttlSeconds,
  ledger,
});

const app = createApp({
  authClient: supabase.auth,
  services: {
    authService,
    fileService,
    downloadService,
  },
  accessPolicy: config.downloads.policy,
  maxUploadBytes: config.uploads.maxBytes,
  allowedOrigins: config.allowedOrigins,
});

console.error(`Server starting on port ${config.port}`);
console.error(
  `Download policy: ${config.downloads.policy.kind}, single-use: ${ledger !== null}`
);

serve({
  fetch: app.fetch,
  port: config.port,
});

export { app };
