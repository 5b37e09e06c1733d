/**
 * Main Hono Application
 * Wires together all routes and middleware
 */

import { Hono } from 'hono';
import { bodyLimit } from 'hono/body-limit';
import { cors } from 'hono/cors';
import { logger } from 'hono/logger';

import type { AccessPolicyMode } from '../services/access-policy.service.js';
import type { AuthService } from '../services/auth.service.js';
import type { DownloadService } from '../services/download.service.js';
import type { FileService } from '../services/file.service.js';

import type { AuthMiddlewareDeps } from './middleware/auth.js';
import {
  createAuthMiddleware,
  createPublicMiddleware,
} from './middleware/auth.js';
import { createRoleMiddleware } from './middleware/role.js';
import { createDownloadRoutes } from './routes/downloads.js';
import { createFileRoutes } from './routes/files.js';
import { createHealthRoutes } from './routes/health.js';

// Room for multipart boundaries and the part headers
const MULTIPART_OVERHEAD_BYTES = 64 * 1024;

/**
 * App configuration
 */
export interface AppConfig {
  authClient: AuthMiddlewareDeps['authClient'];
  services: {
    authService: AuthService;
    fileService: FileService;
    downloadService: DownloadService;
  };
  accessPolicy: AccessPolicyMode;
  maxUploadBytes: number;
  allowedOrigins?: string[];
}

/**
 * Create the main Hono application
 */
export function createApp(config: AppConfig): Hono {
  const { authClient, services, accessPolicy, maxUploadBytes } = config;
  const app = new Hono();

  // Global middleware
  app.use('*', logger());
  app.use(
    '*',
    cors({
      origin: config.allowedOrigins ?? ['http://localhost:3000'],
      credentials: true,
    })
  );

  // Public routes (no auth)
  app.use('/api/v1/health', createPublicMiddleware());
  app.route('/api/v1', createHealthRoutes());

  const authMiddleware = createAuthMiddleware({
    authClient,
    authService: services.authService,
  });

  // Upload is limited to operation users; discovery is open to all roles
  app.use('/api/v1/files', authMiddleware);
  app.use('/api/v1/files/*', authMiddleware);
  app.post('/api/v1/files', createRoleMiddleware('operation'));
  const uploadLimit = bodyLimit({
    maxSize: maxUploadBytes + MULTIPART_OVERHEAD_BYTES,
    onError: (c) =>
      c.json(
        {
          error: {
            code: 'FILE_TOO_LARGE',
            message: 'File exceeds maximum allowed size',
            requestId: c.get('requestId') || 'unknown',
          },
        },
        413
      ),
  });
  app.post('/api/v1/files', uploadLimit);
  app.post('/api/v1/files/validate', uploadLimit);
  app.route('/api/v1', createFileRoutes({ fileService: services.fileService }));

  // Issuing a link requires a caller; redeeming one requires only the
  // token, unless tokens are bound to the issuing user
  app.use('/api/v1/download/*', authMiddleware);
  app.use(
    '/api/v1/secure-download/*',
    accessPolicy.kind === 'principal-bound'
      ? createAuthMiddleware({
          authClient,
          authService: services.authService,
          optional: true,
        })
      : createPublicMiddleware()
  );
  app.route(
    '/api/v1',
    createDownloadRoutes({ downloadService: services.downloadService })
  );

  // 404 handler
  app.notFound((c) => {
    return c.json(
      {
        error: {
          code: 'NOT_FOUND',
          message: 'Endpoint not found',
          requestId: c.get('requestId') || 'unknown',
        },
      },
      404
    );
  });

  // Global error handler
  app.onError((err, c) => {
    console.error('Unhandled error:', err);

    return c.json(
      {
        error: {
          code: 'INTERNAL_ERROR',
          message: 'An unexpected error occurred',
          requestId: c.get('requestId') || 'unknown',
        },
      },
      500
    );
  });

  return app;
}
