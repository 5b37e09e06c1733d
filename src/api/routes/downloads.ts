/**
 * Download Routes
 *
 * GET /download/:fileId        issue a short-lived secure link
 * GET /secure-download/:token  redeem it for the file bytes
 *
 * Invalid and expired tokens both answer 403 DENIED with the same body.
 */

import { Hono } from 'hono';

import type { DownloadService } from '../../services/download.service.js';
import {
  errorResponse,
  getPrincipal,
  getRequestId,
  successResponse,
} from '../utils/response.js';

/**
 * RFC 6266 attachment header with an ASCII fallback name
 */
export function contentDisposition(declaredName: string): string {
  const fallback = declaredName.replace(/[^\x20-\x7e]|["\\]/g, '_');
  const encoded = encodeURIComponent(declaredName).replace(
    /['()*]/g,
    (ch) => `%${ch.charCodeAt(0).toString(16).toUpperCase()}`
  );
  return `attachment; filename="${fallback}"; filename*=UTF-8''${encoded}`;
}

/**
 * Create download routes
 */
export function createDownloadRoutes(deps: {
  downloadService: DownloadService;
}): Hono {
  const { downloadService } = deps;
  const app = new Hono();

  /**
   * GET /download/:fileId
   * Issue a download link
   */
  app.get('/download/:fileId', async (c) => {
    const requestId = getRequestId(c);
    const principal = getPrincipal(c);
    if (principal === null) {
      return errorResponse(
        c,
        { code: 'UNAUTHORIZED', message: 'Authentication required' },
        requestId
      );
    }

    const result = await downloadService.issueDownload(
      c.req.param('fileId'),
      principal
    );
    if (!result.success) {
      return errorResponse(c, result.error, requestId);
    }

    c.header('Cache-Control', 'no-store');
    return successResponse(
      c,
      {
        url: result.data.url,
        expiresAt: result.data.expiresAt.toISOString(),
      },
      requestId
    );
  });

  /**
   * GET /secure-download/:token
   * Stream the file behind a download token
   */
  app.get('/secure-download/:token', async (c) => {
    const requestId = getRequestId(c);

    const result = await downloadService.redeemDownload(
      c.req.param('token'),
      getPrincipal(c)
    );
    if (!result.success) {
      return errorResponse(c, result.error, requestId);
    }

    const file = result.data;
    return c.body(file.body, 200, {
      'Content-Type': file.mimeType,
      'Content-Length': String(file.sizeBytes),
      'Content-Disposition': contentDisposition(file.declaredName),
      'X-Content-Type-Options': 'nosniff',
      'Cache-Control': 'no-store',
    });
  });

  return app;
}
