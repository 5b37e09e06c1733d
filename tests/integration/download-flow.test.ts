/**
 * Download Flow Integration Tests
 *
 * The full HTTP surface wired the way src/index.ts wires it, with memory
 * stores and a Supabase Auth stand-in in place of the network.
 */

import type { Hono } from 'hono';
import { describe, it, expect, beforeEach, vi } from 'vitest';

import { createApp } from '@/api/app.js';
import { createUrlBuilder } from '@/lib/url-builder.js';
import type { AccessPolicyMode } from '@/services/index.js';
import {
  DEFAULT_ALLOWED_TYPES,
  createAccessPolicy,
  createAuthService,
  createDownloadService,
  createFileClassifier,
  createFileService,
  createTokenCodec,
} from '@/services/index.js';

import { T0, TEST_BASE_URL, TEST_SECRET, samples } from '../fixtures/index.js';
import type { DataResponse, ErrorResponse } from '../helpers/http.js';
import { bearer, readJson } from '../helpers/http.js';
import { createFakeAuthClient, createInMemoryStores } from '../mocks/index.js';

const MAX_UPLOAD_BYTES = 1024;

const ROLES: Record<string, string> = {
  'op-user-1': 'operation',
  'client-user-1': 'client',
  'client-user-2': 'client',
};

const JWTS = {
  operation: 'op-jwt',
  client: 'client-jwt',
  otherClient: 'other-client-jwt',
};

function uploadForm(bytes: Uint8Array, filename: string): FormData {
  const form = new FormData();
  form.append('file', new Blob([bytes]), filename);
  return form;
}

function pathOf(url: string): string {
  return new URL(url).pathname;
}

describe('Download Flow', () => {
  let now: number;
  let stores: ReturnType<typeof createInMemoryStores>;

  function buildApp(policy: AccessPolicyMode = { kind: 'bearer' }): Hono {
    const authService = createAuthService({
      db: { getRole: async (userId) => ROLES[userId] ?? null },
    });
    const fileService = createFileService({
      db: stores.db,
      storage: stores.storage,
      classifier: createFileClassifier({
        allowedTypes: DEFAULT_ALLOWED_TYPES,
      }),
      maxUploadBytes: MAX_UPLOAD_BYTES,
    });
    const downloadService = createDownloadService({
      db: stores.db,
      storage: stores.storage,
      codec: createTokenCodec({ secret: TEST_SECRET, clock: () => now }),
      policy: createAccessPolicy(policy),
      urlBuilder: createUrlBuilder(TEST_BASE_URL),
      ttlSeconds: 60,
    });

    return createApp({
      authClient: createFakeAuthClient({
        [JWTS.operation]: 'op-user-1',
        [JWTS.client]: 'client-user-1',
        [JWTS.otherClient]: 'client-user-2',
      }),
      services: { authService, fileService, downloadService },
      accessPolicy: policy,
      maxUploadBytes: MAX_UPLOAD_BYTES,
    });
  }

  async function upload(
    app: Hono,
    bytes: Uint8Array,
    filename: string,
    jwt = JWTS.operation
  ): Promise<Response> {
    return app.request('/api/v1/files', {
      method: 'POST',
      headers: bearer(jwt),
      body: uploadForm(bytes, filename),
    });
  }

  async function issue(
    app: Hono,
    fileId: string,
    jwt = JWTS.client
  ): Promise<string> {
    const res = await app.request(`/api/v1/download/${fileId}`, {
      headers: bearer(jwt),
    });
    expect(res.status).toBe(200);
    const body = await readJson<DataResponse<{ url: string }>>(res);
    return body.data.url;
  }

  beforeEach(() => {
    now = T0;
    stores = createInMemoryStores();
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  it('should upload, list, issue and redeem', async () => {
    const app = buildApp();

    const uploaded = await upload(app, samples.pdf, 'quarterly-report.pdf');
    expect(uploaded.status).toBe(201);
    const file = await readJson<DataResponse<{ id: string }>>(uploaded);
    expect(file.data.id).toBe('file-1');

    const listed = await app.request('/api/v1/files', {
      headers: bearer(JWTS.client),
    });
    const list = await readJson<DataResponse<{ items: { id: string }[] }>>(
      listed
    );
    expect(list.data.items.map((item) => item.id)).toEqual(['file-1']);

    const url = await issue(app, 'file-1');
    expect(url.startsWith(`${TEST_BASE_URL}/api/v1/secure-download/`)).toBe(
      true
    );

    const res = await app.request(pathOf(url));
    expect(res.status).toBe(200);
    expect(res.headers.get('Content-Type')).toBe('application/pdf');
    expect(res.headers.get('Content-Disposition')).toBe(
      `attachment; filename="quarterly-report.pdf"; filename*=UTF-8''quarterly-report.pdf`
    );
    expect(new Uint8Array(await res.arrayBuffer())).toEqual(samples.pdf);
  });

  it('should deny a link one second after it expires', async () => {
    const app = buildApp();
    await upload(app, samples.pdf, 'report.pdf');
    const url = await issue(app, 'file-1');

    now = T0 + 61_000;
    const res = await app.request(pathOf(url));

    expect(res.status).toBe(403);
    const body = await readJson<ErrorResponse>(res);
    expect(body.error.code).toBe('DENIED');
  });

  it('should answer a forged token exactly like an expired one', async () => {
    const app = buildApp();
    await upload(app, samples.pdf, 'report.pdf');
    const url = await issue(app, 'file-1');
    const forged = Buffer.concat([
      Buffer.from([1]),
      Buffer.alloc(48, 9),
    ]).toString('base64url');

    now = T0 + 61_000;
    const expiredRes = await app.request(pathOf(url));
    const forgedRes = await app.request(`/api/v1/secure-download/${forged}`);

    expect(forgedRes.status).toBe(expiredRes.status);
    const expiredBody = await readJson<ErrorResponse>(expiredRes);
    const forgedBody = await readJson<ErrorResponse>(forgedRes);
    expect(forgedBody.error.code).toBe(expiredBody.error.code);
    expect(forgedBody.error.message).toBe(expiredBody.error.message);
  });

  it('should refuse uploads from client users', async () => {
    const app = buildApp();

    const res = await upload(app, samples.pdf, 'report.pdf', JWTS.client);

    expect(res.status).toBe(403);
    const body = await readJson<ErrorResponse>(res);
    expect(body.error.message).toBe('Requires role: operation');
    expect(stores.objects.size).toBe(0);
  });

  it('should refuse a renamed executable and store nothing', async () => {
    const app = buildApp();

    const res = await upload(app, samples.windowsExe, 'invoice.pdf');

    expect(res.status).toBe(415);
    expect(stores.objects.size).toBe(0);
    expect(stores.records.size).toBe(0);
  });

  it('should refuse a payload over the upload limit', async () => {
    const app = buildApp();

    const res = await upload(
      app,
      new Uint8Array(MAX_UPLOAD_BYTES + 1).fill(0x61),
      'big.txt'
    );

    expect(res.status).toBe(413);
    const body = await readJson<ErrorResponse>(res);
    expect(body.error.code).toBe('FILE_TOO_LARGE');
  });

  it('should require authentication for discovery and issuance', async () => {
    const app = buildApp();

    expect((await app.request('/api/v1/files')).status).toBe(401);
    expect((await app.request('/api/v1/download/file-1')).status).toBe(401);
  });

  it('should serve health checks without authentication', async () => {
    const app = buildApp();

    expect((await app.request('/api/v1/health')).status).toBe(200);
  });

  it('should answer 410 when the bytes vanish after issuance', async () => {
    const app = buildApp();
    await upload(app, samples.pdf, 'report.pdf');
    const url = await issue(app, 'file-1');

    stores.objects.clear();
    const res = await app.request(pathOf(url));

    expect(res.status).toBe(410);
  });

  it('should answer 404 for an unknown file at issuance', async () => {
    const app = buildApp();

    const res = await app.request('/api/v1/download/file-404', {
      headers: bearer(JWTS.client),
    });

    expect(res.status).toBe(404);
  });

  it('should answer 404 for an unknown endpoint', async () => {
    const app = buildApp();

    const res = await app.request('/api/v1/nothing-here');

    expect(res.status).toBe(404);
    const body = await readJson<ErrorResponse>(res);
    expect(body.error.message).toBe('Endpoint not found');
  });

  describe('with principal-bound links', () => {
    it('should serve only the user the link was issued to', async () => {
      const app = buildApp({ kind: 'principal-bound' });
      await upload(app, samples.pdf, 'report.pdf');
      const path = pathOf(await issue(app, 'file-1', JWTS.client));

      const anonymous = await app.request(path);
      const other = await app.request(path, {
        headers: bearer(JWTS.otherClient),
      });
      const owner = await app.request(path, {
        headers: bearer(JWTS.client),
      });

      expect(anonymous.status).toBe(403);
      expect(other.status).toBe(403);
      expect(owner.status).toBe(200);
    });
  });
});
