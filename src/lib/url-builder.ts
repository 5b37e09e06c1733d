/**
 * Download URL Builder
 * Formats tokens into externally reachable secure-download addresses
 */

import type { DownloadUrlBuilder } from '../services/download.service.js';

export const SECURE_DOWNLOAD_PATH = '/api/v1/secure-download';

export function createUrlBuilder(publicBaseUrl: string): DownloadUrlBuilder {
  const base = publicBaseUrl.replace(/\/+$/, '');

  return {
    secureDownloadUrl(token: string): string {
      return `${base}${SECURE_DOWNLOAD_PATH}/${encodeURIComponent(token)}`;
    },
  };
}
