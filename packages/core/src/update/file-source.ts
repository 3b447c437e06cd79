/**
 * Remote File Source
 * Fetches the published VERSION and manifest files from the raw-file endpoint
 */

import axios, { type AxiosInstance } from 'axios';
import { logger } from '../utils/logger.js';
import { UpdateError, UpdateErrorCode, describeError, toUpdateError } from '../utils/errors.js';
import type { RemoteFileSourceOptions } from './types.js';

const DEFAULT_VERSION_TIMEOUT_MS = 10_000;
const DEFAULT_DOWNLOAD_TIMEOUT_MS = 30_000;

function joinUrl(base: string, relative: string): string {
  const encoded = relative.split('/').map(encodeURIComponent).join('/');
  return `${base.replace(/\/+$/, '')}/${encoded}`;
}

/**
 * Remote File Source class
 */
export class RemoteFileSource {
  private readonly http: AxiosInstance;
  private readonly versionTimeoutMs: number;
  private readonly downloadTimeoutMs: number;

  constructor(options: RemoteFileSourceOptions = {}) {
    this.http = options.http ?? axios.create();
    this.versionTimeoutMs = options.versionTimeoutMs ?? DEFAULT_VERSION_TIMEOUT_MS;
    this.downloadTimeoutMs = options.downloadTimeoutMs ?? DEFAULT_DOWNLOAD_TIMEOUT_MS;
  }

  /**
   * Published version identifier, or null when it cannot be read
   */
  public async fetchVersion(rawUrl: string): Promise<string | null> {
    if (!rawUrl) {
      return null;
    }
    try {
      const response = await this.http.get<string>(joinUrl(rawUrl, 'VERSION'), {
        timeout: this.versionTimeoutMs,
        responseType: 'text',
        transformResponse: (data: unknown) => data,
      });
      const version = String(response.data).trim();
      return version.length > 0 ? version : null;
    } catch (error) {
      logger.warn('Remote version lookup failed', { rawUrl, error: describeError(error) });
      return null;
    }
  }

  /**
   * Download one manifest file
   */
  public async download(rawUrl: string, relative: string): Promise<Buffer> {
    if (!rawUrl) {
      throw new UpdateError(UpdateErrorCode.CONFIG_INCONSISTENCY, 'No raw file URL configured for downloads');
    }
    try {
      const response = await this.http.get<ArrayBuffer>(joinUrl(rawUrl, relative), {
        timeout: this.downloadTimeoutMs,
        responseType: 'arraybuffer',
      });
      return Buffer.from(response.data);
    } catch (error) {
      const wrapped = toUpdateError(error, UpdateErrorCode.APPLY_FAILURE);
      throw new UpdateError(wrapped.code, `Failed to download ${relative}: ${wrapped.message}`, error);
    }
  }
}
