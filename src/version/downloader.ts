/**
 * Artifact Downloader
 * Handles downloading files with retry logic, progress tracking, and redirect following.
 * Transient network errors (socket hang up, ECONNRESET, 5xx, 429) are retried with backoff.
 */

import * as fs from 'fs';
import * as https from 'https';
import * as http from 'http';
import { DownloadResult, ProgressCallback } from './types';
import { asError } from '../errors';
import { createLogger } from '../utils/logger';

const log = createLogger('download');

const USER_AGENT = 'mihomo-manager-downloader/1.0';
const MAX_REDIRECTS = 10;

export interface DownloaderConfig {
  /** Maximum attempts */
  maxRetries: number;
  /** Timeout in milliseconds per attempt */
  timeout: number;
  /** Base delay for exponential backoff */
  baseDelayMs: number;
  onProgress?: ProgressCallback;
  signal?: AbortSignal;
}

const DEFAULT_CONFIG: DownloaderConfig = {
  maxRetries: 5,
  timeout: 120000,
  baseDelayMs: 1000,
};

/** HTTP failure with its status code */
export class HttpStatusError extends Error {
  constructor(
    readonly statusCode: number,
    statusMessage: string | undefined
  ) {
    super(`HTTP ${statusCode}: ${statusMessage ?? ''}`.trim());
    this.name = 'HttpStatusError';
  }
}

/** Error types for categorized handling */
export type NetworkErrorType = 'socket' | 'timeout' | 'http' | 'redirect' | 'aborted' | 'unknown';

/** Categorize error for appropriate retry/reporting */
export function categorizeError(error: Error): NetworkErrorType {
  if (error instanceof HttpStatusError) return 'http';
  const msg = error.message.toLowerCase();
  if (error.name === 'AbortError' || msg.includes('aborted')) {
    return 'aborted';
  }
  if (msg.includes('socket hang up') || msg.includes('econnreset') || msg.includes('epipe')) {
    return 'socket';
  }
  if (msg.includes('timeout') || msg.includes('etimedout')) {
    return 'timeout';
  }
  if (msg.includes('redirect')) {
    return 'redirect';
  }
  return 'unknown';
}

/** Check if error is retryable */
export function isRetryableError(error: Error): boolean {
  const type = categorizeError(error);
  if (type === 'socket' || type === 'timeout' || type === 'unknown') {
    return true;
  }
  if (error instanceof HttpStatusError) {
    return error.statusCode >= 500 || error.statusCode === 429;
  }
  return false;
}

function abortError(): Error {
  const err = new Error('Download aborted');
  err.name = 'AbortError';
  return err;
}

/**
 * Sleep that wakes early (rejecting) when the signal fires.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(abortError());
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(abortError());
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

function getProtocol(url: string): typeof http | typeof https {
  return url.startsWith('https') ? https : http;
}

/**
 * Download file from URL with progress tracking (single attempt)
 */
export function downloadFile(
  url: string,
  destPath: string,
  options: { timeout?: number; onProgress?: ProgressCallback; signal?: AbortSignal } = {},
  redirects = 0
): Promise<void> {
  const timeout = options.timeout ?? DEFAULT_CONFIG.timeout;

  return new Promise((resolve, reject) => {
    let settled = false;
    let req: http.ClientRequest | null = null;

    const finish = (err?: Error) => {
      if (settled) return;
      settled = true;
      options.signal?.removeEventListener('abort', onAbort);
      if (err) {
        fs.rm(destPath, { force: true }, () => {
          reject(err);
        });
      } else {
        resolve();
      }
    };

    const onAbort = () => {
      req?.destroy();
      finish(abortError());
    };

    if (options.signal?.aborted) {
      finish(abortError());
      return;
    }
    options.signal?.addEventListener('abort', onAbort, { once: true });

    const handleResponse = (res: http.IncomingMessage) => {
      const status = res.statusCode ?? 0;

      // GitHub release assets answer with a 302 to the CDN
      if (status >= 300 && status < 400) {
        res.resume();
        const location = res.headers.location;
        if (!location) {
          finish(new Error('Redirect without location header'));
          return;
        }
        if (redirects >= MAX_REDIRECTS) {
          finish(new Error(`Too many redirects (redirect limit ${MAX_REDIRECTS})`));
          return;
        }
        const redirectUrl = new URL(location, url).toString();
        log.debug(`Following redirect: ${redirectUrl}`);
        settled = true;
        options.signal?.removeEventListener('abort', onAbort);
        downloadFile(redirectUrl, destPath, options, redirects + 1).then(resolve, reject);
        return;
      }

      if (status !== 200) {
        res.resume();
        finish(new HttpStatusError(status, res.statusMessage));
        return;
      }

      const totalBytes = parseInt(res.headers['content-length'] || '0', 10);
      let downloadedBytes = 0;
      const fileStream = fs.createWriteStream(destPath);

      res.on('data', (chunk: Buffer) => {
        downloadedBytes += chunk.length;
        if (options.onProgress && totalBytes > 0) {
          options.onProgress({
            total: totalBytes,
            downloaded: downloadedBytes,
            percentage: Math.round((downloadedBytes / totalBytes) * 100),
          });
        }
      });

      res.pipe(fileStream);

      fileStream.on('finish', () => {
        fileStream.close(() => finish());
      });
      fileStream.on('error', (err) => finish(err));
      res.on('error', (err) => finish(err));
    };

    // agent: false disables connection pooling so the process can exit cleanly
    req = getProtocol(url).get(
      url,
      { headers: { 'User-Agent': USER_AGENT }, agent: false },
      handleResponse
    );

    req.on('error', (err) => finish(err));
    req.setTimeout(timeout, () => {
      req?.destroy();
      finish(new Error(`Download timeout (${timeout / 1000}s)`));
    });
  });
}

/**
 * Download file with retry logic and exponential backoff.
 * Socket errors back off longer; timeouts extend the per-attempt timeout.
 */
export async function downloadWithRetry(
  url: string,
  destPath: string,
  config: Partial<DownloaderConfig> = {}
): Promise<DownloadResult> {
  const { maxRetries, timeout, baseDelayMs, onProgress, signal } = {
    ...DEFAULT_CONFIG,
    ...config,
  };
  let lastError: Error | null = null;
  let retries = 0;
  let currentTimeout = timeout;

  while (retries < maxRetries) {
    try {
      await downloadFile(url, destPath, { timeout: currentTimeout, onProgress, signal });
      return { success: true, filePath: destPath, retries };
    } catch (error) {
      const err = asError(error);
      lastError = err;
      retries++;

      if (!isRetryableError(err)) {
        log.debug(`Non-retryable error: ${err.message}`);
        break;
      }

      if (retries < maxRetries) {
        const errorType = categorizeError(err);
        let delay = Math.pow(2, retries - 1) * baseDelayMs;
        if (errorType === 'socket') {
          delay = Math.pow(2, retries) * baseDelayMs;
        } else if (errorType === 'timeout') {
          currentTimeout = Math.min(currentTimeout * 1.5, 300000);
        }

        log.debug(`[Attempt ${retries}/${maxRetries}] ${err.message}; retrying in ${delay}ms`);
        try {
          await sleep(delay, signal);
        } catch (abortErr) {
          lastError = asError(abortErr);
          break;
        }
      }
    }
  }

  return {
    success: false,
    error: `Download failed after ${retries} attempt(s): ${lastError?.message || 'Unknown error'}`,
    statusCode: lastError instanceof HttpStatusError ? lastError.statusCode : undefined,
    retries,
  };
}

/**
 * Fetch JSON from URL (single attempt)
 */
function fetchJsonOnce(url: string, timeout: number, redirects = 0): Promise<unknown> {
  return new Promise((resolve, reject) => {
    let settled = false;
    const settle = (fn: () => void) => {
      if (settled) return;
      settled = true;
      fn();
    };

    const handleResponse = (res: http.IncomingMessage) => {
      const status = res.statusCode ?? 0;
      if (status >= 300 && status < 400 && res.headers.location) {
        res.resume();
        if (redirects >= MAX_REDIRECTS) {
          settle(() => reject(new Error('Too many redirects')));
          return;
        }
        const redirectUrl = new URL(res.headers.location, url).toString();
        settle(() => fetchJsonOnce(redirectUrl, timeout, redirects + 1).then(resolve, reject));
        return;
      }

      if (status !== 200) {
        res.resume();
        settle(() => reject(new HttpStatusError(status, res.statusMessage)));
        return;
      }

      let data = '';
      res.setEncoding('utf8');
      res.on('data', (chunk: string) => (data += chunk));
      res.on('end', () => {
        settle(() => {
          try {
            resolve(JSON.parse(data));
          } catch {
            reject(new Error(`Invalid JSON from ${url}`));
          }
        });
      });
      res.on('error', (err) => settle(() => reject(err)));
    };

    const req = getProtocol(url).get(
      url,
      {
        headers: { 'User-Agent': USER_AGENT, Accept: 'application/vnd.github+json' },
        agent: false,
      },
      handleResponse
    );
    req.on('error', (err) => settle(() => reject(err)));
    req.setTimeout(timeout, () => {
      req.destroy();
      settle(() => reject(new Error(`Request timeout (${timeout / 1000}s)`)));
    });
  });
}

/**
 * Fetch JSON from URL (release API) with retry logic
 */
export async function fetchJson(
  url: string,
  options: { maxRetries?: number; timeout?: number; baseDelayMs?: number } = {}
): Promise<unknown> {
  const maxRetries = options.maxRetries ?? 3;
  const timeout = options.timeout ?? 15000;
  const baseDelayMs = options.baseDelayMs ?? 1000;
  let lastError: Error | null = null;

  for (let attempt = 1; attempt <= maxRetries; attempt++) {
    try {
      return await fetchJsonOnce(url, timeout);
    } catch (error) {
      const err = asError(error);
      lastError = err;

      if (!isRetryableError(err) || attempt === maxRetries) {
        break;
      }

      const delay = Math.pow(2, attempt - 1) * baseDelayMs;
      log.debug(`Release API retry ${attempt}/${maxRetries}: ${err.message}`);
      await sleep(delay);
    }
  }

  throw lastError ?? new Error('fetchJson failed');
}
