/**
 * HTTP Downloader
 * Single-attempt GET over http/https with redirect following, timeout,
 * byte-level progress and a fixed User-Agent.
 */

import * as fs from 'fs';
import * as http from 'http';
import * as https from 'https';
import { Transform } from 'stream';
import { pipeline } from 'stream/promises';
import { DownloadError, toError } from '../errors';
import type { AssetDownloader, ProgressCallback } from './types';

export const DEFAULT_TIMEOUT_MS = 120000; // 2 minutes for large archives
export const DEFAULT_MAX_REDIRECTS = 5;

const REDIRECT_STATUSES = new Set([301, 302, 303, 307, 308]);

export interface HttpClientConfig {
  /** Registries reject anonymous clients */
  userAgent: string;
  timeout?: number;
  headers?: Record<string, string>;
  maxRedirects?: number;
}

export class HttpStatusError extends Error {
  constructor(
    public readonly statusCode: number,
    statusMessage: string | undefined,
    public readonly url: string
  ) {
    super(`HTTP ${statusCode}${statusMessage ? `: ${statusMessage}` : ''}`);
    this.name = 'HttpStatusError';
  }
}

function requestOptions(config: HttpClientConfig): http.RequestOptions {
  return {
    headers: {
      'User-Agent': config.userAgent,
      ...config.headers,
    },
    agent: false, // Disable connection pooling for clean exit
  };
}

/**
 * Issue a GET and resolve with the first 2xx response after redirects.
 * Non-2xx statuses reject with HttpStatusError. The socket timeout covers
 * the whole exchange: a stalled body errors the response stream.
 */
export function openResponse(
  url: string,
  config: HttpClientConfig,
  redirectsLeft = config.maxRedirects ?? DEFAULT_MAX_REDIRECTS
): Promise<http.IncomingMessage> {
  return new Promise((resolve, reject) => {
    const timeout = config.timeout ?? DEFAULT_TIMEOUT_MS;
    const protocol = url.startsWith('https:') ? https : http;
    let response: http.IncomingMessage | null = null;

    const req = protocol.get(url, requestOptions(config), (res) => {
      const status = res.statusCode ?? 0;

      if (REDIRECT_STATUSES.has(status)) {
        res.resume();
        const location = res.headers.location;
        if (!location) {
          reject(new Error('Redirect without location header'));
          return;
        }
        if (redirectsLeft <= 0) {
          reject(new Error(`Too many redirects fetching ${url}`));
          return;
        }
        openResponse(new URL(location, url).toString(), config, redirectsLeft - 1).then(
          resolve,
          reject
        );
        return;
      }

      if (status < 200 || status >= 300) {
        res.resume();
        reject(new HttpStatusError(status, res.statusMessage, url));
        return;
      }

      response = res;
      resolve(res);
    });

    req.on('error', reject);
    req.setTimeout(timeout, () => {
      const error = new Error(`Request timeout (${timeout / 1000}s)`);
      // After the headers the caller is reading the body, so fail that stream
      if (response) {
        response.destroy(error);
      } else {
        req.destroy(error);
      }
    });
  });
}

/**
 * Fetch a response body as UTF-8 text
 */
export async function fetchText(url: string, config: HttpClientConfig): Promise<string> {
  const res = await openResponse(url, config);
  const chunks: Buffer[] = [];
  for await (const chunk of res) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  return Buffer.concat(chunks).toString('utf8');
}

/**
 * Stream a URL to destPath, reporting (downloaded, total) after every chunk.
 * total is 0 when the server sends no content length.
 * A failed transfer removes the partial file.
 */
export async function downloadFile(
  url: string,
  destPath: string,
  config: HttpClientConfig,
  onProgress?: ProgressCallback
): Promise<void> {
  try {
    const res = await openResponse(url, config);
    const total = parseInt(res.headers['content-length'] ?? '0', 10) || 0;
    let downloaded = 0;

    const counter = new Transform({
      transform(chunk: Buffer, _encoding, callback) {
        downloaded += chunk.length;
        onProgress?.(downloaded, total);
        callback(null, chunk);
      },
    });

    await pipeline(res, counter, fs.createWriteStream(destPath));
  } catch (error) {
    await fs.promises.rm(destPath, { force: true });
    const err = toError(error);
    throw new DownloadError(
      `Download failed: ${err.message}`,
      url,
      err instanceof HttpStatusError ? err.statusCode : undefined,
      { cause: err }
    );
  }
}

export class HttpAssetDownloader implements AssetDownloader {
  constructor(private readonly config: HttpClientConfig) {}

  download(url: string, destPath: string, onProgress?: ProgressCallback): Promise<void> {
    return downloadFile(url, destPath, this.config, onProgress);
  }
}
