/**
 * Release Source
 * Looks up the latest published release of a repository on GitHub.
 */

import { RegistryDecodeError, RegistryNetworkError, toError } from '../errors';
import { debugLog } from '../utils/debug-log';
import { fetchText, HttpStatusError, type HttpClientConfig } from './downloader';
import type { ReleaseAsset, ReleaseInfo, ReleaseSource } from './types';

export const DEFAULT_API_BASE_URL = 'https://api.github.com';

export interface GitHubReleaseSourceConfig {
  apiBaseUrl?: string;
  userAgent: string;
  token?: string;
  timeout?: number;
  verbose?: boolean;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Validate a `releases/latest` payload.
 * @throws RegistryDecodeError when tag_name or the asset list is missing or malformed
 */
export function parseRelease(payload: unknown, repository: string): ReleaseInfo {
  if (!isRecord(payload)) {
    throw new RegistryDecodeError('Release payload is not an object', repository);
  }

  const tagName = payload.tag_name;
  if (typeof tagName !== 'string' || tagName.trim() === '') {
    throw new RegistryDecodeError('Release payload has no tag_name', repository);
  }

  if (!Array.isArray(payload.assets)) {
    throw new RegistryDecodeError('Release payload has no assets list', repository);
  }

  const assets: ReleaseAsset[] = payload.assets.map((raw: unknown, index: number) => {
    if (
      !isRecord(raw) ||
      typeof raw.name !== 'string' ||
      typeof raw.browser_download_url !== 'string'
    ) {
      throw new RegistryDecodeError(`Release asset #${index} is malformed`, repository);
    }
    return typeof raw.size === 'number'
      ? { name: raw.name, downloadUrl: raw.browser_download_url, size: raw.size }
      : { name: raw.name, downloadUrl: raw.browser_download_url };
  });

  return { tagName, assets };
}

export function getLatestReleaseUrl(repository: string, apiBaseUrl = DEFAULT_API_BASE_URL): string {
  return `${apiBaseUrl.replace(/\/+$/, '')}/repos/${repository}/releases/latest`;
}

export class GitHubReleaseSource implements ReleaseSource {
  private readonly http: HttpClientConfig;
  private readonly apiBaseUrl: string;
  private readonly verbose: boolean;

  constructor(config: GitHubReleaseSourceConfig) {
    this.apiBaseUrl = config.apiBaseUrl ?? DEFAULT_API_BASE_URL;
    this.verbose = config.verbose ?? false;
    this.http = {
      userAgent: config.userAgent,
      timeout: config.timeout,
      headers: {
        Accept: 'application/vnd.github+json',
        ...(config.token ? { Authorization: `Bearer ${config.token}` } : {}),
      },
    };
  }

  async fetchLatest(repository: string): Promise<ReleaseInfo> {
    const url = getLatestReleaseUrl(repository, this.apiBaseUrl);
    debugLog(`GET ${url}`, this.verbose);

    let body: string;
    try {
      body = await fetchText(url, this.http);
    } catch (error) {
      const err = toError(error);
      const status = err instanceof HttpStatusError ? err.statusCode : undefined;
      throw new RegistryNetworkError(
        `Failed to fetch latest release of ${repository}: ${err.message}`,
        repository,
        status,
        { cause: err }
      );
    }

    let payload: unknown;
    try {
      payload = JSON.parse(body);
    } catch {
      throw new RegistryDecodeError(`Invalid JSON from GitHub API for ${repository}`, repository);
    }

    const release = parseRelease(payload, repository);
    debugLog(
      `${repository}: ${release.tagName} with ${release.assets.length} assets`,
      this.verbose
    );
    return release;
  }
}
