/**
 * Runtime Configuration
 *
 * Resolved once at startup. CLI flags win over environment variables:
 *   TOOLFETCH_OUTPUT_DIR  base directory (default: cwd)
 *   TOOLFETCH_VERBOSE     1/true/yes/on enables diagnostics
 *   TOOLFETCH_API_URL     GitHub API base (default: https://api.github.com)
 *   TOOLFETCH_TIMEOUT_MS  socket timeout for API calls and downloads
 *   GITHUB_TOKEN          optional, raises the API rate limit
 */

import * as path from 'path';
import { isTruthy } from '../commands/arg-extractor';
import { UsageError } from '../errors';
import { DEFAULT_TIMEOUT_MS } from '../updater/downloader';
import { DEFAULT_API_BASE_URL } from '../updater/release-source';
import { getVersion } from '../utils/version';

export interface RuntimeConfig {
  baseDir: string;
  verbose: boolean;
  apiBaseUrl: string;
  token?: string;
  timeoutMs: number;
  userAgent: string;
}

export interface ConfigOverrides {
  output?: string;
  verbose?: boolean;
}

export function getUserAgent(): string {
  return `toolfetch-release-updater/${getVersion()}`;
}

function parseTimeout(raw: string | undefined): number {
  if (raw === undefined || raw.trim() === '') return DEFAULT_TIMEOUT_MS;
  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    throw new UsageError(`TOOLFETCH_TIMEOUT_MS must be a positive integer, got "${raw}"`);
  }
  return value;
}

export function loadRuntimeConfig(
  overrides: ConfigOverrides = {},
  env: NodeJS.ProcessEnv = process.env,
  cwd: string = process.cwd()
): RuntimeConfig {
  const output = overrides.output ?? env.TOOLFETCH_OUTPUT_DIR;
  const token = env.GITHUB_TOKEN?.trim();

  return {
    baseDir: path.resolve(cwd, output && output.trim() !== '' ? output : '.'),
    verbose: overrides.verbose || isTruthy(env.TOOLFETCH_VERBOSE),
    apiBaseUrl: env.TOOLFETCH_API_URL?.trim() || DEFAULT_API_BASE_URL,
    ...(token ? { token } : {}),
    timeoutMs: parseTimeout(env.TOOLFETCH_TIMEOUT_MS),
    userAgent: getUserAgent(),
  };
}
