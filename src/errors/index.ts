/**
 * Centralized error types and top-level error handling.
 *
 * Every failure the updater can surface derives from ToolfetchError so the
 * CLI can pick a title, hint and exit code without string matching.
 */

import { errorBox } from '../utils/ui';

export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;

export class ToolfetchError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ToolfetchError';
  }
}

export class UsageError extends ToolfetchError {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

export class VersionParseError extends ToolfetchError {
  constructor(public readonly input: string) {
    super(`Not a semantic version: "${input}"`);
    this.name = 'VersionParseError';
  }
}

/** Base for everything that went wrong talking to the release registry */
export class RegistryError extends ToolfetchError {
  constructor(
    message: string,
    public readonly repository: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'RegistryError';
  }
}

export class RegistryNetworkError extends RegistryError {
  constructor(
    message: string,
    repository: string,
    public readonly statusCode?: number,
    options?: { cause?: unknown }
  ) {
    super(message, repository, options);
    this.name = 'RegistryNetworkError';
  }
}

export class RegistryDecodeError extends RegistryError {
  constructor(message: string, repository: string) {
    super(message, repository);
    this.name = 'RegistryDecodeError';
  }
}

export class AssetNotFoundError extends ToolfetchError {
  constructor(
    public readonly toolName: string,
    public readonly tagName: string,
    public readonly candidates: readonly string[]
  ) {
    super(`No compatible release asset for ${toolName} ${tagName}`);
    this.name = 'AssetNotFoundError';
  }
}

export class DownloadError extends ToolfetchError {
  constructor(
    message: string,
    public readonly url: string,
    public readonly statusCode?: number,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'DownloadError';
  }
}

/** Corrupt archive or failed write; the archive stays on disk for inspection */
export class ExtractionError extends ToolfetchError {
  constructor(
    message: string,
    public readonly archivePath: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'ExtractionError';
  }
}

export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}

interface ErrorReport {
  title: string;
  lines: string[];
  exitCode: number;
}

/**
 * Map an error to the box title, body lines and exit code shown to the user.
 */
export function describeError(error: unknown): ErrorReport {
  if (error instanceof UsageError) {
    return {
      title: 'USAGE',
      lines: [error.message, '', 'Run "toolfetch --help" for usage.'],
      exitCode: EXIT_USAGE,
    };
  }

  if (error instanceof AssetNotFoundError) {
    const lines = [
      error.message,
      '',
      'The release may not publish a Windows x64 zip yet.',
      'Try again later, or download it manually from the release page.',
    ];
    if (error.candidates.length > 0) {
      lines.push('', 'Assets in this release:', ...error.candidates.map((name) => `  - ${name}`));
    }
    return { title: 'NO MATCHING ASSET', lines, exitCode: EXIT_FAILURE };
  }

  if (error instanceof RegistryDecodeError) {
    return {
      title: 'REGISTRY ERROR',
      lines: [
        error.message,
        '',
        `The release metadata for ${error.repository} was not in the expected format.`,
      ],
      exitCode: EXIT_FAILURE,
    };
  }

  if (error instanceof RegistryError) {
    const lines = [error.message, '', 'Check your network connection or GitHub status.'];
    if (error instanceof RegistryNetworkError && error.statusCode === 403) {
      lines.push('GitHub may be rate limiting you; set GITHUB_TOKEN to raise the limit.');
    }
    return { title: 'REGISTRY ERROR', lines, exitCode: EXIT_FAILURE };
  }

  if (error instanceof DownloadError) {
    return {
      title: 'DOWNLOAD FAILED',
      lines: [error.message, '', `URL: ${error.url}`, 'Run again to restart the download.'],
      exitCode: EXIT_FAILURE,
    };
  }

  if (error instanceof ExtractionError) {
    return {
      title: 'EXTRACTION FAILED',
      lines: [error.message, '', `Archive kept for inspection: ${error.archivePath}`],
      exitCode: EXIT_FAILURE,
    };
  }

  return { title: 'ERROR', lines: [toError(error).message], exitCode: EXIT_FAILURE };
}

/**
 * Print the error and return the process exit code
 */
export function handleError(error: unknown, verbose = false): number {
  const report = describeError(error);
  console.error(errorBox(report.lines.join('\n'), report.title));

  if (verbose && error instanceof Error && error.stack) {
    console.error(error.stack);
  }
  return report.exitCode;
}
