import { describe, it, expect, afterEach, vi } from 'vitest';
import {
  AssetNotFoundError,
  DownloadError,
  EXIT_FAILURE,
  EXIT_USAGE,
  ExtractionError,
  RegistryDecodeError,
  RegistryNetworkError,
  UsageError,
  describeError,
  handleError,
  toError,
} from '../../src/errors';

describe('describeError', () => {
  it('maps usage errors to exit code 2', () => {
    expect(describeError(new UsageError('Unknown option: --force'))).toEqual({
      title: 'USAGE',
      lines: ['Unknown option: --force', '', 'Run "toolfetch --help" for usage.'],
      exitCode: EXIT_USAGE,
    });
  });

  it('lists the candidate assets when nothing matches', () => {
    const report = describeError(
      new AssetNotFoundError('PowerShell', 'v7.4.1', ['powershell-7.4.1-linux-x64.tar.gz'])
    );

    expect(report.title).toBe('NO MATCHING ASSET');
    expect(report.lines[0]).toBe('No compatible release asset for PowerShell v7.4.1');
    expect(report.lines.slice(-2)).toEqual([
      'Assets in this release:',
      '  - powershell-7.4.1-linux-x64.tar.gz',
    ]);
    expect(report.exitCode).toBe(EXIT_FAILURE);
  });

  it('omits the asset list for an empty release', () => {
    const report = describeError(new AssetNotFoundError('UV', '0.5.1', []));
    expect(report.lines).not.toContain('Assets in this release:');
  });

  it('hints at GITHUB_TOKEN on a 403 from the registry', () => {
    const report = describeError(
      new RegistryNetworkError(
        'Failed to fetch latest release of astral-sh/uv: HTTP 403',
        'astral-sh/uv',
        403
      )
    );

    expect(report.title).toBe('REGISTRY ERROR');
    expect(report.lines[report.lines.length - 1]).toBe(
      'GitHub may be rate limiting you; set GITHUB_TOKEN to raise the limit.'
    );
  });

  it('does not hint at a token for other registry failures', () => {
    const report = describeError(
      new RegistryNetworkError(
        'Failed to fetch latest release of astral-sh/uv: HTTP 500',
        'astral-sh/uv',
        500
      )
    );
    expect(report.lines[report.lines.length - 1]).toBe(
      'Check your network connection or GitHub status.'
    );
  });

  it('names the repository on decode errors', () => {
    const report = describeError(
      new RegistryDecodeError('Release payload has no tag_name', 'astral-sh/uv')
    );
    expect(report.lines).toEqual([
      'Release payload has no tag_name',
      '',
      'The release metadata for astral-sh/uv was not in the expected format.',
    ]);
  });

  it('shows the URL of a failed download', () => {
    const report = describeError(
      new DownloadError(
        'Download failed: HTTP 404: Not Found',
        'https://downloads.test/uv.zip',
        404
      )
    );
    expect(report.title).toBe('DOWNLOAD FAILED');
    expect(report.lines).toContain('URL: https://downloads.test/uv.zip');
  });

  it('points at the kept archive after a failed extraction', () => {
    const report = describeError(
      new ExtractionError('Failed to extract uv.zip: Truncated entry data', '/tools/uv/uv.zip')
    );
    expect(report.title).toBe('EXTRACTION FAILED');
    expect(report.lines[report.lines.length - 1]).toBe(
      'Archive kept for inspection: /tools/uv/uv.zip'
    );
  });

  it('falls back to a generic report', () => {
    expect(describeError('disk full')).toEqual({
      title: 'ERROR',
      lines: ['disk full'],
      exitCode: EXIT_FAILURE,
    });
  });
});

describe('toError', () => {
  it('passes errors through and wraps other values', () => {
    const error = new Error('boom');
    expect(toError(error)).toBe(error);
    expect(toError(42).message).toBe('42');
  });
});

describe('handleError', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('prints the report and returns the exit code', () => {
    const printed: string[] = [];
    vi.spyOn(console, 'error').mockImplementation((...args: unknown[]) => {
      printed.push(args.map(String).join(' '));
    });

    const code = handleError(new UsageError('--output requires a directory'));

    expect(code).toBe(EXIT_USAGE);
    expect(printed).toHaveLength(1);
    expect(printed[0]).toContain('--output requires a directory');
  });

  it('adds the stack trace when verbose', () => {
    const printed: string[] = [];
    vi.spyOn(console, 'error').mockImplementation((...args: unknown[]) => {
      printed.push(args.map(String).join(' '));
    });
    const error = new Error('boom');

    handleError(error, true);

    expect(printed).toHaveLength(2);
    expect(printed[1]).toBe(error.stack);
  });
});
