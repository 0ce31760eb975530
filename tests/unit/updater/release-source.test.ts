/**
 * Release Source tests
 */

import { describe, it, expect, beforeAll, afterAll, beforeEach } from 'vitest';
import * as http from 'http';
import { RegistryDecodeError, RegistryNetworkError } from '../../../src/errors';
import {
  GitHubReleaseSource,
  getLatestReleaseUrl,
  parseRelease,
} from '../../../src/updater/release-source';
import { close, listen } from '../../helpers/local-server';

const LATEST_UV = {
  tag_name: '0.5.1',
  name: '0.5.1',
  assets: [
    {
      name: 'uv-x86_64-pc-windows-msvc.zip',
      browser_download_url: 'https://downloads.test/uv-x86_64-pc-windows-msvc.zip',
      size: 1234,
    },
    {
      name: 'uv-aarch64-apple-darwin.tar.gz',
      browser_download_url: 'https://downloads.test/uv-aarch64-apple-darwin.tar.gz',
    },
  ],
};

describe('parseRelease', () => {
  it('keeps tag, names, URLs and sizes in order', () => {
    expect(parseRelease(LATEST_UV, 'astral-sh/uv')).toEqual({
      tagName: '0.5.1',
      assets: [
        {
          name: 'uv-x86_64-pc-windows-msvc.zip',
          downloadUrl: 'https://downloads.test/uv-x86_64-pc-windows-msvc.zip',
          size: 1234,
        },
        {
          name: 'uv-aarch64-apple-darwin.tar.gz',
          downloadUrl: 'https://downloads.test/uv-aarch64-apple-darwin.tar.gz',
        },
      ],
    });
  });

  it('accepts an empty asset list', () => {
    expect(parseRelease({ tag_name: 'v1.0.0', assets: [] }, 'a/b')).toEqual({
      tagName: 'v1.0.0',
      assets: [],
    });
  });

  it.each([
    ['a non-object payload', [], 'Release payload is not an object'],
    ['a missing tag', { assets: [] }, 'Release payload has no tag_name'],
    ['a blank tag', { tag_name: '  ', assets: [] }, 'Release payload has no tag_name'],
    ['a missing asset list', { tag_name: 'v1.0.0' }, 'Release payload has no assets list'],
    [
      'an asset without a download URL',
      { tag_name: 'v1.0.0', assets: [{ name: 'a.zip' }] },
      'Release asset #0 is malformed',
    ],
  ])('rejects %s', (_label, payload, message) => {
    expect(() => parseRelease(payload, 'a/b')).toThrow(RegistryDecodeError);
    expect(() => parseRelease(payload, 'a/b')).toThrow(message);
  });
});

describe('getLatestReleaseUrl', () => {
  it('builds the releases/latest endpoint', () => {
    expect(getLatestReleaseUrl('PowerShell/PowerShell')).toBe(
      'https://api.github.com/repos/PowerShell/PowerShell/releases/latest'
    );
  });

  it('strips trailing slashes from the base URL', () => {
    expect(getLatestReleaseUrl('astral-sh/uv', 'http://127.0.0.1:9000//')).toBe(
      'http://127.0.0.1:9000/repos/astral-sh/uv/releases/latest'
    );
  });
});

describe('GitHubReleaseSource', () => {
  let server: http.Server;
  let baseUrl: string;
  let requests: http.IncomingHttpHeaders[];
  let requestPaths: (string | undefined)[];

  beforeAll(async () => {
    server = http.createServer((req, res) => {
      requests.push(req.headers);
      requestPaths.push(req.url);
      switch (req.url) {
        case '/repos/astral-sh/uv/releases/latest':
          res.writeHead(200, { 'Content-Type': 'application/json' });
          res.end(JSON.stringify(LATEST_UV));
          return;
        case '/repos/broken/json/releases/latest':
          res.writeHead(200, { 'Content-Type': 'application/json' });
          res.end('{"tag_name": ');
          return;
        case '/repos/slow/headers/releases/latest':
          return;
        case '/repos/slow/body/releases/latest':
          res.writeHead(200, { 'Content-Type': 'application/json' });
          res.write('{"tag_name": "v1.0.0", ');
          return;
        case '/repos/limited/repo/releases/latest':
          res.writeHead(403, 'Forbidden');
          res.end('{"message": "API rate limit exceeded"}');
          return;
        default:
          res.writeHead(500, 'Internal Server Error');
          res.end();
      }
    });
    baseUrl = await listen(server);
  });

  afterAll(async () => {
    await close(server);
  });

  beforeEach(() => {
    requests = [];
    requestPaths = [];
  });

  function createSource(): GitHubReleaseSource {
    return new GitHubReleaseSource({ apiBaseUrl: baseUrl, userAgent: 'toolfetch-test/1.0' });
  }

  it('fetches and decodes the latest release', async () => {
    const source = createSource();

    const release = await source.fetchLatest('astral-sh/uv');

    expect(release.tagName).toBe('0.5.1');
    expect(release.assets.map((asset) => asset.name)).toEqual([
      'uv-x86_64-pc-windows-msvc.zip',
      'uv-aarch64-apple-darwin.tar.gz',
    ]);
    expect(requestPaths).toEqual(['/repos/astral-sh/uv/releases/latest']);
  });

  it('sends User-Agent and Accept, and no Authorization without a token', async () => {
    const source = createSource();

    await source.fetchLatest('astral-sh/uv');

    expect(requests[0]['user-agent']).toBe('toolfetch-test/1.0');
    expect(requests[0].accept).toBe('application/vnd.github+json');
    expect(requests[0].authorization).toBeUndefined();
  });

  it('sends a bearer token when configured', async () => {
    const source = new GitHubReleaseSource({
      apiBaseUrl: baseUrl,
      userAgent: 'toolfetch-test/1.0',
      token: 'test-secret',
    });

    await source.fetchLatest('astral-sh/uv');

    expect(requests[0].authorization).toBe('Bearer test-secret');
  });

  it('maps HTTP failures to RegistryNetworkError with the status', async () => {
    const source = createSource();

    const error = await source.fetchLatest('limited/repo').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(RegistryNetworkError);
    if (error instanceof RegistryNetworkError) {
      expect(error.statusCode).toBe(403);
      expect(error.repository).toBe('limited/repo');
      expect(error.message).toBe(
        'Failed to fetch latest release of limited/repo: HTTP 403: Forbidden'
      );
    }
  });

  it('maps server errors to RegistryNetworkError', async () => {
    const source = createSource();

    const error = await source.fetchLatest('missing/repo').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(RegistryNetworkError);
    if (error instanceof RegistryNetworkError) {
      expect(error.statusCode).toBe(500);
    }
  });

  it('rejects an unparseable body with RegistryDecodeError', async () => {
    const source = createSource();

    await expect(source.fetchLatest('broken/json')).rejects.toThrow(
      new RegistryDecodeError('Invalid JSON from GitHub API for broken/json', 'broken/json')
    );
  });

  it.each(['slow/headers', 'slow/body'])(
    'reports a stalled response from %s as a timeout',
    async (repository) => {
      const source = new GitHubReleaseSource({
        apiBaseUrl: baseUrl,
        userAgent: 'toolfetch-test/1.0',
        timeout: 300,
      });

      const error = await source.fetchLatest(repository).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(RegistryNetworkError);
      if (error instanceof RegistryNetworkError) {
        expect(error.message).toBe(
          `Failed to fetch latest release of ${repository}: Request timeout (0.3s)`
        );
        expect(error.statusCode).toBeUndefined();
      }
    }
  );

  it('reports an unreachable registry as a network error without a status', async () => {
    const closed = http.createServer();
    const deadUrl = await listen(closed);
    await close(closed);

    const source = new GitHubReleaseSource({
      apiBaseUrl: deadUrl,
      userAgent: 'toolfetch-test/1.0',
    });
    const error = await source.fetchLatest('astral-sh/uv').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(RegistryNetworkError);
    if (error instanceof RegistryNetworkError) {
      expect(error.statusCode).toBeUndefined();
    }
  });
});
