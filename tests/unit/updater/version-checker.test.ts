/**
 * Version Checker Unit Tests
 */

import { describe, it, expect } from 'vitest';
import { VersionParseError } from '../../../src/errors';
import {
  compareVersions,
  decideUpdate,
  isNewerVersion,
  normalizeTag,
  parseVersion,
  tryParseVersion,
} from '../../../src/updater/version-checker';

describe('version-checker', () => {
  describe('normalizeTag', () => {
    it('strips a leading v marker', () => {
      expect(normalizeTag('v7.4.1')).toBe('7.4.1');
    });

    it('leaves bare versions alone', () => {
      expect(normalizeTag('0.4.18')).toBe('0.4.18');
    });

    it('trims whitespace', () => {
      expect(normalizeTag('  v1.2.3 ')).toBe('1.2.3');
    });
  });

  describe('parseVersion', () => {
    it('parses major.minor.patch', () => {
      const v = parseVersion('7.4.1');
      expect([v.major, v.minor, v.patch]).toEqual([7, 4, 1]);
    });

    it('keeps the prerelease part', () => {
      expect(parseVersion('7.5.0-preview.2').prerelease).toEqual(['preview', 2]);
    });

    it.each(['7.4', 'latest', '', '1.2.3.4', 'x.y.z', 'PowerShell', 'v7.4.1', '=7.4.1'])(
      'rejects %j with VersionParseError',
      (input) => {
        expect(() => parseVersion(input)).toThrow(VersionParseError);
      }
    );

    it('never defaults to 0.0.0', () => {
      expect(tryParseVersion('garbage')).toBeNull();
    });
  });

  describe('compareVersions', () => {
    const pairs: [string, string][] = [
      ['7.3.0', '7.4.1'],
      ['0.4.9', '0.4.18'],
      ['1.9.9', '2.0.0'],
      ['7.5.0-preview.2', '7.5.0'],
    ];

    it.each(pairs)('orders %s below %s and is antisymmetric', (low, high) => {
      const a = parseVersion(low);
      const b = parseVersion(high);
      expect(compareVersions(a, b)).toBe(-1);
      expect(compareVersions(b, a)).toBe(1);
    });

    it('is reflexive', () => {
      expect(compareVersions(parseVersion('7.4.1'), parseVersion('7.4.1'))).toBe(0);
    });

    it('compares numerically, not lexically', () => {
      expect(isNewerVersion(parseVersion('0.10.0'), parseVersion('0.9.0'))).toBe(true);
    });
  });

  describe('decideUpdate', () => {
    const latest = parseVersion('7.4.1');

    it('reports no local install when nothing was probed', () => {
      expect(decideUpdate(null, latest).kind).toBe('no-local-install');
    });

    it('reports an update when the release is strictly newer', () => {
      const decision = decideUpdate(parseVersion('7.3.0'), latest);
      expect(decision.kind).toBe('update-available');
    });

    it('treats equal versions as up to date', () => {
      expect(decideUpdate(parseVersion('7.4.1'), latest).kind).toBe('up-to-date');
    });

    it('treats a newer local version as up to date', () => {
      expect(decideUpdate(parseVersion('7.5.0'), latest).kind).toBe('up-to-date');
    });
  });
});
