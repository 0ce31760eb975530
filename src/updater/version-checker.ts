/**
 * Version Checker
 * Parses release tags and tool output into semantic versions and decides
 * whether an installed tool is behind the latest release.
 */

import * as semver from 'semver';
import { VersionParseError } from '../errors';
import type { SemanticVersion, UpdateDecision } from './types';

export type VersionOrder = -1 | 0 | 1;

/**
 * Strip the leading version marker from a release tag ("v7.4.1" -> "7.4.1")
 */
export function normalizeTag(tag: string): string {
  return tag.trim().replace(/^v/i, '');
}

/**
 * Parse a dot-separated numeric version (major.minor.patch[-prerelease])
 * @throws VersionParseError for anything else, including "7.4", "v7.4.1" and ""
 */
export function parseVersion(text: string): SemanticVersion {
  const trimmed = text.trim();
  // semver.parse also takes "v1.2.3" and "=1.2.3"; prefixes are normalizeTag's job
  const parsed = /^\d/.test(trimmed) ? semver.parse(trimmed) : null;
  if (!parsed) {
    throw new VersionParseError(text);
  }
  return parsed;
}

export function tryParseVersion(text: string): SemanticVersion | null {
  try {
    return parseVersion(text);
  } catch {
    return null;
  }
}

export function compareVersions(a: SemanticVersion, b: SemanticVersion): VersionOrder {
  return semver.compare(a, b);
}

export function isNewerVersion(candidate: SemanticVersion, current: SemanticVersion): boolean {
  return compareVersions(candidate, current) > 0;
}

/**
 * Equal versions are up to date; only a strictly newer release is an update.
 */
export function decideUpdate(
  installed: SemanticVersion | null,
  latest: SemanticVersion
): UpdateDecision {
  if (!installed) {
    return { kind: 'no-local-install', latest };
  }
  if (isNewerVersion(latest, installed)) {
    return { kind: 'update-available', installed, latest };
  }
  return { kind: 'up-to-date', installed, latest };
}
