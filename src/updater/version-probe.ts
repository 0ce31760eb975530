/**
 * Installed-Version Probe
 * Runs `<exe> --version` and pulls the version out of its output.
 * Anything short of a clean parse counts as "not installed".
 */

import { execFile } from 'child_process';
import * as fs from 'fs';
import { debugLog } from '../utils/debug-log';
import { tryParseVersion } from './version-checker';
import type { SemanticVersion, VersionProbe } from './types';

export const PROBE_TIMEOUT_MS = 10000;

/**
 * Apply a single-capture-group pattern to tool output and parse the capture
 */
export function extractVersion(output: string, pattern: RegExp): SemanticVersion | null {
  const captured = pattern.exec(output)?.[1];
  return captured ? tryParseVersion(captured) : null;
}

function runVersionCommand(executablePath: string, timeout: number): Promise<string | null> {
  return new Promise((resolve) => {
    execFile(
      executablePath,
      ['--version'],
      { encoding: 'utf8', timeout, windowsHide: true },
      (error, stdout) => {
        // Non-zero exit, launch failure and timeout all land here
        resolve(error ? null : stdout);
      }
    );
  });
}

export class ProcessVersionProbe implements VersionProbe {
  constructor(
    private readonly verbose = false,
    private readonly timeout = PROBE_TIMEOUT_MS
  ) {}

  async probe(executablePath: string, pattern: RegExp): Promise<SemanticVersion | null> {
    if (!fs.existsSync(executablePath)) {
      debugLog(`Not found: ${executablePath}`, this.verbose);
      return null;
    }

    const stdout = await runVersionCommand(executablePath, this.timeout);
    if (stdout === null) {
      debugLog(`Version query failed: ${executablePath}`, this.verbose);
      return null;
    }

    const version = extractVersion(stdout, pattern);
    if (!version) {
      debugLog(`No version in output of ${executablePath}: ${stdout.trim()}`, this.verbose);
    }
    return version;
  }
}
