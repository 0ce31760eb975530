/**
 * Tool Update Lifecycle
 * probe -> resolve -> decide -> select -> download -> extract -> clean up,
 * one tool at a time.
 */

import * as fs from 'fs';
import * as path from 'path';
import { toError } from '../errors';
import { debugLog } from '../utils/debug-log';
import { selectAsset } from './asset-selector';
import { downloadAndInstall } from './installer';
import { decideUpdate, normalizeTag, parseVersion } from './version-checker';
import type { ToolDescriptor, ToolUpdateResult, UpdateDependencies } from './types';

export function getExecutablePath(tool: ToolDescriptor, targetDir: string): string {
  return path.join(targetDir, tool.executable);
}

export function getToolDirectory(tool: ToolDescriptor, baseDir: string): string {
  return path.join(baseDir, tool.subdirectory);
}

/**
 * Bring one tool in targetDir up to the latest release.
 * Registry, asset, download and extraction failures reject; a failed version
 * probe only means "not installed".
 */
export async function updateTool(
  tool: ToolDescriptor,
  targetDir: string,
  deps: UpdateDependencies
): Promise<ToolUpdateResult> {
  const { releases, probe, reporter } = deps;
  const verbose = deps.verbose ?? false;
  const executablePath = getExecutablePath(tool, targetDir);

  try {
    fs.mkdirSync(targetDir, { recursive: true });
    reporter?.checking?.(tool);

    const installed = await probe.probe(executablePath, tool.versionPattern);
    debugLog(`${tool.displayName} installed: ${installed?.version ?? 'none'}`, verbose);

    const release = await releases.fetchLatest(tool.repository);
    const latest = parseVersion(normalizeTag(release.tagName));

    const decision = decideUpdate(installed, latest);
    reporter?.decided?.(tool, decision);

    if (decision.kind === 'up-to-date') {
      return { tool: tool.id, decision, executablePath };
    }

    const asset = selectAsset(tool, release);
    debugLog(`${tool.displayName} asset: ${asset.name}`, verbose);

    const extraction = await downloadAndInstall(tool, asset, targetDir, deps);
    return { tool: tool.id, decision, executablePath, asset, extraction };
  } catch (error) {
    reporter?.failed?.(tool, toError(error));
    throw error;
  }
}

/**
 * Update tools sequentially under baseDir/<subdirectory>.
 * The first failure stops the run; tools before it keep their update.
 */
export async function updateTools(
  tools: readonly ToolDescriptor[],
  baseDir: string,
  deps: UpdateDependencies
): Promise<ToolUpdateResult[]> {
  const results: ToolUpdateResult[] = [];
  for (const tool of tools) {
    results.push(await updateTool(tool, getToolDirectory(tool, baseDir), deps));
  }
  return results;
}
