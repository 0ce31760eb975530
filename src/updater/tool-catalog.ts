/**
 * Managed tool catalog
 *
 * The set of tools is fixed. Each entry carries its registry location, the
 * pattern that pulls the version out of `--version` output, and the asset
 * name predicate for Windows x64.
 */

import type { ToolDescriptor, ToolId } from './types';

/** PowerShell publishes win/linux/osx zips, arm variants and symbol packages */
export function matchesPowerShellAsset(assetName: string): boolean {
  const name = assetName.toLowerCase();
  return (
    name.includes('win') &&
    name.includes('x64') &&
    name.endsWith('.zip') &&
    !name.includes('symbols') &&
    !name.includes('arm')
  );
}

/** uv names its assets by target triple, e.g. uv-x86_64-pc-windows-msvc.zip */
export function matchesUvAsset(assetName: string): boolean {
  const name = assetName.toLowerCase();
  return name.includes('windows') && name.includes('x86_64') && name.endsWith('.zip');
}

export const TOOL_CATALOG: Readonly<Record<ToolId, ToolDescriptor>> = {
  powershell: {
    id: 'powershell',
    displayName: 'PowerShell',
    repository: 'PowerShell/PowerShell',
    executable: 'pwsh.exe',
    subdirectory: 'pwsh',
    versionPattern: /PowerShell ([\d.]+)/,
    matchesAsset: matchesPowerShellAsset,
  },
  uv: {
    id: 'uv',
    displayName: 'UV',
    repository: 'astral-sh/uv',
    executable: 'uv.exe',
    subdirectory: 'uv',
    versionPattern: /uv ([\d.]+)/,
    matchesAsset: matchesUvAsset,
  },
};

/** Processing order */
export const TOOL_IDS: readonly ToolId[] = ['powershell', 'uv'];

export function getTool(id: ToolId): ToolDescriptor {
  return TOOL_CATALOG[id];
}

export function isToolId(value: string): value is ToolId {
  return TOOL_IDS.some((id) => id === value);
}
