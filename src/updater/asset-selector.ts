/**
 * Asset Selector
 * Picks the release asset for this platform out of everything a release ships.
 */

import { AssetNotFoundError } from '../errors';
import type { ReleaseAsset, ReleaseInfo, ToolDescriptor } from './types';

/**
 * First asset, in registry order, whose name satisfies the predicate.
 * Returns null when nothing matches.
 */
export function findAsset(
  assets: readonly ReleaseAsset[],
  predicate: (assetName: string) => boolean
): ReleaseAsset | null {
  return assets.find((asset) => predicate(asset.name)) ?? null;
}

/**
 * Select the tool's asset from a release
 * @throws AssetNotFoundError when no asset matches
 */
export function selectAsset(tool: ToolDescriptor, release: ReleaseInfo): ReleaseAsset {
  const asset = findAsset(release.assets, tool.matchesAsset);
  if (!asset) {
    throw new AssetNotFoundError(
      tool.displayName,
      release.tagName,
      release.assets.map((a) => a.name)
    );
  }
  return asset;
}
