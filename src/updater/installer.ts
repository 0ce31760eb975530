/**
 * Tool Installer
 * Downloads a release asset into the tool directory and unpacks it there.
 */

import * as fs from 'fs';
import * as path from 'path';
import { debugLog } from '../utils/debug-log';
import { extractZip } from './zip-extractor';
import type {
  ExtractionSummary,
  ReleaseAsset,
  ToolDescriptor,
  UpdateDependencies,
} from './types';

/** The archive is staged next to the files it will produce */
export function getArchivePath(targetDir: string, asset: ReleaseAsset): string {
  return path.join(targetDir, path.basename(asset.name));
}

/**
 * Download the asset, extract it over targetDir and delete the archive.
 * targetDir must already exist.
 *
 * A failed download leaves nothing behind. A failed extraction keeps the
 * archive and whatever was already written.
 */
export async function downloadAndInstall(
  tool: ToolDescriptor,
  asset: ReleaseAsset,
  targetDir: string,
  deps: Pick<UpdateDependencies, 'downloader' | 'reporter' | 'verbose'>
): Promise<ExtractionSummary> {
  const { downloader, reporter } = deps;
  const verbose = deps.verbose ?? false;
  const archivePath = getArchivePath(targetDir, asset);

  reporter?.downloadStarted?.(tool, asset);
  debugLog(`Downloading ${asset.downloadUrl} -> ${archivePath}`, verbose);
  await downloader.download(asset.downloadUrl, archivePath, (done, total) =>
    reporter?.downloadProgress?.(tool, done, total)
  );
  reporter?.downloadFinished?.(tool, archivePath);

  const summary = await extractZip(archivePath, targetDir, {
    verbose,
    onStart: (count) => reporter?.extractStarted?.(tool, count),
    onProgress: (done, total) => reporter?.extractProgress?.(tool, done, total),
  });
  reporter?.extractFinished?.(tool, summary);

  await fs.promises.rm(archivePath, { force: true });
  debugLog(`Removed archive: ${archivePath}`, verbose);

  return summary;
}
