/**
 * Updater Module - Barrel Export
 */

export type {
  AssetDownloader,
  ExtractionSummary,
  ProgressCallback,
  ReleaseAsset,
  ReleaseInfo,
  ReleaseSource,
  SemanticVersion,
  ToolDescriptor,
  ToolId,
  ToolUpdateResult,
  UpdateDecision,
  UpdateDependencies,
  UpdateReporter,
  VersionProbe,
} from './types';

export { TOOL_CATALOG, TOOL_IDS, getTool, isToolId } from './tool-catalog';
export {
  compareVersions,
  decideUpdate,
  isNewerVersion,
  normalizeTag,
  parseVersion,
} from './version-checker';
export { findAsset, selectAsset } from './asset-selector';
export { GitHubReleaseSource, DEFAULT_API_BASE_URL } from './release-source';
export { ProcessVersionProbe } from './version-probe';
export { HttpAssetDownloader } from './downloader';
export { extractZip, resolveEntryPath } from './zip-extractor';
export { downloadAndInstall } from './installer';
export { updateTool, updateTools, getToolDirectory, getExecutablePath } from './lifecycle';
