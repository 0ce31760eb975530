/**
 * Updater Type Definitions
 * Shapes shared by the release lookup, probe, download and extraction steps.
 */

import type { SemVer } from 'semver';

export type SemanticVersion = SemVer;

/** Closed set of managed tools */
export type ToolId = 'powershell' | 'uv';

export interface ToolDescriptor {
  readonly id: ToolId;
  readonly displayName: string;
  /** GitHub owner/repo */
  readonly repository: string;
  readonly executable: string;
  /** Directory under the base output directory */
  readonly subdirectory: string;
  /** Exactly one capture group yielding the version */
  readonly versionPattern: RegExp;
  /** Pure, case-insensitive test over an asset file name */
  readonly matchesAsset: (assetName: string) => boolean;
}

export interface ReleaseAsset {
  readonly name: string;
  readonly downloadUrl: string;
  readonly size?: number;
}

export interface ReleaseInfo {
  readonly tagName: string;
  readonly assets: readonly ReleaseAsset[];
}

export type UpdateDecision =
  | { kind: 'no-local-install'; latest: SemanticVersion }
  | { kind: 'up-to-date'; installed: SemanticVersion; latest: SemanticVersion }
  | { kind: 'update-available'; installed: SemanticVersion; latest: SemanticVersion };

/** Progress callback; total is 0 when the size is unknown */
export type ProgressCallback = (done: number, total: number) => void;

export interface ExtractionSummary {
  files: number;
  directories: number;
  /** Entry names rejected because they would land outside the target */
  skipped: string[];
}

export interface ToolUpdateResult {
  tool: ToolId;
  decision: UpdateDecision;
  executablePath: string;
  asset?: ReleaseAsset;
  extraction?: ExtractionSummary;
}

// =============================================================================
// CAPABILITIES
// =============================================================================

export interface ReleaseSource {
  fetchLatest(repository: string): Promise<ReleaseInfo>;
}

export interface VersionProbe {
  /** Resolves null when the version cannot be determined; never rejects */
  probe(executablePath: string, pattern: RegExp): Promise<SemanticVersion | null>;
}

export interface AssetDownloader {
  download(url: string, destPath: string, onProgress?: ProgressCallback): Promise<void>;
}

/** Receives pipeline events for display */
export interface UpdateReporter {
  checking?(tool: ToolDescriptor): void;
  decided?(tool: ToolDescriptor, decision: UpdateDecision): void;
  downloadStarted?(tool: ToolDescriptor, asset: ReleaseAsset): void;
  downloadProgress?(tool: ToolDescriptor, done: number, total: number): void;
  downloadFinished?(tool: ToolDescriptor, archivePath: string): void;
  extractStarted?(tool: ToolDescriptor, entryCount: number): void;
  extractProgress?(tool: ToolDescriptor, done: number, total: number): void;
  extractFinished?(tool: ToolDescriptor, summary: ExtractionSummary): void;
  failed?(tool: ToolDescriptor, error: Error): void;
}

export interface UpdateDependencies {
  releases: ReleaseSource;
  probe: VersionProbe;
  downloader: AssetDownloader;
  reporter?: UpdateReporter;
  verbose?: boolean;
}
