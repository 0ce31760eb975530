/**
 * Update Command Handler
 *
 * Default command: checks every managed tool and installs what is missing
 * or outdated under the output directory.
 */

import type { RuntimeConfig } from '../config/runtime-config';
import { UsageError } from '../errors';
import { HttpAssetDownloader } from '../updater/downloader';
import { updateTools } from '../updater/lifecycle';
import { GitHubReleaseSource } from '../updater/release-source';
import { TOOL_CATALOG, TOOL_IDS } from '../updater/tool-catalog';
import type {
  ExtractionSummary,
  ReleaseAsset,
  ToolDescriptor,
  ToolUpdateResult,
  UpdateDecision,
  UpdateDependencies,
  UpdateReporter,
} from '../updater/types';
import { ProcessVersionProbe } from '../updater/version-probe';
import { TransferProgress } from '../utils/progress-indicator';
import { color, info, ok, spinner, table, warn } from '../utils/ui';
import type { SpinnerController } from '../types/utils';
import { extractFlag, extractOption } from './arg-extractor';

export interface UpdateArgs {
  output?: string;
  verbose: boolean;
  help: boolean;
  version: boolean;
}

/**
 * Parse `toolfetch [-o|--output <dir>] [-v|--verbose] [-h|--help] [--version] [dir]`
 * @throws UsageError on unknown flags, a missing --output value or extra arguments
 */
export function parseUpdateArgs(argv: string[]): UpdateArgs {
  const help = extractFlag(argv, ['-h', '--help']);
  const version = extractFlag(help.remainingArgs, ['--version']);
  const verbose = extractFlag(version.remainingArgs, ['-v', '--verbose']);
  const output = extractOption(verbose.remainingArgs, ['-o', '--output']);

  if (output.missingValue) {
    throw new UsageError('--output requires a directory');
  }

  const unknown = output.remainingArgs.find((arg) => arg.startsWith('-'));
  if (unknown) {
    throw new UsageError(`Unknown option: ${unknown}`);
  }

  const positional = output.remainingArgs;
  if (positional.length > 1 || (positional.length === 1 && output.found)) {
    throw new UsageError(`Unexpected argument: ${positional[positional.length - 1]}`);
  }

  return {
    output: output.value ?? positional[0],
    verbose: verbose.found,
    help: help.found,
    version: version.found,
  };
}

function describeDecision(decision: UpdateDecision): string[] {
  switch (decision.kind) {
    case 'no-local-install':
      return [
        warn('Not installed or version check failed.'),
        info(`Latest version: ${decision.latest.version}`),
      ];
    case 'up-to-date':
      return [
        info(`Installed version: ${decision.installed.version}`),
        info(`Latest version: ${decision.latest.version}`),
      ];
    case 'update-available':
      return [
        info(`Installed version: ${decision.installed.version}`),
        info(`Latest version: ${decision.latest.version}`),
        info('Update available!'),
      ];
  }
}

/**
 * Prints pipeline events: a spinner around the release lookup, progress
 * bars for the download and the extraction.
 */
export class ConsoleReporter implements UpdateReporter {
  private lookup: SpinnerController | null = null;
  private progress: TransferProgress | null = null;

  checking(tool: ToolDescriptor): void {
    console.log('');
    console.log(info(`Checking ${tool.displayName} installation...`));
    this.lookup = spinner(`Looking up latest ${tool.displayName} release`);
  }

  decided(tool: ToolDescriptor, decision: UpdateDecision): void {
    this.lookup?.stop();
    this.lookup = null;
    describeDecision(decision).forEach((line) => console.log(line));
    if (decision.kind === 'up-to-date') {
      console.log(ok(`${tool.displayName} is up to date!`));
    }
  }

  downloadStarted(tool: ToolDescriptor, asset: ReleaseAsset): void {
    console.log(info(`Downloading ${color(asset.name, 'path')}`));
    this.progress = new TransferProgress(`Downloading ${tool.displayName}`);
    this.progress.start(asset.size ?? 0);
  }

  downloadProgress(_tool: ToolDescriptor, done: number, total: number): void {
    this.progress?.update(done, total);
  }

  downloadFinished(tool: ToolDescriptor): void {
    this.progress?.finish(`Downloaded ${tool.displayName}`);
    this.progress = null;
  }

  extractStarted(tool: ToolDescriptor, entryCount: number): void {
    this.progress = new TransferProgress(`Extracting ${tool.displayName}`, { unit: 'items' });
    this.progress.start(entryCount);
  }

  extractProgress(_tool: ToolDescriptor, done: number, total: number): void {
    this.progress?.update(done, total);
  }

  extractFinished(tool: ToolDescriptor, summary: ExtractionSummary): void {
    this.progress?.finish(`Extracted ${tool.displayName}`);
    this.progress = null;
    if (summary.skipped.length > 0) {
      console.log(
        warn(`Skipped ${summary.skipped.length} archive entries outside the target directory`)
      );
    }
  }

  failed(tool: ToolDescriptor): void {
    this.lookup?.fail(`${tool.displayName} update failed`);
    this.lookup = null;
    this.progress?.fail(`${tool.displayName} update failed`);
    this.progress = null;
  }
}

export function createDependencies(config: RuntimeConfig): UpdateDependencies {
  return {
    releases: new GitHubReleaseSource({
      apiBaseUrl: config.apiBaseUrl,
      userAgent: config.userAgent,
      token: config.token,
      timeout: config.timeoutMs,
      verbose: config.verbose,
    }),
    probe: new ProcessVersionProbe(config.verbose),
    downloader: new HttpAssetDownloader({
      userAgent: config.userAgent,
      timeout: config.timeoutMs,
    }),
    reporter: new ConsoleReporter(),
    verbose: config.verbose,
  };
}

export function renderSummary(results: readonly ToolUpdateResult[]): string {
  const rows = results.map((result) => {
    const tool = TOOL_CATALOG[result.tool];
    const version =
      result.decision.kind === 'up-to-date'
        ? result.decision.installed.version
        : result.decision.latest.version;
    return [tool.displayName, version, result.executablePath];
  });
  return table(rows, { head: ['Tool', 'Version', 'Path'] });
}

/**
 * Run the update over all managed tools; the first failure rejects.
 */
export async function handleUpdateCommand(
  config: RuntimeConfig,
  deps: UpdateDependencies = createDependencies(config)
): Promise<ToolUpdateResult[]> {
  console.log(info(`Output directory: ${color(config.baseDir, 'path')}`));

  const tools = TOOL_IDS.map((id) => TOOL_CATALOG[id]);
  const results = await updateTools(tools, config.baseDir, deps);

  console.log('');
  console.log(ok('All tools are up to date!'));
  console.log(renderSummary(results));
  return results;
}
