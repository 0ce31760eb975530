/**
 * CLI dispatcher: parse -> config -> update, mapping failures to exit codes.
 */

import { handleHelpCommand } from './commands/help-command';
import { handleUpdateCommand, parseUpdateArgs } from './commands/update-command';
import { loadRuntimeConfig } from './config/runtime-config';
import { handleError } from './errors';
import type { UpdateDependencies } from './updater/types';
import { getVersion } from './utils/version';

export interface CliOptions {
  env?: NodeJS.ProcessEnv;
  cwd?: string;
  /** Replaces the network and process backed capabilities */
  deps?: UpdateDependencies;
}

/**
 * Run toolfetch with the given arguments; resolves to the exit code.
 */
export async function runCli(argv: string[], options: CliOptions = {}): Promise<number> {
  let verbose = false;

  try {
    const args = parseUpdateArgs(argv);
    verbose = args.verbose;

    if (args.help) {
      handleHelpCommand();
      return 0;
    }
    if (args.version) {
      console.log(getVersion());
      return 0;
    }

    const config = loadRuntimeConfig(
      { output: args.output, verbose: args.verbose },
      options.env ?? process.env,
      options.cwd ?? process.cwd()
    );
    verbose = config.verbose;

    await handleUpdateCommand(config, options.deps);
    return 0;
  } catch (error) {
    return handleError(error, verbose);
  }
}
