/**
 * Help Command Handler
 */

import { TOOL_CATALOG, TOOL_IDS } from '../updater/tool-catalog';
import { bold, color, header } from '../utils/ui';
import { getVersion } from '../utils/version';

export function getHelpText(): string {
  const tools = TOOL_IDS.map((id) => {
    const tool = TOOL_CATALOG[id];
    const target = `<dir>/${tool.subdirectory}/${tool.executable}`;
    return `  ${tool.displayName.padEnd(12)} ${tool.repository.padEnd(24)} -> ${target}`;
  });

  return [
    header(`toolfetch v${getVersion()}`),
    'Downloads the latest PowerShell and UV for Windows x64',
    '',
    bold('Usage:'),
    `  ${color('toolfetch [options] [dir]', 'command')}`,
    '',
    bold('Options:'),
    '  -o, --output <dir>   Base directory for the tools (default: current directory)',
    '  -v, --verbose        Print diagnostics to stderr',
    '  -h, --help           Show this help',
    '      --version        Show version',
    '',
    bold('Managed tools:'),
    ...tools,
    '',
    bold('Environment:'),
    '  TOOLFETCH_OUTPUT_DIR, TOOLFETCH_VERBOSE, TOOLFETCH_API_URL,',
    '  TOOLFETCH_TIMEOUT_MS, GITHUB_TOKEN',
  ].join('\n');
}

export function handleHelpCommand(): void {
  console.log(getHelpText());
}
