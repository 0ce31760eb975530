/**
 * Central UI Abstraction Layer
 *
 * Provides semantic, TTY-aware styling for CLI output.
 * Wraps chalk, boxen, cli-table3, ora with consistent API.
 *
 * Constraints:
 * - NO EMOJIS (ASCII only: [OK], [X], [!], [i])
 * - TTY-aware (plain text in pipes/CI)
 * - Respects NO_COLOR environment variable
 *
 * @module utils/ui
 */

import boxen from 'boxen';
import chalk from 'chalk';
import Table from 'cli-table3';
import ora from 'ora';
import type { BoxOptions, SemanticColor, SpinnerController, TableOptions } from '../types/utils';

const COLORS = {
  primary: '#00ECFA', // Bright cyan
} as const;

// =============================================================================
// TTY & COLOR DETECTION
// =============================================================================

/**
 * Check if colors should be used
 * Respects NO_COLOR and FORCE_COLOR environment variables
 */
function useColors(): boolean {
  if (process.env.FORCE_COLOR) return true;
  if (process.env.NO_COLOR) return false;
  return !!process.stdout.isTTY;
}

/**
 * Check if interactive mode (TTY + not CI)
 */
export function isInteractive(): boolean {
  return !!process.stdout.isTTY && !process.env.CI && !process.env.NO_COLOR;
}

// =============================================================================
// COLOR SYSTEM
// =============================================================================

export function color(text: string, semantic: SemanticColor): string {
  if (!useColors()) return text;

  switch (semantic) {
    case 'success':
      return chalk.green.bold(text);
    case 'error':
      return chalk.red.bold(text);
    case 'warning':
      return chalk.yellow(text);
    case 'info':
      return chalk.cyan(text);
    case 'primary':
      return chalk.hex(COLORS.primary).bold(text);
    case 'command':
      return chalk.yellow.bold(text);
    case 'path':
      return chalk.cyan.underline(text);
    default:
      return text;
  }
}

export function bold(text: string): string {
  if (!useColors()) return text;
  return chalk.bold(text);
}

// =============================================================================
// STATUS INDICATORS (ASCII only - NO EMOJIS)
// =============================================================================

export function ok(message: string): string {
  return `${color('[OK]', 'success')} ${message}`;
}

export function fail(message: string): string {
  return `${color('[X]', 'error')} ${message}`;
}

export function warn(message: string): string {
  return `${color('[!]', 'warning')} ${message}`;
}

export function info(message: string): string {
  return `${color('[i]', 'info')} ${message}`;
}

// =============================================================================
// BOX RENDERING
// =============================================================================

/**
 * Plain ASCII box renderer for non-color output
 */
function renderAsciiBox(content: string, options: BoxOptions): string {
  const lines = content.split('\n');
  const maxLen = Math.max(...lines.map((l) => l.length), (options.title?.length ?? 0) + 4);
  const width = maxLen + 4;
  const padding = options.padding ?? 1;
  const out: string[] = [];

  if (options.title) {
    const titlePad = Math.floor((width - options.title.length - 4) / 2);
    out.push(
      '+' +
        '-'.repeat(titlePad) +
        ' ' +
        options.title +
        ' ' +
        '-'.repeat(width - titlePad - options.title.length - 4) +
        '+'
    );
  } else {
    out.push('+' + '-'.repeat(width - 2) + '+');
  }

  for (let i = 0; i < padding; i++) out.push('|' + ' '.repeat(width - 2) + '|');
  for (const line of lines) {
    out.push('| ' + line + ' '.repeat(Math.max(0, width - line.length - 4)) + ' |');
  }
  for (let i = 0; i < padding; i++) out.push('|' + ' '.repeat(width - 2) + '|');

  out.push('+' + '-'.repeat(width - 2) + '+');
  return out.join('\n');
}

export function box(content: string, options: BoxOptions = {}): string {
  if (!useColors()) {
    return renderAsciiBox(content, options);
  }

  return boxen(content, {
    padding: options.padding ?? 1,
    margin: options.margin ?? 0,
    borderStyle: options.borderStyle || 'round',
    borderColor: options.borderColor || COLORS.primary,
    title: options.title,
    titleAlignment: 'center',
  });
}

/**
 * Render error box (red border)
 */
export function errorBox(content: string, title = 'ERROR'): string {
  return box(content, {
    title,
    borderColor: 'red',
    borderStyle: 'round',
    padding: 1,
    margin: 1,
  });
}

// =============================================================================
// TABLE RENDERING
// =============================================================================

export function table(rows: string[][], options: TableOptions = {}): string {
  const tableInstance = new Table(
    // cli-table3 requires head length to match rows
    options.head && options.head.length > 0
      ? { head: options.head.map((h) => color(h, 'primary')) }
      : {}
  );

  rows.forEach((row) => tableInstance.push(row));
  return tableInstance.toString();
}

// =============================================================================
// SPINNER
// =============================================================================

/**
 * Create and start a spinner
 * Falls back to plain text output in non-TTY environments
 */
export function spinner(text: string): SpinnerController {
  if (isInteractive()) {
    const s = ora({ text, color: 'cyan' }).start();
    return {
      fail: (msg?: string) => s.fail(msg || text),
      stop: () => s.stop(),
    };
  }

  console.log(`[i] ${text}...`);
  return {
    fail: (msg?: string) => console.log(fail(msg || text)),
    stop: () => {
      /* no-op */
    },
  };
}

export function header(text: string): string {
  return color(text, 'primary');
}
