/**
 * Small helpers for consistent CLI option extraction.
 */

export interface ExtractedOption {
  found: boolean;
  value?: string;
  missingValue: boolean;
  remainingArgs: string[];
}

function findInlineOption(arg: string, flag: string): string | undefined {
  const prefix = `${flag}=`;
  return arg.startsWith(prefix) ? arg.slice(prefix.length) : undefined;
}

/**
 * Extract a single-value option and remove it from args.
 * Supports `--flag value` and `--flag=value` forms; a following token that
 * starts with "-" is not taken as the value.
 */
export function extractOption(args: string[], flags: readonly string[]): ExtractedOption {
  const remaining = [...args];

  for (let i = 0; i < remaining.length; i++) {
    const token = remaining[i];

    for (const flag of flags) {
      if (token === flag) {
        const next = remaining[i + 1];
        if (next === undefined || next === '' || next.startsWith('-')) {
          remaining.splice(i, 1);
          return { found: true, missingValue: true, remainingArgs: remaining };
        }

        remaining.splice(i, 2);
        return { found: true, value: next, missingValue: false, remainingArgs: remaining };
      }

      const inlineValue = findInlineOption(token, flag);
      if (inlineValue !== undefined) {
        remaining.splice(i, 1);
        if (!inlineValue.trim()) {
          return { found: true, missingValue: true, remainingArgs: remaining };
        }
        return { found: true, value: inlineValue, missingValue: false, remainingArgs: remaining };
      }
    }
  }

  return { found: false, missingValue: false, remainingArgs: remaining };
}

/** Remove boolean flags from args, reporting whether any was present */
export function extractFlag(
  args: string[],
  flags: readonly string[]
): { found: boolean; remainingArgs: string[] } {
  const remainingArgs = args.filter((arg) => !flags.includes(arg));
  return { found: remainingArgs.length !== args.length, remainingArgs };
}

/** Truthy environment values: 1, true, yes, on */
export function isTruthy(value: string | undefined): boolean {
  if (value === undefined) return false;
  return ['1', 'true', 'yes', 'on'].includes(value.trim().toLowerCase());
}
