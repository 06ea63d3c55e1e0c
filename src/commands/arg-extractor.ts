/**
 * Small helpers for consistent CLI option extraction.
 */

import { ValidationError } from '../errors';

export interface ExtractedOption {
  found: boolean;
  value?: string;
  missingValue: boolean;
  remainingArgs: string[];
}

export interface ExtractedFlag {
  found: boolean;
  remainingArgs: string[];
}

export interface GlobalOptions {
  home?: string;
  verbose: boolean;
  /** Arguments left once the global options are consumed */
  args: string[];
}

function findInlineOption(arg: string, flag: string): string | undefined {
  const prefix = `${flag}=`;
  return arg.startsWith(prefix) ? arg.slice(prefix.length) : undefined;
}

/**
 * Extract a single-value option and remove it from args.
 * Supports `--flag value` and `--flag=value` forms.
 */
export function extractOption(args: string[], flags: readonly string[]): ExtractedOption {
  const remaining = [...args];

  for (let i = 0; i < remaining.length; i++) {
    const token = remaining[i];

    for (const flag of flags) {
      if (token === flag) {
        const next = remaining[i + 1];
        if (!next || next.startsWith('-')) {
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

/**
 * Like extractOption, but a flag without a value is a ValidationError.
 */
export function requireOptionValue(
  args: string[],
  flags: readonly string[]
): { value?: string; remainingArgs: string[] } {
  const result = extractOption(args, flags);
  if (result.missingValue) {
    throw new ValidationError(`${flags[0]} requires a value`, { key: flags[0] });
  }
  return { value: result.value, remainingArgs: result.remainingArgs };
}

/** Remove every occurrence of the given boolean flags */
export function extractFlag(args: string[], flags: readonly string[]): ExtractedFlag {
  const remaining = args.filter((arg) => !flags.includes(arg));
  return { found: remaining.length !== args.length, remainingArgs: remaining };
}

/** Returns true if any of the provided boolean flags are present. */
export function hasAnyFlag(args: string[], flags: readonly string[]): boolean {
  const truthyValues = new Set(['1', 'true', 'yes', 'on']);
  return args.some((arg) =>
    flags.some((flag) => {
      if (arg === flag) return true;
      const value = findInlineOption(arg, flag);
      return value !== undefined && truthyValues.has(value.trim().toLowerCase());
    })
  );
}

/**
 * Consume --home and --verbose wherever they appear.
 */
export function extractGlobalOptions(argv: string[]): GlobalOptions {
  const home = requireOptionValue(argv, ['--home']);
  const verbose = extractFlag(home.remainingArgs, ['--verbose']);
  return { home: home.value, verbose: verbose.found, args: verbose.remainingArgs };
}

/**
 * Positional argument at index, or a ValidationError naming it.
 */
export function requirePositional(args: string[], index: number, name: string): string {
  const value = args[index];
  if (value === undefined || value.startsWith('-')) {
    throw new ValidationError(`Missing argument <${name}>`, { key: name });
  }
  return value;
}

/**
 * Reject flags the command does not know.
 */
export function assertNoUnknownFlags(args: string[], command: string): void {
  const unknown = args.find((arg) => arg.startsWith('-'));
  if (unknown) {
    throw new ValidationError(`Unknown option ${unknown} for ${command}`, { key: unknown });
  }
}
