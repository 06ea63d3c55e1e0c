/**
 * Diagnostic logging.
 *
 * Lines go to stderr with a [mihomo] prefix and only in verbose mode
 * (--verbose flag or MIHOMO_VERBOSE=1). User-facing output goes through ui.ts.
 */

let verboseEnabled = isTruthy(process.env.MIHOMO_VERBOSE);

function isTruthy(value: string | undefined): boolean {
  return value !== undefined && ['1', 'true', 'yes', 'on'].includes(value.trim().toLowerCase());
}

export function setVerbose(enabled: boolean): void {
  verboseEnabled = enabled;
}

export function isVerbose(): boolean {
  return verboseEnabled;
}

export interface Logger {
  debug(message: string): void;
  warn(message: string): void;
}

/**
 * Create a logger for one component, e.g. createLogger('supervisor').
 * Warnings are printed regardless of verbose mode.
 */
export function createLogger(scope: string): Logger {
  return {
    debug(message: string): void {
      if (verboseEnabled) console.error(`[mihomo] ${scope}: ${message}`);
    },
    warn(message: string): void {
      console.error(`[mihomo] ${scope}: ${message}`);
    },
  };
}
