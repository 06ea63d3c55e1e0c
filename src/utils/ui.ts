/**
 * Central UI Abstraction Layer
 *
 * Provides semantic, TTY-aware styling for CLI output.
 * Wraps chalk and cli-table3 with a consistent API.
 *
 * Constraints:
 * - NO EMOJIS (ASCII only: [OK], [X], [!], [i])
 * - TTY-aware (plain text in pipes/CI)
 * - Respects NO_COLOR environment variable
 *
 * @module utils/ui
 */

import chalk from 'chalk';
import Table from 'cli-table3';

export type SemanticColor =
  | 'success'
  | 'error'
  | 'warning'
  | 'info'
  | 'dim'
  | 'primary'
  | 'secondary'
  | 'command'
  | 'path';

interface BoxOptions {
  title?: string;
  padding?: number;
}

interface TableOptions {
  head?: string[];
  colWidths?: number[];
  style?: 'unicode' | 'ascii';
}

// =============================================================================
// COLOR PALETTE
// =============================================================================

const COLORS = {
  primary: '#00ECFA',
  secondary: '#0099FF',
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

// =============================================================================
// COLOR SYSTEM
// =============================================================================

/**
 * Apply semantic color to text
 */
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
    case 'dim':
      return chalk.gray(text);
    case 'primary':
      return chalk.hex(COLORS.primary).bold(text);
    case 'secondary':
      return chalk.hex(COLORS.secondary)(text);
    case 'command':
      return chalk.yellow.bold(text);
    case 'path':
      return chalk.cyan.underline(text);
  }
}

export function dim(text: string): string {
  return useColors() ? chalk.dim(text) : text;
}

// =============================================================================
// STATUS INDICATORS (ASCII only - NO EMOJIS)
// =============================================================================

/** Success indicator: [OK] */
export function ok(message: string): string {
  return `${color('[OK]', 'success')} ${message}`;
}

/** Error indicator: [X] */
export function fail(message: string): string {
  return `${color('[X]', 'error')} ${message}`;
}

/** Warning indicator: [!] */
export function warn(message: string): string {
  return `${color('[!]', 'warning')} ${message}`;
}

/** Info indicator: [i] */
export function info(message: string): string {
  return `${color('[i]', 'info')} ${message}`;
}

// =============================================================================
// BOX RENDERING
// =============================================================================

/**
 * ASCII box renderer
 */
export function box(content: string, options: BoxOptions = {}): string {
  const lines = content.split('\n');
  const maxLen = Math.max(...lines.map((l) => l.length), (options.title?.length || 0) + 4);
  const width = maxLen + 4;
  const padding = options.padding ?? 1;

  let result = '';

  if (options.title) {
    const titlePad = Math.floor((width - options.title.length - 4) / 2);
    result +=
      '+' +
      '-'.repeat(titlePad) +
      ' ' +
      options.title +
      ' ' +
      '-'.repeat(width - titlePad - options.title.length - 4) +
      '+\n';
  } else {
    result += '+' + '-'.repeat(width - 2) + '+\n';
  }

  for (let i = 0; i < padding; i++) {
    result += '|' + ' '.repeat(width - 2) + '|\n';
  }

  for (const line of lines) {
    const pad = width - line.length - 4;
    result += '| ' + line + ' '.repeat(Math.max(0, pad)) + ' |\n';
  }

  for (let i = 0; i < padding; i++) {
    result += '|' + ' '.repeat(width - 2) + '|\n';
  }

  result += '+' + '-'.repeat(width - 2) + '+';
  return result;
}

// =============================================================================
// TABLE RENDERING
// =============================================================================

const ASCII_CHARS = {
  top: '-',
  'top-mid': '+',
  'top-left': '+',
  'top-right': '+',
  bottom: '-',
  'bottom-mid': '+',
  'bottom-left': '+',
  'bottom-right': '+',
  left: '|',
  'left-mid': '+',
  mid: '-',
  'mid-mid': '+',
  right: '|',
  'right-mid': '+',
  middle: '|',
};

/**
 * Create styled table
 */
export function table(rows: string[][], options: TableOptions = {}): string {
  const plain = !useColors();
  const useAscii = options.style === 'ascii' || plain;
  const instance = new Table({
    wordWrap: true,
    ...(useAscii ? { chars: ASCII_CHARS } : {}),
    ...(plain ? { style: { head: [], border: [] } } : {}),
    // cli-table3 requires head length to match rows
    ...(options.head && options.head.length > 0
      ? { head: options.head.map((h) => color(h, 'primary')) }
      : {}),
    ...(options.colWidths ? { colWidths: options.colWidths } : {}),
  });

  rows.forEach((row) => instance.push(row));
  return instance.toString();
}

// =============================================================================
// SECTION HEADERS
// =============================================================================

export function header(text: string): string {
  if (useColors()) {
    return chalk.hex(COLORS.primary).bold(text);
  }
  return text;
}

export function subheader(text: string): string {
  return color(text, 'primary');
}

/**
 * Section header with === borders
 */
export function sectionHeader(title: string): string {
  const headerText = `=== ${title} ===`;
  if (useColors()) {
    return chalk.hex(COLORS.primary).bold(headerText);
  }
  return headerText;
}
