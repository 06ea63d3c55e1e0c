/**
 * Streaming Command Handlers
 *
 * mihomo-manager logs [--level L] [--filter S]
 * mihomo-manager traffic
 * mihomo-manager memory [--watch]
 *
 * Streams run until the signal aborts (Ctrl-C) or the subscription fails.
 */

import { color, dim, SemanticColor } from '../utils/ui';
import { formatBytes, formatRate } from '../utils/format';
import { ValidationError } from '../errors';
import { LOG_LEVELS, LogEntry, LogLevel, isLogLevel } from '../client/types';
import { CommandContext } from './command-context';
import { assertNoUnknownFlags, extractFlag, requireOptionValue } from './arg-extractor';

const LEVEL_COLORS: Record<LogLevel, SemanticColor> = {
  debug: 'dim',
  info: 'info',
  warning: 'warning',
  error: 'error',
};

export function formatLogEntry(entry: LogEntry): string {
  const label = entry.type.toUpperCase().padEnd(7);
  return `${color(label, LEVEL_COLORS[entry.type])} ${entry.payload}`;
}

export async function handleLogsCommand(
  ctx: CommandContext,
  args: string[],
  signal?: AbortSignal
): Promise<void> {
  const level = requireOptionValue(args, ['--level', '-l']);
  const filter = requireOptionValue(level.remainingArgs, ['--filter']);
  assertNoUnknownFlags(filter.remainingArgs, 'logs');

  const levelValue = level.value?.toLowerCase() ?? 'info';
  if (!isLogLevel(levelValue)) {
    throw new ValidationError(`--level must be one of ${LOG_LEVELS.join(', ')}, got ${level.value}`, {
      key: '--level',
    });
  }

  const client = await ctx.client();
  const subscription = client.subscribeLogs({ level: levelValue, filter: filter.value, signal });
  for await (const entry of subscription) {
    console.log(formatLogEntry(entry));
  }
}

export async function handleTrafficCommand(
  ctx: CommandContext,
  args: string[],
  signal?: AbortSignal
): Promise<void> {
  assertNoUnknownFlags(args, 'traffic');
  const client = await ctx.client();
  for await (const sample of client.subscribeTraffic({ signal })) {
    console.log(`${dim('up')} ${formatRate(sample.up).padStart(12)}  ${dim('down')} ${formatRate(sample.down).padStart(12)}`);
  }
}

export async function handleMemoryCommand(
  ctx: CommandContext,
  args: string[],
  signal?: AbortSignal
): Promise<void> {
  const watch = extractFlag(args, ['--watch', '-w']);
  assertNoUnknownFlags(watch.remainingArgs, 'memory');
  const client = await ctx.client();

  if (!watch.found) {
    const sample = await client.getMemory({ signal });
    console.log(formatMemory(sample.inuse, sample.oslimit));
    return;
  }
  for await (const sample of client.subscribeMemory({ signal })) {
    console.log(formatMemory(sample.inuse, sample.oslimit));
  }
}

export function formatMemory(inuse: number, oslimit: number): string {
  const limit = oslimit > 0 ? ` / ${formatBytes(oslimit)}` : '';
  return `${dim('memory')} ${formatBytes(inuse)}${limit}`;
}
