/**
 * Proxy Selection
 *
 * Concurrent delay testing of many proxies and automatic selection of the
 * fastest member of a selector group, on top of testDelay/switchProxy.
 */

import { NotFoundError, ValidationError, toManagerError, ManagerError } from '../errors';
import { createLogger } from '../utils/logger';
import { ControlPlaneClient } from './control-plane-client';

const log = createLogger('proxy');

export const DEFAULT_BATCH_CONCURRENCY = 10;
export const DEFAULT_MAX_DELAY_MS = 1000;

/** Outcome of one delay test; a measured delay of 0 means the proxy timed out */
export type DelayResult =
  | { name: string; status: 'ok'; delay: number }
  | { name: string; status: 'timeout' }
  | { name: string; status: 'error'; error: ManagerError };

export interface BatchTestOptions {
  url?: string;
  /** Per-proxy test timeout in ms */
  timeoutMs?: number;
  /** Tests in flight at once (default: 10) */
  concurrency?: number;
  signal?: AbortSignal;
}

export interface AutoSelectOptions extends BatchTestOptions {
  /** Members slower than this are not selected (default: 1000) */
  maxDelayMs?: number;
}

export interface AutoSelectResult {
  group: string;
  /** Chosen member, or null when none answered within maxDelayMs */
  selected: string | null;
  delay: number | null;
  /** Previously selected member */
  previous: string | null;
  results: DelayResult[];
}

/**
 * Apply fn to every item with at most `concurrency` calls in flight.
 * Results keep the order of the items.
 */
async function mapLimited<T, R>(
  items: readonly T[],
  fn: (item: T) => Promise<R>,
  concurrency: number
): Promise<R[]> {
  const results = new Array<R>(items.length);
  let next = 0;
  const worker = async (): Promise<void> => {
    while (next < items.length) {
      const index = next++;
      results[index] = await fn(items[index]);
    }
  };
  const workers = Math.max(1, Math.min(concurrency, items.length));
  await Promise.all(Array.from({ length: workers }, worker));
  return results;
}

/** Fastest first, then timeouts, then errors; ties keep their order */
function rank(result: DelayResult): number {
  if (result.status === 'ok') return result.delay;
  return result.status === 'timeout' ? Number.MAX_SAFE_INTEGER - 1 : Number.MAX_SAFE_INTEGER;
}

export function sortDelayResults(results: readonly DelayResult[]): DelayResult[] {
  return [...results].sort((a, b) => rank(a) - rank(b));
}

/**
 * Test the delay of every named proxy with bounded concurrency.
 * Individual failures are reported in the results; cancellation rejects.
 */
export async function batchTestDelays(
  client: ControlPlaneClient,
  names: readonly string[],
  options: BatchTestOptions = {}
): Promise<DelayResult[]> {
  const concurrency = options.concurrency ?? DEFAULT_BATCH_CONCURRENCY;
  if (!Number.isInteger(concurrency) || concurrency < 1) {
    throw new ValidationError(`Concurrency must be a positive integer, got ${concurrency}`, {
      key: 'concurrency',
    });
  }

  const results = await mapLimited(
    names,
    async (name): Promise<DelayResult> => {
      try {
        const delay = await client.testDelay(name, {
          url: options.url,
          timeoutMs: options.timeoutMs,
          signal: options.signal,
        });
        return delay > 0 ? { name, status: 'ok', delay } : { name, status: 'timeout' };
      } catch (error) {
        if (options.signal?.aborted) throw error;
        const managed = toManagerError(error, 'network');
        log.debug(`Delay test of ${name} failed: ${managed.message}`);
        return { name, status: 'error', error: managed };
      }
    },
    concurrency
  );
  return sortDelayResults(results);
}

/**
 * Test every member of a selector group and switch it to the fastest member
 * that answered within maxDelayMs. The group is left alone when none did.
 */
export async function autoSelectFastest(
  client: ControlPlaneClient,
  group: string,
  options: AutoSelectOptions = {}
): Promise<AutoSelectResult> {
  const maxDelay = options.maxDelayMs ?? DEFAULT_MAX_DELAY_MS;
  const groups = await client.getProxyGroups({ signal: options.signal });
  const target = groups.find((g) => g.name === group);
  if (!target) {
    throw new NotFoundError(`Proxy group ${group} does not exist`);
  }
  if (target.all.length === 0) {
    throw new ValidationError(`Proxy group ${group} has no members`, { key: group });
  }

  const results = await batchTestDelays(client, target.all, options);
  const best = results.find(
    (r): r is Extract<DelayResult, { status: 'ok' }> => r.status === 'ok' && r.delay <= maxDelay
  );
  const previous = target.now || null;

  if (!best) {
    return { group, selected: null, delay: null, previous, results };
  }
  if (best.name !== previous) {
    await client.switchProxy(group, best.name, { signal: options.signal });
    log.debug(`${group}: ${previous ?? '(none)'} -> ${best.name} (${best.delay} ms)`);
  }
  return { group, selected: best.name, delay: best.delay, previous, results };
}
