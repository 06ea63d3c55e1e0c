/**
 * Proxy Command Handlers
 *
 * mihomo-manager proxy list|groups|switch|test|batch-test|auto-select|current
 */

import { color, dim, header, info, ok, table } from '../utils/ui';
import { NotFoundError, ValidationError } from '../errors';
import { ProxyInfo } from '../client/types';
import {
  DEFAULT_MAX_DELAY_MS,
  DelayResult,
  autoSelectFastest,
  batchTestDelays,
} from '../client/proxy-selection';
import { CommandContext } from './command-context';
import { assertNoUnknownFlags, requireOptionValue, requirePositional } from './arg-extractor';

export const PROXY_SUBCOMMANDS = [
  'list',
  'groups',
  'switch',
  'test',
  'batch-test',
  'auto-select',
  'current',
] as const;

/** Most recent delay sample, "-" when untested, "timeout" for 0 */
export function lastDelay(proxy: ProxyInfo): string {
  const last = proxy.history[proxy.history.length - 1];
  if (!last) return '-';
  return last.delay > 0 ? `${last.delay} ms` : 'timeout';
}

export function describeDelay(result: DelayResult): string {
  switch (result.status) {
    case 'ok':
      return `${result.delay} ms`;
    case 'timeout':
      return 'timeout';
    case 'error':
      return `error: ${result.error.message}`;
  }
}

function printDelayTable(results: DelayResult[]): void {
  console.log(table(results.map((r) => [r.name, describeDelay(r)]), { head: ['Name', 'Delay'] }));
}

function parsePositiveInt(value: string, flag: string): number {
  const parsed = parseInt(value, 10);
  if (!Number.isInteger(parsed) || parsed < 1 || String(parsed) !== value.trim()) {
    throw new ValidationError(`${flag} must be a positive integer, got ${value}`, { key: flag });
  }
  return parsed;
}

export async function handleProxyCommand(ctx: CommandContext, args: string[]): Promise<void> {
  const [sub = 'list', ...rest] = args;

  switch (sub) {
    case 'list': {
      assertNoUnknownFlags(rest, 'proxy list');
      const client = await ctx.client();
      const proxies = Object.values(await client.getProxies())
        .filter((p) => !p.all)
        .sort((a, b) => a.name.localeCompare(b.name));
      console.log(header('Proxies'));
      console.log(
        table(
          proxies.map((p) => [p.name, p.type, lastDelay(p)]),
          { head: ['Name', 'Type', 'Delay'] }
        )
      );
      return;
    }
    case 'groups': {
      assertNoUnknownFlags(rest, 'proxy groups');
      const client = await ctx.client();
      const groups = await client.getProxyGroups();
      console.log(header('Proxy groups'));
      console.log(
        table(
          groups.map((g) => [g.name, g.type, g.now || dim('-'), String(g.all.length)]),
          { head: ['Group', 'Type', 'Selected', 'Members'] }
        )
      );
      return;
    }
    case 'switch': {
      const group = requirePositional(rest, 0, 'group');
      const proxy = requirePositional(rest, 1, 'proxy');
      const client = await ctx.client();
      await client.switchProxy(group, proxy);
      console.log(ok(`${group} -> ${proxy}`));
      return;
    }
    case 'test': {
      const url = requireOptionValue(rest, ['--url']);
      const timeout = requireOptionValue(url.remainingArgs, ['--timeout']);
      assertNoUnknownFlags(timeout.remainingArgs, 'proxy test');
      const name = requirePositional(timeout.remainingArgs, 0, 'proxy');
      const client = await ctx.client();
      const delay = await client.testDelay(name, {
        url: url.value,
        timeoutMs: timeout.value === undefined ? undefined : parsePositiveInt(timeout.value, '--timeout'),
      });
      console.log(ok(`${name}: ${delay} ms`));
      return;
    }
    case 'batch-test': {
      const group = requireOptionValue(rest, ['--group', '-g']);
      const url = requireOptionValue(group.remainingArgs, ['--url']);
      const timeout = requireOptionValue(url.remainingArgs, ['--timeout']);
      const concurrency = requireOptionValue(timeout.remainingArgs, ['--concurrency']);
      assertNoUnknownFlags(concurrency.remainingArgs, 'proxy batch-test');
      const client = await ctx.client();

      let names: string[];
      if (group.value !== undefined) {
        const target = await client.getProxy(group.value);
        if (!target.all) {
          throw new ValidationError(`${group.value} is not a proxy group`, { key: group.value });
        }
        names = target.all;
      } else {
        names = Object.values(await client.getProxies())
          .filter((p) => !p.all)
          .map((p) => p.name);
      }

      const results = await batchTestDelays(client, names, {
        url: url.value,
        timeoutMs: timeout.value === undefined ? undefined : parsePositiveInt(timeout.value, '--timeout'),
        concurrency:
          concurrency.value === undefined ? undefined : parsePositiveInt(concurrency.value, '--concurrency'),
      });
      console.log(header(group.value ? `Delays of ${group.value}` : 'Delays'));
      printDelayTable(results);
      const answered = results.filter((r) => r.status === 'ok').length;
      console.log(info(`${answered}/${results.length} proxies answered`));
      return;
    }
    case 'auto-select': {
      const maxDelay = requireOptionValue(rest, ['--max-delay']);
      const url = requireOptionValue(maxDelay.remainingArgs, ['--url']);
      const timeout = requireOptionValue(url.remainingArgs, ['--timeout']);
      assertNoUnknownFlags(timeout.remainingArgs, 'proxy auto-select');
      const group = requirePositional(timeout.remainingArgs, 0, 'group');
      const maxDelayMs =
        maxDelay.value === undefined ? DEFAULT_MAX_DELAY_MS : parsePositiveInt(maxDelay.value, '--max-delay');
      const client = await ctx.client();

      const result = await autoSelectFastest(client, group, {
        maxDelayMs,
        url: url.value,
        timeoutMs: timeout.value === undefined ? undefined : parsePositiveInt(timeout.value, '--timeout'),
      });
      if (result.selected === null) {
        printDelayTable(result.results);
        throw new NotFoundError(`No member of ${group} answered within ${maxDelayMs} ms`);
      }
      if (result.selected === result.previous) {
        console.log(info(`${group} keeps ${result.selected} (${result.delay} ms)`));
      } else {
        console.log(ok(`${group} -> ${result.selected} (${result.delay} ms)`));
      }
      return;
    }
    case 'current': {
      assertNoUnknownFlags(rest, 'proxy current');
      const client = await ctx.client();
      const wanted = rest[0];
      if (wanted) {
        const group = await client.getProxy(wanted);
        if (!group.all) {
          throw new ValidationError(`${wanted} is not a proxy group`, { key: wanted });
        }
        console.log(group.now ?? '');
        return;
      }
      for (const group of await client.getProxyGroups()) {
        console.log(`${color(group.name, 'info')}: ${group.now || dim('-')}`);
      }
      return;
    }
    default:
      throw new ValidationError(`Unknown proxy subcommand: ${sub}`, { key: sub });
  }
}
