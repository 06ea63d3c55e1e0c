/**
 * Version Command Handlers
 *
 * mihomo-manager version list|list-remote|install|uninstall|default
 * mihomo-manager --version
 */

import { color, dim, header, info, ok, table } from '../utils/ui';
import { formatTimestamp } from '../utils/format';
import { getVersion } from '../utils/version';
import { ValidationError } from '../errors';
import { CommandContext } from './command-context';
import {
  assertNoUnknownFlags,
  extractFlag,
  requireOptionValue,
  requirePositional,
} from './arg-extractor';
import { installVersion, printInstallOutcome } from './install-command';

export const VERSION_SUBCOMMANDS = ['list', 'list-remote', 'install', 'uninstall', 'default'] as const;

/** --version */
export function printManagerVersion(): void {
  console.log(`mihomo-manager v${getVersion()}`);
}

export async function handleVersionCommand(
  ctx: CommandContext,
  args: string[],
  signal?: AbortSignal
): Promise<void> {
  const [sub = 'list', ...rest] = args;

  switch (sub) {
    case 'list':
      assertNoUnknownFlags(rest, 'version list');
      return listInstalled(ctx);
    case 'list-remote':
      return listRemote(ctx, rest);
    case 'install': {
      const defaultFlag = extractFlag(rest, ['--default']);
      assertNoUnknownFlags(defaultFlag.remainingArgs, 'version install');
      const target = requirePositional(defaultFlag.remainingArgs, 0, 'version');
      const outcome = await installVersion(ctx, target, {
        makeDefault: defaultFlag.found,
        signal,
      });
      printInstallOutcome(outcome);
      return;
    }
    case 'uninstall': {
      const version = requirePositional(rest, 0, 'version');
      const wasDefault = (await ctx.versions.getDefault()) === version;
      await ctx.versions.uninstall(version);
      console.log(ok(`Uninstalled mihomo ${version}`));
      if (wasDefault) {
        console.log(info('No default version is set now (run: mihomo-manager version default <version>)'));
      }
      return;
    }
    case 'default': {
      const version = rest[0];
      if (!version) {
        const current = await ctx.versions.getDefault();
        console.log(current ?? dim('(none)'));
        return;
      }
      await ctx.versions.setDefault(version);
      console.log(ok(`Default version set to ${version}`));
      const status = await ctx.service.status();
      if (status.state.status === 'running' && status.version !== version) {
        console.log(info('The running service keeps its version until restart'));
      }
      return;
    }
    default:
      throw new ValidationError(`Unknown version subcommand: ${sub}`, { key: sub });
  }
}

async function listInstalled(ctx: CommandContext): Promise<void> {
  const versions = await ctx.versions.list();
  if (versions.length === 0) {
    console.log(info('No versions installed (run: mihomo-manager install)'));
    return;
  }

  const rows = versions.map((v) => [
    v.isDefault ? color('*', 'success') : '',
    v.version,
    v.tag,
    formatTimestamp(v.installedAt),
  ]);
  console.log(header('Installed versions'));
  console.log(table(rows, { head: ['', 'Version', 'Tag', 'Installed'] }));
}

async function listRemote(ctx: CommandContext, args: string[]): Promise<void> {
  const { value, remainingArgs } = requireOptionValue(args, ['--limit']);
  assertNoUnknownFlags(remainingArgs, 'version list-remote');

  let limit = 20;
  if (value !== undefined) {
    limit = parseInt(value, 10);
    if (!Number.isInteger(limit) || limit < 1) {
      throw new ValidationError(`--limit must be a positive integer, got ${value}`, { key: '--limit' });
    }
  }

  const [releases, installed] = await Promise.all([
    ctx.versions.listRemote(limit),
    ctx.versions.list(),
  ]);
  const installedIds = new Set(installed.map((v) => v.version));
  const rows = releases.map((r) => [
    r.version,
    r.prerelease ? 'prerelease' : 'release',
    r.publishedAt.slice(0, 10),
    installedIds.has(r.version) ? color('installed', 'success') : '',
  ]);
  console.log(header('Available versions'));
  console.log(table(rows, { head: ['Version', 'Type', 'Published', ''] }));
}
