/**
 * Command routing: first argument selects the handler.
 */

import { ValidationError } from '../errors';
import { CommandContext } from './command-context';
import { handleInstallCommand } from './install-command';
import { handleVersionCommand } from './version-command';
import { handleProfileCommand } from './profile-command';
import { handleServiceCommand, isServiceSubcommand } from './service-command';
import { handleProxyCommand } from './proxy-command';
import { handleConnectionsCommand } from './connections-command';
import { handleLogsCommand, handleMemoryCommand, handleTrafficCommand } from './stream-command';
import { handleMonitorCommand } from './monitor-command';

export const COMMANDS = [
  'install',
  'version',
  'profile',
  'service',
  'start',
  'stop',
  'restart',
  'status',
  'proxy',
  'connections',
  'logs',
  'traffic',
  'memory',
  'monitor',
  'help',
] as const;

export async function dispatchCommand(
  ctx: CommandContext,
  args: string[],
  signal?: AbortSignal
): Promise<void> {
  const [command, ...rest] = args;

  if (command !== undefined && isServiceSubcommand(command)) {
    return handleServiceCommand(ctx, [command, ...rest]);
  }

  switch (command) {
    case 'install':
      return handleInstallCommand(ctx, rest, signal);
    case 'version':
      return handleVersionCommand(ctx, rest, signal);
    case 'profile':
      return handleProfileCommand(ctx, rest);
    case 'service':
      return handleServiceCommand(ctx, rest);
    case 'proxy':
      return handleProxyCommand(ctx, rest);
    case 'connections':
      return handleConnectionsCommand(ctx, rest);
    case 'logs':
      return handleLogsCommand(ctx, rest, signal);
    case 'traffic':
      return handleTrafficCommand(ctx, rest, signal);
    case 'memory':
      return handleMemoryCommand(ctx, rest, signal);
    case 'monitor':
      return handleMonitorCommand(ctx, rest, signal);
    default:
      throw new ValidationError(`Unknown command: ${command} (run: mihomo-manager help)`, {
        key: command,
      });
  }
}
