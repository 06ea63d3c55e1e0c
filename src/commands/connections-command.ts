/**
 * Connections Command Handlers
 *
 * mihomo-manager connections list|close <id>|close-all
 */

import { dim, header, info, ok, table } from '../utils/ui';
import { formatBytes } from '../utils/format';
import { ValidationError } from '../errors';
import { Connection } from '../client/types';
import { CommandContext } from './command-context';
import { assertNoUnknownFlags, requirePositional } from './arg-extractor';

export const CONNECTIONS_SUBCOMMANDS = ['list', 'close', 'close-all'] as const;

/** host:port when a host is known, else ip:port */
export function connectionTarget(connection: Connection): string {
  const { host, destinationIP, destinationPort } = connection.metadata;
  return `${host || destinationIP}:${destinationPort}`;
}

export async function handleConnectionsCommand(ctx: CommandContext, args: string[]): Promise<void> {
  const [sub = 'list', ...rest] = args;
  assertNoUnknownFlags(rest, `connections ${sub}`);

  switch (sub) {
    case 'list': {
      const client = await ctx.client();
      const snapshot = await client.getConnections();
      if (snapshot.connections.length === 0) {
        console.log(info('No active connections'));
        return;
      }
      const rows = snapshot.connections.map((c) => [
        c.id.slice(0, 8),
        c.metadata.network,
        connectionTarget(c),
        c.chains.join(' > ') || dim('-'),
        c.rule + (c.rulePayload ? `(${c.rulePayload})` : ''),
        `${formatBytes(c.upload)} / ${formatBytes(c.download)}`,
      ]);
      console.log(header(`Connections (${snapshot.connections.length})`));
      console.log(table(rows, { head: ['ID', 'Net', 'Target', 'Chain', 'Rule', 'Up / Down'] }));
      console.log(
        dim(`Total: up ${formatBytes(snapshot.uploadTotal)}, down ${formatBytes(snapshot.downloadTotal)}`)
      );
      return;
    }
    case 'close': {
      const id = requirePositional(rest, 0, 'id');
      const client = await ctx.client();
      await client.closeConnection(id);
      console.log(ok(`Closed connection ${id}`));
      return;
    }
    case 'close-all': {
      const client = await ctx.client();
      await client.closeAllConnections();
      console.log(ok('Closed all connections'));
      return;
    }
    default:
      throw new ValidationError(`Unknown connections subcommand: ${sub}`, { key: sub });
  }
}
