/**
 * Service Command Handlers
 *
 * mihomo-manager service start|stop|restart|status
 * (also available as top-level start, stop, restart, status)
 */

import { color, dim, fail, info, ok, subheader, warn } from '../utils/ui';
import { formatDuration } from '../utils/format';
import { ValidationError, errorMessage } from '../errors';
import { ServiceState } from '../service/process-supervisor';
import { StartResult } from '../service/service-manager';
import { CommandContext } from './command-context';
import { assertNoUnknownFlags } from './arg-extractor';

export const SERVICE_SUBCOMMANDS = ['start', 'stop', 'restart', 'status'] as const;
export type ServiceSubcommand = (typeof SERVICE_SUBCOMMANDS)[number];

export function isServiceSubcommand(value: string): value is ServiceSubcommand {
  return SERVICE_SUBCOMMANDS.some((sub) => sub === value);
}

function printStarted(verb: string, result: StartResult): void {
  console.log(ok(`mihomo ${result.version} ${verb} (PID ${result.pid})`));
  console.log(`    ${dim('Profile:')}    ${result.profile}`);
  console.log(`    ${dim('Controller:')} ${result.controller.url}`);
}

/** One-word label for a state */
export function describeState(state: ServiceState): string {
  switch (state.status) {
    case 'running':
      return color(`running (PID ${state.pid})`, 'success');
    case 'crashed': {
      const how =
        state.exitCode !== null ? `exit code ${state.exitCode}` : (state.signal ?? 'unknown');
      return color(`crashed (PID ${state.pid}, ${how})`, 'error');
    }
    case 'stopping':
      return color(`stopping (PID ${state.pid})`, 'warning');
    case 'starting':
      return color('starting', 'warning');
    case 'stopped':
      return dim('stopped');
  }
}

export async function handleServiceCommand(ctx: CommandContext, args: string[]): Promise<void> {
  const [sub = 'status', ...rest] = args;
  if (!isServiceSubcommand(sub)) {
    throw new ValidationError(`Unknown service subcommand: ${sub}`, { key: sub });
  }
  assertNoUnknownFlags(rest, `service ${sub}`);

  switch (sub) {
    case 'start':
      printStarted('started', await ctx.service.start());
      return;
    case 'restart':
      printStarted('restarted', await ctx.service.restart());
      return;
    case 'stop': {
      const before = await ctx.service.status();
      if (before.state.status !== 'running') {
        console.log(info('mihomo is not running'));
        return;
      }
      await ctx.service.stop();
      console.log(ok(`mihomo stopped (was PID ${before.state.pid})`));
      return;
    }
    case 'status':
      return printStatus(ctx);
  }
}

async function printStatus(ctx: CommandContext): Promise<void> {
  const report = await ctx.service.status();
  const { state } = report;

  console.log(subheader('Service'));
  console.log(`    ${dim('State:')}      ${describeState(state)}`);
  if (state.status === 'crashed') {
    console.log(fail('The last instance exited unexpectedly; see the service log'));
    console.log(`    ${dim('Log:')}        ${ctx.home.serviceLogFile}`);
  }
  if (state.status !== 'running') return;

  console.log(`    ${dim('Version:')}    ${report.version ?? dim('(unmanaged binary)')}`);
  if (report.configPath) {
    console.log(`    ${dim('Config:')}     ${report.configPath}`);
  }
  if (report.startedAt) {
    console.log(`    ${dim('Uptime:')}     ${formatDuration(Date.now() - report.startedAt)}`);
  }

  try {
    const client = await ctx.client();
    const version = await client.getVersion({ timeoutMs: 2000 });
    console.log(`    ${dim('Controller:')} ${client.baseUrl} (${version.version})`);
  } catch (error) {
    console.log(warn(`Control plane not answering: ${errorMessage(error)}`));
  }
}
