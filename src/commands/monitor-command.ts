/**
 * Monitor Command Handler
 *
 * mihomo-manager monitor [--policy never|restart-with-backoff]
 *
 * Watches the service until Ctrl-C, restarting it per the [monitor] settings.
 */

import { dim, fail, info, ok, warn } from '../utils/ui';
import { ValidationError } from '../errors';
import {
  CrashedEvent,
  Monitor,
  MonitorStatusEvent,
  RestartedEvent,
  UnhealthyEvent,
  policyFromSettings,
} from '../monitor/monitor';
import { CommandContext } from './command-context';
import { assertNoUnknownFlags, requireOptionValue } from './arg-extractor';
import { describeState } from './service-command';

const POLICIES = ['never', 'restart-with-backoff'] as const;
type PolicyName = (typeof POLICIES)[number];

function isPolicyName(value: string): value is PolicyName {
  return POLICIES.some((p) => p === value);
}

export function createMonitor(ctx: CommandContext, policyOverride?: PolicyName): Monitor {
  const settings = ctx.settings.monitor;
  return new Monitor(ctx.service, {
    intervalMs: settings.interval_ms,
    healthyResetMs: settings.healthy_reset_ms,
    policy: policyFromSettings({ ...settings, policy: policyOverride ?? settings.policy }),
  });
}

export async function handleMonitorCommand(
  ctx: CommandContext,
  args: string[],
  signal?: AbortSignal
): Promise<void> {
  const policy = requireOptionValue(args, ['--policy']);
  assertNoUnknownFlags(policy.remainingArgs, 'monitor');
  if (policy.value !== undefined && !isPolicyName(policy.value)) {
    throw new ValidationError(`--policy must be never or restart-with-backoff, got ${policy.value}`, {
      key: '--policy',
    });
  }

  const monitor = createMonitor(ctx, policy.value);
  let lastState = '';
  monitor.on('status', (event: MonitorStatusEvent) => {
    const label = describeState(event.report.state);
    if (label !== lastState) {
      console.log(info(`Service ${label}`));
      lastState = label;
    }
  });
  monitor.on('unhealthy', (event: UnhealthyEvent) => {
    console.log(warn(`PID ${event.pid} not answering: ${event.error.message}`));
  });
  monitor.on('crashed', (event: CrashedEvent) => {
    const how = event.exitCode !== null ? `exit code ${event.exitCode}` : (event.signal ?? 'unknown');
    console.log(fail(`PID ${event.pid} crashed (${how})`));
  });
  monitor.on('restarted', (event: RestartedEvent) => {
    console.log(ok(`Restarted (attempt ${event.attempt}, PID ${event.pid})`));
  });

  console.log(dim(`Monitoring every ${ctx.settings.monitor.interval_ms}ms; Ctrl-C to stop`));
  await monitor.run(signal);
}
