/**
 * Service Monitor
 *
 * Polls the service state on a fixed interval and, while it is running,
 * probes the control plane. A crash either ends the run (policy 'never') or
 * triggers a restart with exponential backoff. The attempt counter resets
 * once the instance has stayed healthy for healthyResetMs.
 *
 * Events:
 * - 'status'     (MonitorStatusEvent)  every poll
 * - 'unhealthy'  (UnhealthyEvent)      running but the probe failed
 * - 'crashed'    (CrashedEvent)        crash observed
 * - 'restarted'  (RestartedEvent)      restart attempt succeeded
 */

import { EventEmitter } from 'events';
import { ProcessError, toManagerError } from '../errors';
import { ControllerInfo } from '../config/config-manager';
import { ControlPlaneClient, VersionInfo } from '../client';
import { ServiceStatusReport, StartResult } from '../service/service-manager';
import { ServiceState } from '../service/process-supervisor';
import { createLogger } from '../utils/logger';

const log = createLogger('monitor');

export type RestartPolicy =
  | { type: 'never' }
  | { type: 'restart-with-backoff'; maxAttempts: number; baseDelayMs: number; maxDelayMs?: number };

export interface MonitorOptions {
  intervalMs: number;
  policy: RestartPolicy;
  /** Continuous healthy time after which the attempt counter resets */
  healthyResetMs: number;
  probeTimeoutMs?: number;
  now?: () => number;
}

/** The part of ServiceManager the monitor drives */
export interface MonitoredService {
  status(): Promise<ServiceStatusReport>;
  restart(): Promise<StartResult>;
  controller(): Promise<ControllerInfo>;
}

export interface HealthProbe {
  getVersion(options: { signal?: AbortSignal; timeoutMs?: number }): Promise<VersionInfo>;
}

export type ProbeFactory = (controller: ControllerInfo) => HealthProbe;

export interface MonitorStatusEvent {
  report: ServiceStatusReport;
  healthy: boolean | null;
  attempts: number;
}

export interface UnhealthyEvent {
  pid: number;
  error: Error;
}

export interface CrashedEvent {
  pid: number;
  exitCode: number | null;
  signal: string | null;
}

export interface RestartedEvent {
  attempt: number;
  pid: number;
}

type CrashedState = Extract<ServiceState, { status: 'crashed' }>;

const MAX_RESTART_DELAY_MS = 60000;

/** Delay before restart attempt n (1-based) */
export function restartDelay(
  attempt: number,
  policy: Extract<RestartPolicy, { type: 'restart-with-backoff' }>
): number {
  const cap = policy.maxDelayMs ?? MAX_RESTART_DELAY_MS;
  return Math.min(policy.baseDelayMs * Math.pow(2, attempt - 1), cap);
}

export function policyFromSettings(settings: {
  policy: 'never' | 'restart-with-backoff';
  max_attempts: number;
  base_delay_ms: number;
}): RestartPolicy {
  if (settings.policy === 'never') return { type: 'never' };
  return {
    type: 'restart-with-backoff',
    maxAttempts: settings.max_attempts,
    baseDelayMs: settings.base_delay_ms,
  };
}

function defaultProbeFactory(controller: ControllerInfo): HealthProbe {
  return new ControlPlaneClient({ baseUrl: controller.url, secret: controller.secret });
}

/** Resolves after ms, or early when the signal aborts */
function wait(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal?.aborted) {
      resolve();
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

export class Monitor extends EventEmitter {
  private attempts = 0;
  private healthySince: number | null = null;
  private readonly now: () => number;

  constructor(
    private readonly service: MonitoredService,
    private readonly options: MonitorOptions,
    private readonly createProbe: ProbeFactory = defaultProbeFactory
  ) {
    super();
    this.now = options.now ?? Date.now;
  }

  /** Restart attempts since the last reset */
  get restartAttempts(): number {
    return this.attempts;
  }

  /**
   * Watch until the signal aborts (resolves) or recovery is impossible (rejects with ProcessError).
   */
  async run(signal?: AbortSignal): Promise<void> {
    while (!signal?.aborted) {
      await this.tick(signal);
      if (signal?.aborted) break;
      await wait(this.options.intervalMs, signal);
    }
  }

  /**
   * One poll: observe, probe, recover.
   */
  async tick(signal?: AbortSignal): Promise<void> {
    const report = await this.service.status();
    const { state } = report;

    if (state.status === 'crashed') {
      this.emitStatus(report, null);
      await this.recover(state, signal);
      return;
    }

    if (state.status !== 'running') {
      this.healthySince = null;
      this.emitStatus(report, null);
      return;
    }

    const healthy = await this.probe(state.pid, signal);
    if (healthy) {
      const now = this.now();
      if (this.healthySince === null) this.healthySince = now;
      if (this.attempts > 0 && now - this.healthySince >= this.options.healthyResetMs) {
        log.debug(`Healthy for ${now - this.healthySince}ms, resetting restart attempts`);
        this.attempts = 0;
      }
    } else {
      this.healthySince = null;
    }
    this.emitStatus(report, healthy);
  }

  private emitStatus(report: ServiceStatusReport, healthy: boolean | null): void {
    const event: MonitorStatusEvent = { report, healthy, attempts: this.attempts };
    this.emit('status', event);
  }

  private async probe(pid: number, signal?: AbortSignal): Promise<boolean> {
    try {
      const controller = await this.service.controller();
      await this.createProbe(controller).getVersion({
        signal,
        timeoutMs: this.options.probeTimeoutMs,
      });
      return true;
    } catch (error) {
      const reason = toManagerError(error, 'network');
      log.debug(`Probe failed for PID ${pid}: ${reason.message}`);
      const event: UnhealthyEvent = { pid, error: reason };
      this.emit('unhealthy', event);
      return false;
    }
  }

  private async recover(crash: CrashedState, signal?: AbortSignal): Promise<void> {
    const crashed: CrashedEvent = {
      pid: crash.pid,
      exitCode: crash.exitCode,
      signal: crash.signal,
    };
    this.emit('crashed', crashed);
    this.healthySince = null;

    const how = crash.exitCode !== null ? `exit code ${crash.exitCode}` : crash.signal ?? 'unknown cause';
    const policy = this.options.policy;
    if (policy.type === 'never') {
      throw new ProcessError(`mihomo (PID ${crash.pid}) crashed (${how})`, { pid: crash.pid });
    }

    for (;;) {
      this.attempts++;
      if (this.attempts > policy.maxAttempts) {
        throw new ProcessError(
          `mihomo kept crashing; gave up after ${policy.maxAttempts} restart attempt(s)`,
          { pid: crash.pid }
        );
      }

      const delay = restartDelay(this.attempts, policy);
      log.debug(`Restart attempt ${this.attempts}/${policy.maxAttempts} in ${delay}ms`);
      await wait(delay, signal);
      if (signal?.aborted) return;

      try {
        const result = await this.service.restart();
        const restarted: RestartedEvent = { attempt: this.attempts, pid: result.pid };
        this.emit('restarted', restarted);
        return;
      } catch (error) {
        log.warn(`Restart attempt ${this.attempts} failed: ${toManagerError(error).message}`);
      }
    }
  }
}
