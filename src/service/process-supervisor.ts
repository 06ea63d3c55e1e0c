/**
 * Process Supervisor
 *
 * Owns the state machine of the single supervised mihomo process:
 *
 *   stopped -> starting -> running(pid) -> stopping -> stopped
 *                              |
 *                              +-> crashed (exit without stop(); held until reconcile())
 *
 * A PidRecord exists on disk exactly while the state is starting, running or
 * stopping. The supervisor reports failures and never retries; restart
 * policy belongs to the Monitor.
 */

import { spawn, ChildProcess } from 'child_process';
import * as fs from 'fs';
import * as path from 'path';
import { HomeContext } from '../core/home-context';
import { ConflictError, ProcessError, errorMessage, isErrnoException } from '../errors';
import { PidRecord, PidRecordFile } from './pid-record';
import { isProcessAlive, verifyProcessOwnership } from './process-ownership';
import { createLogger } from '../utils/logger';

const log = createLogger('supervisor');

export type ServiceState =
  | { status: 'stopped' }
  | { status: 'starting' }
  | { status: 'running'; pid: number; record: PidRecord }
  | { status: 'stopping'; pid: number }
  | { status: 'crashed'; pid: number; exitCode: number | null; signal: string | null };

export type ServiceStatus = ServiceState['status'];

export interface SupervisorOptions {
  /** Liveness probe window after spawn */
  probeMs?: number;
  /** Time between SIGTERM and SIGKILL */
  gracePeriodMs?: number;
  /** Time allowed for SIGKILL to take effect */
  killTimeoutMs?: number;
  pollIntervalMs?: number;
}

const DEFAULTS: Required<SupervisorOptions> = {
  probeMs: 1500,
  gracePeriodMs: 5000,
  killTimeoutMs: 2000,
  pollIntervalMs: 100,
};

const LOG_TAIL_LINES = 5;

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Last lines of the service log, for spawn failure messages.
 */
async function tailLog(filePath: string, lines: number): Promise<string> {
  try {
    const content = await fs.promises.readFile(filePath, 'utf8');
    return content.trimEnd().split('\n').slice(-lines).join('\n');
  } catch {
    return '';
  }
}

export class ProcessSupervisor {
  private readonly options: Required<SupervisorOptions>;
  private readonly pidFile: PidRecordFile;
  private current: ServiceState = { status: 'stopped' };
  private child: ChildProcess | null = null;
  private expectingExit = false;
  private queue: Promise<unknown> = Promise.resolve();

  constructor(
    private readonly home: HomeContext,
    options: SupervisorOptions = {}
  ) {
    this.options = { ...DEFAULTS, ...options };
    this.pidFile = new PidRecordFile(home.pidFile);
  }

  /** In-memory state as of the last transition; call reconcile() before trusting it */
  get state(): ServiceState {
    return this.current;
  }

  async readRecord(): Promise<PidRecord | null> {
    return this.pidFile.read();
  }

  /**
   * Align in-memory state with the PID file and the OS.
   * A record whose process is gone or no longer runs the recorded binary is
   * cleared and reported as crashed; the crash is thereby acknowledged and
   * the next call reports stopped.
   */
  async reconcile(): Promise<ServiceState> {
    if (this.current.status === 'starting' || this.current.status === 'stopping') {
      return this.current;
    }

    if (this.current.status === 'crashed') {
      const crashed = this.current;
      const record = await this.pidFile.read();
      if (record && record.pid === crashed.pid) {
        await this.pidFile.remove();
      }
      this.transition({ status: 'stopped' });
      return crashed;
    }

    const record = await this.pidFile.read();
    if (!record) {
      this.transition({ status: 'stopped' });
      return this.current;
    }

    const ownership = verifyProcessOwnership(record.pid, record.binaryPath);
    if (ownership === 'not-running' || ownership === 'not-owned') {
      log.debug(`Stale PID record ${record.pid} (${ownership}); clearing`);
      // The crash is reported here; a late exit event must not report it again
      if (this.child?.pid === record.pid) this.child = null;
      await this.pidFile.remove();
      this.transition({ status: 'stopped' });
      return { status: 'crashed', pid: record.pid, exitCode: null, signal: null };
    }

    this.transition({ status: 'running', pid: record.pid, record });
    return this.current;
  }

  async status(): Promise<ServiceState> {
    return this.reconcile();
  }

  start(binaryPath: string, configPath: string): Promise<PidRecord> {
    return this.exclusive(() => this.doStart(binaryPath, configPath));
  }

  stop(): Promise<void> {
    return this.exclusive(() => this.doStop());
  }

  /**
   * stop() then start() as one operation. Paths default to the running record's.
   */
  restart(binaryPath?: string, configPath?: string): Promise<PidRecord> {
    return this.exclusive(async () => {
      const record = await this.pidFile.read();
      const binary = binaryPath ?? record?.binaryPath;
      const config = configPath ?? record?.configPath;
      if (!binary || !config) {
        throw new ProcessError('Nothing to restart: no binary or config recorded');
      }
      await this.doStop();
      return this.doStart(binary, config);
    });
  }

  private exclusive<T>(operation: () => Promise<T>): Promise<T> {
    const run = this.queue.then(operation, operation);
    this.queue = run.catch(() => undefined);
    return run;
  }

  private transition(next: ServiceState): void {
    if (next.status !== this.current.status) {
      log.debug(`${this.current.status} -> ${next.status}`);
    }
    this.current = next;
  }

  private async doStart(binaryPath: string, configPath: string): Promise<PidRecord> {
    const state = await this.reconcile();
    if (state.status === 'running') {
      throw new ConflictError(`mihomo is already running (PID ${state.pid})`, {
        context: { pid: state.pid },
      });
    }

    this.transition({ status: 'starting' });
    const logFile = this.home.serviceLogFile;
    let child: ChildProcess;
    try {
      await fs.promises.mkdir(path.dirname(logFile), { recursive: true });
      const logHandle = await fs.promises.open(logFile, 'a');
      try {
        child = spawn(binaryPath, ['-d', path.dirname(configPath), '-f', configPath], {
          detached: true,
          stdio: ['ignore', logHandle.fd, logHandle.fd],
          windowsHide: true,
        });
      } finally {
        await logHandle.close();
      }
    } catch (error) {
      this.transition({ status: 'stopped' });
      throw new ProcessError(`Failed to spawn ${binaryPath}: ${errorMessage(error)}`, {
        cause: error,
      });
    }

    const exited = new Promise<{ code: number | null; signal: string | null; error?: Error }>(
      (resolve) => {
        child.once('error', (error) => resolve({ code: null, signal: null, error }));
        child.once('exit', (code, signal) => resolve({ code, signal }));
      }
    );

    const pid = child.pid;
    if (pid === undefined) {
      const outcome = await exited;
      this.transition({ status: 'stopped' });
      throw new ProcessError(
        `Failed to spawn ${binaryPath}: ${outcome.error?.message ?? 'no PID assigned'}`,
        { cause: outcome.error }
      );
    }

    const record: PidRecord = {
      pid,
      startedAt: Date.now(),
      binaryPath: path.resolve(binaryPath),
      configPath: path.resolve(configPath),
    };
    try {
      await this.pidFile.write(record);
    } catch (error) {
      // An unrecorded process would escape supervision
      this.transition({ status: 'stopped' });
      await this.pidFile.remove();
      this.signal(pid, 'SIGKILL');
      throw new ProcessError(`Cannot record PID ${pid}: ${errorMessage(error)}`, {
        pid,
        cause: error,
      });
    }
    this.child = child;
    this.expectingExit = false;
    child.unref();

    void exited.then((outcome) => {
      if (this.child !== child) return;
      this.child = null;
      if (this.expectingExit || this.current.status === 'starting') return;
      log.debug(`PID ${pid} exited (code ${outcome.code}, signal ${outcome.signal})`);
      this.transition({ status: 'crashed', pid, exitCode: outcome.code, signal: outcome.signal });
    });

    // Liveness probe: the process must survive the probe window
    const early = await Promise.race([exited, sleep(this.options.probeMs).then(() => null)]);
    if (early !== null || !isProcessAlive(pid)) {
      await this.pidFile.remove();
      this.child = null;
      this.transition({ status: 'stopped' });
      const reason = early
        ? early.error
          ? early.error.message
          : `exited with code ${early.code ?? 'null'}${early.signal ? ` (${early.signal})` : ''}`
        : 'not alive after startup';
      const tail = await tailLog(logFile, LOG_TAIL_LINES);
      throw new ProcessError(
        `mihomo failed to start: ${reason}${tail ? `\n${tail}` : ''}`,
        { pid, cause: early?.error }
      );
    }

    this.transition({ status: 'running', pid, record });
    log.debug(`Started PID ${pid}`);
    return record;
  }

  private async doStop(): Promise<void> {
    const state = await this.reconcile();
    if (state.status !== 'running') {
      return;
    }

    const { pid } = state;
    this.expectingExit = true;
    this.transition({ status: 'stopping', pid });

    try {
      if (!this.signal(pid, 'SIGTERM')) {
        await this.finishStop();
        return;
      }

      if (await this.waitForExit(pid, this.options.gracePeriodMs)) {
        await this.finishStop();
        return;
      }

      log.debug(`PID ${pid} survived SIGTERM for ${this.options.gracePeriodMs}ms; sending SIGKILL`);
      this.signal(pid, 'SIGKILL');
      if (await this.waitForExit(pid, this.options.killTimeoutMs)) {
        await this.finishStop();
        return;
      }
    } catch (error) {
      this.transition({ status: 'running', pid, record: state.record });
      this.expectingExit = false;
      throw error;
    }

    this.transition({ status: 'running', pid, record: state.record });
    this.expectingExit = false;
    throw new ProcessError(`PID ${pid} did not exit after SIGKILL`, { pid });
  }

  private async finishStop(): Promise<void> {
    await this.pidFile.remove();
    this.child = null;
    this.transition({ status: 'stopped' });
  }

  /** Send a signal; false when the process is already gone */
  private signal(pid: number, signal: NodeJS.Signals): boolean {
    try {
      process.kill(pid, signal);
      return true;
    } catch (err) {
      if (isErrnoException(err) && err.code === 'ESRCH') return false;
      throw new ProcessError(`Cannot signal PID ${pid}: ${errorMessage(err)}`, { pid, cause: err });
    }
  }

  private async waitForExit(pid: number, timeoutMs: number): Promise<boolean> {
    const deadline = Date.now() + timeoutMs;
    while (Date.now() < deadline) {
      if (!isProcessAlive(pid)) return true;
      await sleep(this.options.pollIntervalMs);
    }
    return !isProcessAlive(pid);
  }
}
