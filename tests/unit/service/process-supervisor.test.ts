import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { spawnSync } from 'child_process';
import * as fs from 'fs';
import * as path from 'path';
import { HomeContext } from '../../../src/core/home-context';
import { ConflictError, ProcessError } from '../../../src/errors';
import { PidRecordFile } from '../../../src/service/pid-record';
import { isProcessAlive } from '../../../src/service/process-ownership';
import { ProcessSupervisor, SupervisorOptions } from '../../../src/service/process-supervisor';
import { makeTempHome, removeTempHome, writeFakeBinary } from '../../helpers/fixtures';

const FAST: SupervisorOptions = {
  probeMs: 300,
  gracePeriodMs: 1000,
  killTimeoutMs: 1000,
  pollIntervalMs: 20,
};

async function waitFor(condition: () => boolean, timeoutMs = 5000): Promise<void> {
  const deadline = Date.now() + timeoutMs;
  while (!condition()) {
    if (Date.now() > deadline) throw new Error('condition not met in time');
    await new Promise((resolve) => setTimeout(resolve, 20));
  }
}

describe.skipIf(process.platform === 'win32')('ProcessSupervisor', () => {
  let home: HomeContext;
  let binary: string;
  let configPath: string;
  let spawned: number[];

  beforeEach(() => {
    home = makeTempHome();
    binary = writeFakeBinary(path.join(home.root, 'bin', 'mihomo'));
    configPath = path.join(home.configsDir, 'default.yaml');
    spawned = [];
  });

  afterEach(() => {
    vi.restoreAllMocks();
    for (const pid of spawned) {
      try {
        process.kill(pid, 'SIGKILL');
      } catch {
        // already gone
      }
    }
    removeTempHome(home);
  });

  function supervisor(options: SupervisorOptions = FAST): ProcessSupervisor {
    return new ProcessSupervisor(home, options);
  }

  it('starts the binary with the profile and stops it', async () => {
    const sup = supervisor();

    const record = await sup.start(binary, configPath);
    spawned.push(record.pid);

    expect(record.binaryPath).toBe(binary);
    expect(record.configPath).toBe(configPath);
    expect(sup.state.status).toBe('running');
    expect(isProcessAlive(record.pid)).toBe(true);
    await expect(new PidRecordFile(home.pidFile).read()).resolves.toEqual(record);

    await sup.stop();

    expect(sup.state).toEqual({ status: 'stopped' });
    expect(fs.existsSync(home.pidFile)).toBe(false);
    expect(isProcessAlive(record.pid)).toBe(false);
    await waitFor(() =>
      fs.readFileSync(home.serviceLogFile, 'utf8').includes(`serving -d ${home.configsDir} -f ${configPath}`)
    );
  });

  it('refuses a second start while running', async () => {
    const sup = supervisor();
    const record = await sup.start(binary, configPath);
    spawned.push(record.pid);

    await expect(sup.start(binary, configPath)).rejects.toThrow(
      new ConflictError(`mihomo is already running (PID ${record.pid})`)
    );
    await sup.stop();
  });

  it('treats stop as a no-op when nothing runs', async () => {
    const sup = supervisor();

    await expect(sup.stop()).resolves.toBeUndefined();
    expect(sup.state.status).toBe('stopped');
  });

  it('reports an early exit with the log tail and leaves no record', async () => {
    const failing = writeFakeBinary(path.join(home.root, 'bin', 'broken'), 'exit');
    const sup = supervisor();

    const err = await sup.start(failing, configPath).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(ProcessError);
    expect(err).toMatchObject({
      message: 'mihomo failed to start: exited with code 3\nconfig error',
    });
    expect(sup.state.status).toBe('stopped');
    expect(fs.existsSync(home.pidFile)).toBe(false);
  });

  it('detects a crash and reports it once', async () => {
    const sup = supervisor();
    const record = await sup.start(binary, configPath);
    spawned.push(record.pid);

    process.kill(record.pid, 'SIGKILL');
    await waitFor(() => sup.state.status === 'crashed');

    const observed = await sup.reconcile();
    expect(observed).toEqual({
      status: 'crashed',
      pid: record.pid,
      exitCode: null,
      signal: 'SIGKILL',
    });
    expect(fs.existsSync(home.pidFile)).toBe(false);

    await expect(sup.status()).resolves.toEqual({ status: 'stopped' });
  });

  it('clears a record whose PID no longer runs the recorded binary', async () => {
    await new PidRecordFile(home.pidFile).write({
      pid: process.pid,
      startedAt: 1,
      binaryPath: '/nonexistent/mihomo',
      configPath,
    });
    const sup = supervisor();

    await expect(sup.reconcile()).resolves.toEqual({
      status: 'crashed',
      pid: process.pid,
      exitCode: null,
      signal: null,
    });
    expect(fs.existsSync(home.pidFile)).toBe(false);
    expect(sup.state.status).toBe('stopped');
  });

  it('clears a record whose PID is gone and starts afresh', async () => {
    const finished = spawnSync(process.execPath, ['-e', '']);
    const deadPid = finished.pid;
    expect(isProcessAlive(deadPid)).toBe(false);
    await new PidRecordFile(home.pidFile).write({
      pid: deadPid,
      startedAt: 1,
      binaryPath: binary,
      configPath,
    });
    const sup = supervisor();

    await expect(sup.status()).resolves.toEqual({
      status: 'crashed',
      pid: deadPid,
      exitCode: null,
      signal: null,
    });
    expect(fs.existsSync(home.pidFile)).toBe(false);

    const record = await sup.start(binary, configPath);
    spawned.push(record.pid);
    expect(sup.state.status).toBe('running');
    await sup.stop();
  });

  it('kills the child and stays stopped when the PID record cannot be written', async () => {
    const noSpace = Object.assign(new Error('ENOSPC: no space left on device'), { code: 'ENOSPC' });
    vi.spyOn(PidRecordFile.prototype, 'write').mockRejectedValueOnce(noSpace);
    const sup = supervisor();

    const err = await sup.start(binary, configPath).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(ProcessError);
    if (!(err instanceof ProcessError) || err.pid === undefined) throw new Error('expected a PID');
    const orphan = err.pid;
    spawned.push(orphan);
    expect(err.message).toBe(`Cannot record PID ${orphan}: ENOSPC: no space left on device`);
    expect(err.cause).toBe(noSpace);
    expect(sup.state).toEqual({ status: 'stopped' });
    expect(fs.existsSync(home.pidFile)).toBe(false);
    await waitFor(() => !isProcessAlive(orphan));

    const record = await sup.start(binary, configPath);
    spawned.push(record.pid);
    expect(record.pid).not.toBe(orphan);
    await expect(new PidRecordFile(home.pidFile).read()).resolves.toEqual(record);
    await sup.stop();
  });

  it('adopts a process started by another supervisor and stops it', async () => {
    const first = supervisor();
    const record = await first.start(binary, configPath);
    spawned.push(record.pid);

    const second = supervisor();
    const state = await second.status();

    expect(state).toEqual({ status: 'running', pid: record.pid, record });
    await second.stop();
    expect(isProcessAlive(record.pid)).toBe(false);
    expect(fs.existsSync(home.pidFile)).toBe(false);
  });

  it('escalates to SIGKILL when SIGTERM is ignored', async () => {
    const stubborn = writeFakeBinary(path.join(home.root, 'bin', 'stubborn'), 'ignore-term');
    const sup = supervisor({ ...FAST, gracePeriodMs: 300 });
    const record = await sup.start(stubborn, configPath);
    spawned.push(record.pid);

    await sup.stop();

    expect(isProcessAlive(record.pid)).toBe(false);
    expect(sup.state.status).toBe('stopped');
  });

  it('restarts with the recorded paths', async () => {
    const sup = supervisor();
    const first = await sup.start(binary, configPath);
    spawned.push(first.pid);

    const second = await sup.restart();
    spawned.push(second.pid);

    expect(second.pid).not.toBe(first.pid);
    expect(second.binaryPath).toBe(binary);
    expect(second.configPath).toBe(configPath);
    expect(isProcessAlive(first.pid)).toBe(false);
    await sup.stop();
  });

  it('refuses to restart without anything recorded', async () => {
    await expect(supervisor().restart()).rejects.toThrow(
      'Nothing to restart: no binary or config recorded'
    );
  });
});
