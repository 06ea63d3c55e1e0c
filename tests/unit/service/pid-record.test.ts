import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as path from 'path';
import { parsePidRecord, PidRecordFile } from '../../../src/service/pid-record';
import {
  getProcessCommandLine,
  isProcessAlive,
  verifyProcessOwnership,
} from '../../../src/service/process-ownership';
import { makeTempDir, removeTempDir } from '../../helpers/fixtures';

describe('parsePidRecord', () => {
  it('reads the JSON record', () => {
    const content = JSON.stringify({
      pid: 4242,
      startedAt: 1700000000000,
      binaryPath: '/opt/mihomo',
      configPath: '/etc/mihomo.yaml',
    });

    expect(parsePidRecord(content)).toEqual({
      pid: 4242,
      startedAt: 1700000000000,
      binaryPath: '/opt/mihomo',
      configPath: '/etc/mihomo.yaml',
    });
  });

  it('reads a legacy bare integer with empty paths', () => {
    expect(parsePidRecord('4242\n')).toEqual({
      pid: 4242,
      startedAt: 0,
      binaryPath: '',
      configPath: '',
    });
  });

  it('rejects content without a usable pid', () => {
    expect(parsePidRecord('0')).toBeNull();
    expect(parsePidRecord('{"pid": -1}')).toBeNull();
    expect(parsePidRecord('{"pid": "12"}')).toBeNull();
    expect(parsePidRecord('not a pid')).toBeNull();
  });
});

describe('PidRecordFile', () => {
  let dir: string;

  beforeEach(() => {
    dir = makeTempDir();
  });

  afterEach(() => {
    removeTempDir(dir);
  });

  it('writes, reads and removes the record', async () => {
    const file = new PidRecordFile(path.join(dir, 'mihomo.pid'));
    const record = { pid: 77, startedAt: 5, binaryPath: '/b', configPath: '/c' };

    await file.write(record);
    await expect(file.read()).resolves.toEqual(record);
    expect(fs.statSync(file.filePath).mode & 0o777).toBe(0o600);

    await file.remove();
    await expect(file.read()).resolves.toBeNull();
    await expect(file.remove()).resolves.toBeUndefined();
  });

  it('treats an unreadable record as absent', async () => {
    const file = new PidRecordFile(path.join(dir, 'mihomo.pid'));
    fs.writeFileSync(file.filePath, '{broken');

    await expect(file.read()).resolves.toBeNull();
  });
});

describe.skipIf(process.platform !== 'linux')('process ownership', () => {
  it('recognises this process as alive', () => {
    expect(isProcessAlive(process.pid)).toBe(true);
  });

  it('matches the recorded binary against the command line', () => {
    const commandLine = getProcessCommandLine(process.pid);
    expect(commandLine).toContain(process.execPath);

    expect(verifyProcessOwnership(process.pid, process.execPath)).toBe('owned');
    expect(verifyProcessOwnership(process.pid, '/nonexistent/mihomo')).toBe('not-owned');
    expect(verifyProcessOwnership(process.pid, '')).toBe('unknown');
  });
});
