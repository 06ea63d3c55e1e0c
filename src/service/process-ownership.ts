/**
 * Process liveness and ownership checks.
 *
 * A recorded PID may have been reused by an unrelated process after a crash
 * or a reboot; it only counts as ours while its command line still names the
 * recorded binary.
 */

import { spawnSync } from 'child_process';
import * as fs from 'fs';
import { isErrnoException } from '../errors';

export type OwnershipStatus = 'owned' | 'not-owned' | 'not-running' | 'unknown';

/**
 * True while pid names a live (non-zombie) process.
 */
export function isProcessAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
  } catch (err) {
    // EPERM: exists but belongs to someone else
    return isErrnoException(err) && err.code === 'EPERM';
  }

  if (process.platform === 'linux') {
    try {
      const stat = fs.readFileSync(`/proc/${pid}/stat`, 'utf8');
      const state = stat.slice(stat.lastIndexOf(')') + 2, stat.lastIndexOf(')') + 3);
      return state !== 'Z' && state !== 'X';
    } catch {
      return false;
    }
  }
  return true;
}

export function getProcessCommandLine(pid: number): string | null {
  if (process.platform === 'linux') {
    try {
      // /proc cmdline uses null separators between arguments.
      return fs.readFileSync(`/proc/${pid}/cmdline`, 'utf8').replace(/\0/g, ' ').trim();
    } catch {
      return null;
    }
  }

  if (process.platform === 'darwin' || process.platform === 'freebsd') {
    const result = spawnSync('ps', ['-p', String(pid), '-o', 'command='], { encoding: 'utf8' });
    if (result.error || result.status !== 0) {
      return null;
    }
    return result.stdout.trim();
  }

  if (process.platform === 'win32') {
    const command = `(Get-CimInstance Win32_Process -Filter "ProcessId = ${pid}" | Select-Object -ExpandProperty CommandLine)`;
    for (const shell of ['powershell.exe', 'pwsh.exe']) {
      const result = spawnSync(shell, ['-NoProfile', '-Command', command], { encoding: 'utf8' });
      if (result.error) {
        continue;
      }
      return result.status === 0 ? result.stdout.trim() : null;
    }
  }

  return null;
}

/**
 * Whether pid is alive and still running binaryPath.
 * An empty binaryPath (legacy PID file) cannot be checked and yields 'unknown'.
 */
export function verifyProcessOwnership(pid: number, binaryPath: string): OwnershipStatus {
  if (!isProcessAlive(pid)) {
    return 'not-running';
  }
  if (!binaryPath) {
    return 'unknown';
  }

  const commandLine = getProcessCommandLine(pid);
  if (!commandLine) {
    return 'unknown';
  }
  return commandLine.includes(binaryPath) ? 'owned' : 'not-owned';
}
