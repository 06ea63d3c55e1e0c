/**
 * Download Progress Indicator (no external dependencies)
 *
 * ASCII spinner on stderr with elapsed time and, once sizes are known,
 * percentage and megabytes. Pipes, CI and NO_COLOR get one line at start
 * and one at the end.
 */

import { DownloadProgress } from '../version/types';

interface ProgressOptions {
  frames?: string[];
  interval?: number;
  stream?: NodeJS.WriteStream;
}

function formatMegabytes(bytes: number): string {
  return (bytes / (1024 * 1024)).toFixed(1);
}

/** "42% (4.2/10.0 MB)", or "4.2 MB" when the total is unknown */
export function formatProgress(progress: DownloadProgress): string {
  if (progress.total > 0) {
    return `${progress.percentage}% (${formatMegabytes(progress.downloaded)}/${formatMegabytes(progress.total)} MB)`;
  }
  return `${formatMegabytes(progress.downloaded)} MB`;
}

export class ProgressIndicator {
  private message: string;
  private detail = '';
  private readonly frames: string[];
  private readonly intervalMs: number;
  private readonly stream: NodeJS.WriteStream;
  private frameIndex = 0;
  private timer: NodeJS.Timeout | null = null;
  private readonly startTime = Date.now();
  private readonly animated: boolean;

  constructor(message: string, options: ProgressOptions = {}) {
    this.message = message;
    this.frames = options.frames || ['|', '/', '-', '\\'];
    this.intervalMs = options.interval ?? 80;
    this.stream = options.stream ?? process.stderr;
    this.animated = this.stream.isTTY === true && !process.env.CI && !process.env.NO_COLOR;
  }

  start(): void {
    if (!this.animated) {
      this.stream.write(`[i] ${this.message}...\n`);
      return;
    }

    this.timer = setInterval(() => this.render(), this.intervalMs);
  }

  /** Attach byte counts to the spinner line */
  progress(progress: DownloadProgress): void {
    this.detail = formatProgress(progress);
  }

  update(message: string): void {
    this.message = message;
  }

  succeed(message?: string): void {
    this.stop();
    const finalMessage = message || this.message;
    const prefix = this.animated ? '\r' : '';
    this.stream.write(`${prefix}[OK] ${finalMessage} (${this.elapsed()}s)\n`);
  }

  fail(message?: string): void {
    this.stop();
    const prefix = this.animated ? '\r' : '';
    this.stream.write(`${prefix}[X] ${message || this.message}\n`);
  }

  stop(): void {
    if (!this.timer) return;
    clearInterval(this.timer);
    this.timer = null;
    this.stream.write('\r\x1b[K');
  }

  private elapsed(): string {
    return ((Date.now() - this.startTime) / 1000).toFixed(1);
  }

  private render(): void {
    const frame = this.frames[this.frameIndex];
    const detail = this.detail ? ` ${this.detail}` : '';
    this.stream.write(`\r\x1b[K[${frame}] ${this.message}...${detail} (${this.elapsed()}s)`);
    this.frameIndex = (this.frameIndex + 1) % this.frames.length;
  }
}
