/**
 * Stream Subscription
 *
 * One WebSocket per subscription, owned by a background task that parses
 * frames, applies the filter and pushes into a BoundedChannel. Connection
 * loss is retried with exponential backoff up to maxReconnectAttempts, counted
 * since the last connection that delivered a frame or stayed up; every
 * reconnect opens a fresh socket with the same URL and filter. A rejected
 * handshake (401/403) ends the subscription with AuthError.
 *
 * Cancellation (close(), breaking out of `for await`, or the caller's
 * signal) closes the socket and stops the task; no reconnect follows.
 */

import WebSocket from 'ws';
import { AuthError, NetworkError, toManagerError } from '../errors';
import { BoundedChannel, OverflowPolicy } from './bounded-channel';
import { StreamKind } from './types';
import { createLogger } from '../utils/logger';

const log = createLogger('stream');

export interface ReconnectPolicy {
  /** Reconnects allowed after a lost or failed connection; 0 disables reconnecting */
  maxReconnectAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  /**
   * Uptime after which a connection that delivered no frame still counts as
   * established; only established connections reset the attempt counter.
   */
  stableAfterMs: number;
}

export const DEFAULT_RECONNECT_POLICY: ReconnectPolicy = {
  maxReconnectAttempts: 5,
  baseDelayMs: 500,
  maxDelayMs: 10000,
  stableAfterMs: 5000,
};

/** Backoff before reconnect attempt n (1-based): base * 2^(n-1), capped */
export function reconnectDelay(attempt: number, policy: ReconnectPolicy): number {
  return Math.min(policy.baseDelayMs * Math.pow(2, attempt - 1), policy.maxDelayMs);
}

export interface SubscriptionOptions<T> {
  kind: StreamKind;
  url: string;
  secret?: string | null;
  /** Frame decoder; returning null skips the frame */
  decode: (text: string) => T | null;
  /** Optional filter applied after decoding */
  filter?: (item: T) => boolean;
  capacity: number;
  policy: OverflowPolicy;
  reconnect?: Partial<ReconnectPolicy>;
  signal?: AbortSignal;
  handshakeTimeoutMs?: number;
}

type ConnectionOutcome =
  | { type: 'closed'; established: boolean; error: Error | null }
  | { type: 'auth'; statusCode: number };

export class Subscription<T> implements AsyncIterable<T> {
  readonly kind: StreamKind;
  private readonly channel: BoundedChannel<T>;
  private readonly policy: ReconnectPolicy;
  private socket: WebSocket | null = null;
  private generation = 0;
  private connections = 0;
  private wake: (() => void) | null = null;
  private readonly done: Promise<void>;
  private readonly detachSignal: () => void;

  constructor(private readonly options: SubscriptionOptions<T>) {
    this.kind = options.kind;
    this.channel = new BoundedChannel<T>(options.capacity, options.policy);
    this.policy = { ...DEFAULT_RECONNECT_POLICY, ...options.reconnect };

    const onAbort = () => this.close();
    options.signal?.addEventListener('abort', onAbort, { once: true });
    this.detachSignal = () => options.signal?.removeEventListener('abort', onAbort);

    this.channel.onCancel(() => {
      this.generation++;
      this.socket?.terminate();
      this.socket = null;
      this.wake?.();
    });

    if (options.signal?.aborted) {
      this.channel.cancel();
    }
    this.done = this.run();
  }

  /** True until cancelled or terminally failed */
  get open(): boolean {
    return this.channel.open;
  }

  /** Sockets opened so far, reconnects included */
  get connectionCount(): number {
    return this.connections;
  }

  /** Samples discarded by a drop-oldest channel */
  get dropped(): number {
    return this.channel.dropped;
  }

  /** Resolves once the background task has stopped */
  get finished(): Promise<void> {
    return this.done;
  }

  close(): void {
    this.channel.cancel();
  }

  next(): Promise<IteratorResult<T>> {
    return this.channel.next();
  }

  [Symbol.asyncIterator](): AsyncIterator<T> {
    return this.channel[Symbol.asyncIterator]();
  }

  private async run(): Promise<void> {
    let attempt = 0;
    try {
      while (!this.channel.cancelled) {
        const outcome = await this.connectOnce();
        if (this.channel.cancelled) break;

        if (outcome.type === 'auth') {
          this.channel.fail(
            new AuthError(`Control plane rejected the ${this.kind} stream (HTTP ${outcome.statusCode})`)
          );
          break;
        }

        if (outcome.established) attempt = 0;
        attempt++;
        if (attempt > this.policy.maxReconnectAttempts) {
          const reason = outcome.error ? `: ${outcome.error.message}` : '';
          this.channel.fail(
            new NetworkError(
              `${this.kind} stream lost after ${this.policy.maxReconnectAttempts} reconnect attempt(s)${reason}`,
              { cause: outcome.error ?? undefined }
            )
          );
          break;
        }

        const delay = reconnectDelay(attempt, this.policy);
        log.debug(`${this.kind} stream reconnect ${attempt}/${this.policy.maxReconnectAttempts} in ${delay}ms`);
        await this.pause(delay);
      }
    } catch (error) {
      this.channel.fail(toManagerError(error, 'network'));
    } finally {
      this.detachSignal();
    }
  }

  /** Sleep that ends early on cancellation */
  private pause(ms: number): Promise<void> {
    return new Promise((resolve) => {
      const timer = setTimeout(() => {
        this.wake = null;
        resolve();
      }, ms);
      this.wake = () => {
        clearTimeout(timer);
        this.wake = null;
        resolve();
      };
    });
  }

  private connectOnce(): Promise<ConnectionOutcome> {
    const generation = ++this.generation;
    const headers: Record<string, string> = {};
    if (this.options.secret) {
      headers['Authorization'] = `Bearer ${this.options.secret}`;
    }

    return new Promise((resolve) => {
      const ws = new WebSocket(this.options.url, {
        headers,
        handshakeTimeout: this.options.handshakeTimeoutMs ?? 5000,
      });
      this.socket = ws;
      this.connections++;
      let openedAt: number | null = null;
      let received = false;
      let lastError: Error | null = null;

      ws.on('open', () => {
        openedAt = Date.now();
        log.debug(`${this.kind} stream connected (${this.options.url})`);
      });

      ws.on('message', (data: WebSocket.RawData) => {
        if (generation !== this.generation) return;
        received = true;
        const item = this.options.decode(data.toString());
        if (item === null) return;
        if (this.options.filter && !this.options.filter(item)) return;

        const wasFull = this.channel.full;
        const accepted = this.channel.push(item);
        if (wasFull && this.channel.policy === 'block') {
          // Stop reading from the socket until the consumer catches up
          ws.pause();
          void accepted.then(() => {
            if (generation === this.generation && ws.readyState === WebSocket.OPEN) {
              ws.resume();
            }
          });
        }
      });

      ws.on('error', (error: Error) => {
        lastError = error;
      });

      ws.on('close', () => {
        if (this.socket === ws) this.socket = null;
        const status = lastError ? /Unexpected server response: (\d+)/.exec(lastError.message) : null;
        const statusCode = status ? parseInt(status[1], 10) : 0;
        if (statusCode === 401 || statusCode === 403) {
          resolve({ type: 'auth', statusCode });
        } else {
          const established =
            received || (openedAt !== null && Date.now() - openedAt >= this.policy.stableAfterMs);
          resolve({ type: 'closed', established, error: lastError });
        }
      });
    });
  }
}
