/**
 * Control-plane Client
 *
 * HTTP client for the external controller of a running mihomo instance,
 * plus WebSocket subscriptions for logs, traffic and memory.
 * Uses native fetch with a per-request timeout.
 */

import { z } from 'zod';
import {
  AuthError,
  NetworkError,
  NotFoundError,
  ValidationError,
  isManagerError,
} from '../errors';
import { createLogger } from '../utils/logger';
import {
  ConnectionsSchema,
  DelaySchema,
  ErrorBodySchema,
  LogEntrySchema,
  MemorySchema,
  ProxiesSchema,
  ProxyInfoSchema,
  TrafficSchema,
  VersionInfoSchema,
} from './schemas';
import { ReconnectPolicy, Subscription } from './subscription';
import {
  ConnectionsSnapshot,
  LOG_LEVELS,
  LogEntry,
  LogLevel,
  MemorySample,
  ProxyGroup,
  ProxyInfo,
  TrafficSample,
  VersionInfo,
} from './types';

const log = createLogger('client');

const DEFAULT_TIMEOUT_MS = 5000;
export const DEFAULT_DELAY_TEST_URL = 'https://www.gstatic.com/generate_204';
export const DEFAULT_DELAY_TIMEOUT_MS = 5000;
export const LOG_CHANNEL_CAPACITY = 256;
export const SAMPLE_CHANNEL_CAPACITY = 4;

export interface ControlPlaneClientOptions {
  /** Base URL, e.g. http://127.0.0.1:9090 */
  baseUrl: string;
  secret?: string | null;
  /** Per-request timeout (default: 5000) */
  timeoutMs?: number;
  reconnect?: Partial<ReconnectPolicy>;
}

export interface RequestOptions {
  signal?: AbortSignal;
  timeoutMs?: number;
}

export interface DelayTestOptions extends RequestOptions {
  url?: string;
}

export interface LogSubscriptionOptions {
  /** Minimum level delivered (default: info) */
  level?: LogLevel;
  /** Substring the payload must contain */
  filter?: string;
  signal?: AbortSignal;
}

export interface StreamOptions {
  signal?: AbortSignal;
}

interface HttpRequest extends RequestOptions {
  method?: 'GET' | 'PUT' | 'DELETE' | 'PATCH';
  body?: unknown;
}

/** Rank used for minimum-level filtering */
export function logLevelRank(level: LogLevel): number {
  return LOG_LEVELS.indexOf(level);
}

/** http(s)://host:port -> ws(s)://host:port */
export function toWebSocketUrl(baseUrl: string, pathname: string): string {
  const url = new URL(pathname, baseUrl);
  url.protocol = url.protocol === 'https:' ? 'wss:' : 'ws:';
  return url.toString();
}

function decodeWith<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, kind: string) {
  return (text: string): T | null => {
    let raw: unknown;
    try {
      raw = JSON.parse(text);
    } catch {
      log.debug(`Skipping non-JSON ${kind} frame`);
      return null;
    }
    const result = schema.safeParse(raw);
    if (!result.success) {
      log.debug(`Skipping malformed ${kind} frame`);
      return null;
    }
    return result.data;
  };
}

export class ControlPlaneClient {
  readonly baseUrl: string;
  private readonly secret: string | null;
  private readonly timeoutMs: number;
  private readonly reconnect: Partial<ReconnectPolicy>;

  constructor(options: ControlPlaneClientOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.secret = options.secret || null;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.reconnect = options.reconnect ?? {};
  }

  async getVersion(options: RequestOptions = {}): Promise<VersionInfo> {
    const body = await this.requestJson('/version', options);
    return this.parse(VersionInfoSchema, body, '/version');
  }

  /** All proxies and groups keyed by name */
  async getProxies(options: RequestOptions = {}): Promise<Record<string, ProxyInfo>> {
    const body = await this.requestJson('/proxies', options);
    return this.parse(ProxiesSchema, body, '/proxies').proxies;
  }

  async getProxy(name: string, options: RequestOptions = {}): Promise<ProxyInfo> {
    const route = `/proxies/${encodeURIComponent(name)}`;
    const body = await this.requestJson(route, options);
    return this.parse(ProxyInfoSchema, body, route);
  }

  /** Entries with members, sorted by name */
  async getProxyGroups(options: RequestOptions = {}): Promise<ProxyGroup[]> {
    const proxies = await this.getProxies(options);
    const groups: ProxyGroup[] = [];
    for (const proxy of Object.values(proxies)) {
      if (!proxy.all) continue;
      groups.push({ name: proxy.name, type: proxy.type, now: proxy.now ?? '', all: proxy.all });
    }
    return groups.sort((a, b) => a.name.localeCompare(b.name));
  }

  /**
   * Select a member of a selector group.
   */
  async switchProxy(group: string, proxy: string, options: RequestOptions = {}): Promise<void> {
    await this.request(`/proxies/${encodeURIComponent(group)}`, {
      ...options,
      method: 'PUT',
      body: { name: proxy },
    });
  }

  /**
   * Latency of a proxy in milliseconds, measured by the instance.
   */
  async testDelay(name: string, options: DelayTestOptions = {}): Promise<number> {
    const timeout = options.timeoutMs ?? DEFAULT_DELAY_TIMEOUT_MS;
    const query = new URLSearchParams({
      timeout: String(timeout),
      url: options.url ?? DEFAULT_DELAY_TEST_URL,
    });
    const route = `/proxies/${encodeURIComponent(name)}/delay?${query.toString()}`;
    const body = await this.requestJson(route, {
      signal: options.signal,
      timeoutMs: timeout + 2000,
    });
    return this.parse(DelaySchema, body, route).delay;
  }

  async getConnections(options: RequestOptions = {}): Promise<ConnectionsSnapshot> {
    const body = await this.requestJson('/connections', options);
    return this.parse(ConnectionsSchema, body, '/connections');
  }

  async closeConnection(id: string, options: RequestOptions = {}): Promise<void> {
    await this.request(`/connections/${encodeURIComponent(id)}`, { ...options, method: 'DELETE' });
  }

  async closeAllConnections(options: RequestOptions = {}): Promise<void> {
    await this.request('/connections', { ...options, method: 'DELETE' });
  }

  /**
   * Ask the instance to reload its configuration, optionally from another file.
   */
  async reloadConfig(configPath?: string, options: RequestOptions = {}): Promise<void> {
    await this.request('/configs?force=true', {
      ...options,
      method: 'PUT',
      body: { path: configPath ?? '' },
    });
  }

  /**
   * One memory sample: the first line of the streamed /memory response.
   * The stream is closed once the line arrives.
   */
  async getMemory(options: RequestOptions = {}): Promise<MemorySample> {
    const line = await this.exchange('/memory', options, readFirstLine);
    return this.parse(MemorySchema, parseJson(line, '/memory'), '/memory');
  }

  subscribeLogs(options: LogSubscriptionOptions = {}): Subscription<LogEntry> {
    const level = options.level ?? 'info';
    const minimum = logLevelRank(level);
    const needle = options.filter;
    return new Subscription<LogEntry>({
      kind: 'log',
      url: toWebSocketUrl(this.baseUrl, `/logs?level=${level}`),
      secret: this.secret,
      decode: decodeWith(LogEntrySchema, 'log'),
      filter: (entry) =>
        logLevelRank(entry.type) >= minimum && (!needle || entry.payload.includes(needle)),
      capacity: LOG_CHANNEL_CAPACITY,
      policy: 'block',
      reconnect: this.reconnect,
      signal: options.signal,
    });
  }

  subscribeTraffic(options: StreamOptions = {}): Subscription<TrafficSample> {
    return new Subscription<TrafficSample>({
      kind: 'traffic',
      url: toWebSocketUrl(this.baseUrl, '/traffic'),
      secret: this.secret,
      decode: decodeWith(TrafficSchema, 'traffic'),
      capacity: SAMPLE_CHANNEL_CAPACITY,
      policy: 'drop-oldest',
      reconnect: this.reconnect,
      signal: options.signal,
    });
  }

  subscribeMemory(options: StreamOptions = {}): Subscription<MemorySample> {
    return new Subscription<MemorySample>({
      kind: 'memory',
      url: toWebSocketUrl(this.baseUrl, '/memory'),
      secret: this.secret,
      decode: decodeWith(MemorySchema, 'memory'),
      capacity: SAMPLE_CHANNEL_CAPACITY,
      policy: 'drop-oldest',
      reconnect: this.reconnect,
      signal: options.signal,
    });
  }

  private async requestJson(route: string, options: HttpRequest): Promise<unknown> {
    const text = await this.exchange(route, options, (response) => response.text());
    return parseJson(text, route);
  }

  /** Request whose body is drained and discarded */
  private async request(route: string, options: HttpRequest): Promise<void> {
    await this.exchange(route, options, (response) => response.text());
  }

  private parse<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, body: unknown, route: string): T {
    const result = schema.safeParse(body);
    if (!result.success) {
      const issue = result.error.issues[0];
      throw new NetworkError(
        `Unexpected response from ${route}: ${issue.path.join('.') || '(body)'} ${issue.message}`
      );
    }
    return result.data;
  }

  /**
   * Issue a request, read its body with `read` and map failures onto the
   * error taxonomy. The timeout and the caller's signal cover the whole
   * exchange, body included; `read` only sees 2xx responses.
   */
  private async exchange<T>(
    route: string,
    options: HttpRequest,
    read: (response: Response) => Promise<T>
  ): Promise<T> {
    const url = `${this.baseUrl}${route}`;
    const method = options.method ?? 'GET';
    const what = `${method} ${route}`;
    const timeoutMs = options.timeoutMs ?? this.timeoutMs;
    const controller = new AbortController();

    let timedOut = false;
    const timer = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, timeoutMs);
    const onAbort = () => controller.abort();
    options.signal?.addEventListener('abort', onAbort, { once: true });
    if (options.signal?.aborted) controller.abort();

    const headers: Record<string, string> = { Accept: 'application/json' };
    if (this.secret) headers['Authorization'] = `Bearer ${this.secret}`;
    if (options.body !== undefined) headers['Content-Type'] = 'application/json';

    let stage: 'connect' | 'read' = 'connect';
    try {
      log.debug(`${method} ${url}`);
      const response = await fetch(url, {
        method,
        headers,
        body: options.body === undefined ? undefined : JSON.stringify(options.body),
        signal: controller.signal,
      });
      stage = 'read';
      if (!response.ok) {
        throw await this.toError(response, what);
      }
      return await read(response);
    } catch (error) {
      if (timedOut) {
        throw new NetworkError(`${what} timed out after ${timeoutMs}ms`, { cause: error });
      }
      if (options.signal?.aborted) {
        throw new NetworkError(`${what} cancelled`, { cause: error });
      }
      if (isManagerError(error)) throw error;
      if (stage === 'read') {
        throw new NetworkError(`${what} failed while reading the response: ${describeCause(error)}`, {
          cause: error,
        });
      }
      throw new NetworkError(`Control plane unreachable at ${this.baseUrl}: ${describeCause(error)}`, {
        cause: error,
      });
    } finally {
      clearTimeout(timer);
      options.signal?.removeEventListener('abort', onAbort);
      // Closes a body that was only partly read, such as the /memory stream
      controller.abort();
    }
  }

  private async toError(response: Response, what: string): Promise<Error> {
    const status = response.status;
    let detail = '';
    try {
      const text = await response.text();
      const parsed = ErrorBodySchema.safeParse(safeJson(text));
      detail = parsed.success ? parsed.data.message : text.trim();
    } catch (error) {
      log.debug(`Could not read error body: ${describeCause(error)}`);
    }
    const suffix = detail ? `: ${detail}` : '';

    if (status === 401 || status === 403) {
      return new AuthError(`Control plane rejected ${what} (HTTP ${status}); check the profile secret`);
    }
    if (status === 404) {
      return new NotFoundError(`${what} not found${suffix}`);
    }
    if (status === 400) {
      return new ValidationError(`${what} rejected${suffix}`);
    }
    return new NetworkError(`${what} failed with HTTP ${status}${suffix}`, { statusCode: status });
  }
}

function safeJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return null;
  }
}

function parseJson(text: string, route: string): unknown {
  try {
    return JSON.parse(text);
  } catch (error) {
    throw new NetworkError(`Invalid JSON from ${route}`, { cause: error });
  }
}

function describeCause(error: unknown): string {
  if (isManagerError(error)) return error.message;
  if (error instanceof Error) {
    const cause = error.cause;
    if (cause instanceof Error && cause.message) return cause.message;
    return error.message;
  }
  return String(error);
}

async function readFirstLine(response: Response): Promise<string> {
  if (!response.body) {
    throw new NetworkError('Empty response body');
  }
  const reader = response.body.getReader();
  const decoder = new TextDecoder();
  let text = '';
  try {
    for (;;) {
      const { done, value } = await reader.read();
      if (value) text += decoder.decode(value, { stream: true });
      const newline = text.indexOf('\n');
      if (newline >= 0) return text.slice(0, newline);
      if (done) return text;
    }
  } finally {
    reader.releaseLock();
  }
}
