import * as http from 'http';
import { Duplex } from 'stream';
import { WebSocket, WebSocketServer } from 'ws';
import { readBody, sendJson, startHttpServer, TestHttpServer } from './http-server';

export interface FakeProxy {
  name: string;
  type: string;
  now?: string;
  all?: string[];
  history: Array<{ time: string; delay: number }>;
}

export interface FakeConnection {
  id: string;
  metadata: Record<string, string>;
  upload: number;
  download: number;
  start: string;
  chains: string[];
  rule: string;
  rulePayload: string;
}

export type StreamPath = '/logs' | '/traffic' | '/memory';

/**
 * In-process stand-in for the mihomo external controller: the REST routes the
 * manager uses plus the WebSocket streams.
 */
export class FakeController {
  secret = 'test-secret';
  /** Answer every REST call with this status instead of routing it */
  failWith: number | null = null;
  /** Never answer REST calls */
  hang = false;
  /** Refuse WebSocket handshakes with this status */
  rejectUpgradeWith: number | null = null;
  /** Accept WebSocket handshakes, then close the socket at once */
  closeOnConnect = false;
  delay = 42;
  /** Per-proxy delay answers, overriding `delay` */
  delays: Record<string, number> = {};
  /** Proxies whose delay test answers 503 */
  failingDelays = new Set<string>();
  /** Time each delay test takes to answer */
  delayLatencyMs = 0;
  /** Highest number of delay tests answered concurrently */
  maxDelayInFlight = 0;
  memory = { inuse: 1024, oslimit: 0 };
  reloads: unknown[] = [];
  delayQueries: string[] = [];
  proxies: Record<string, FakeProxy> = {
    DIRECT: { name: 'DIRECT', type: 'Direct', history: [] },
    'node-a': {
      name: 'node-a',
      type: 'Shadowsocks',
      history: [{ time: '2026-10-01T00:00:00Z', delay: 120 }],
    },
    'node-b': {
      name: 'node-b',
      type: 'Vmess',
      history: [{ time: '2026-10-01T00:00:00Z', delay: 0 }],
    },
    Proxy: { name: 'Proxy', type: 'Selector', now: 'node-a', all: ['node-a', 'node-b'], history: [] },
    Auto: { name: 'Auto', type: 'URLTest', now: 'node-b', all: ['node-a', 'node-b'], history: [] },
  };
  connections: FakeConnection[] = [
    {
      id: 'c1',
      metadata: {
        network: 'tcp',
        type: 'HTTP',
        sourceIP: '127.0.0.1',
        destinationIP: '93.184.216.34',
        sourcePort: '50000',
        destinationPort: '443',
        host: 'example.com',
      },
      upload: 100,
      download: 2048,
      start: '2026-10-01T00:00:00Z',
      chains: ['node-a', 'Proxy'],
      rule: 'MATCH',
      rulePayload: '',
    },
  ];

  private http: TestHttpServer | null = null;
  private readonly wss = new WebSocketServer({ noServer: true });
  private readonly sockets = new Map<StreamPath, Set<WebSocket>>();
  private delayInFlight = 0;
  /** Full request URL of every accepted WebSocket upgrade */
  readonly upgrades: string[] = [];

  get url(): string {
    if (!this.http) throw new Error('FakeController not started');
    return this.http.url;
  }

  get port(): number {
    if (!this.http) throw new Error('FakeController not started');
    return this.http.port;
  }

  get requests(): string[] {
    return this.http?.requests ?? [];
  }

  async start(): Promise<this> {
    this.http = await startHttpServer((req, res) => {
      this.handle(req, res).catch((error: unknown) => {
        sendJson(res, 500, { message: String(error) });
      });
    });
    this.http.server.on('upgrade', (req: http.IncomingMessage, socket: Duplex, head: Buffer) =>
      this.upgrade(req, socket, head)
    );
    return this;
  }

  async stop(): Promise<void> {
    for (const set of this.sockets.values()) {
      for (const ws of set) ws.terminate();
    }
    this.wss.close();
    await this.http?.close();
    this.http = null;
  }

  clientCount(stream: StreamPath): number {
    return this.sockets.get(stream)?.size ?? 0;
  }

  broadcast(stream: StreamPath, frame: unknown): void {
    for (const ws of this.sockets.get(stream) ?? []) {
      ws.send(JSON.stringify(frame));
    }
  }

  /** Close every live socket of a stream from the server side */
  dropClients(stream: StreamPath): void {
    for (const ws of this.sockets.get(stream) ?? []) ws.close();
  }

  private authorized(req: http.IncomingMessage): boolean {
    return req.headers.authorization === `Bearer ${this.secret}`;
  }

  private upgrade(req: http.IncomingMessage, socket: Duplex, head: Buffer): void {
    const pathname = new URL(req.url ?? '/', 'http://localhost').pathname;
    const status = !this.authorized(req) ? 401 : this.rejectUpgradeWith;
    if (status !== null || !isStreamPath(pathname)) {
      const code = status ?? 404;
      socket.write(`HTTP/1.1 ${code} ${http.STATUS_CODES[code] ?? ''}\r\nConnection: close\r\n\r\n`);
      socket.destroy();
      return;
    }

    this.wss.handleUpgrade(req, socket, head, (ws) => {
      this.upgrades.push(req.url ?? '');
      if (this.closeOnConnect) {
        ws.close();
        return;
      }
      const set = this.sockets.get(pathname) ?? new Set<WebSocket>();
      this.sockets.set(pathname, set);
      set.add(ws);
      ws.on('close', () => set.delete(ws));
    });
  }

  private async handle(req: http.IncomingMessage, res: http.ServerResponse): Promise<void> {
    if (this.hang) return;
    if (!this.authorized(req)) {
      sendJson(res, 401, { message: 'Unauthorized' });
      return;
    }
    if (this.failWith !== null) {
      sendJson(res, this.failWith, { message: 'controller failure' });
      return;
    }

    const url = new URL(req.url ?? '/', 'http://localhost');
    const parts = url.pathname.split('/').filter(Boolean).map(decodeURIComponent);
    const method = req.method ?? 'GET';

    if (method === 'GET' && url.pathname === '/version') {
      sendJson(res, 200, { version: 'v1.19.0', meta: true });
      return;
    }
    if (method === 'GET' && url.pathname === '/memory') {
      res.writeHead(200, { 'Content-Type': 'application/json' });
      res.write(`${JSON.stringify(this.memory)}\n`);
      return;
    }
    if (parts[0] === 'proxies') {
      this.handleProxies(method, parts, url, await readBody(req), res);
      return;
    }
    if (parts[0] === 'connections') {
      this.handleConnections(method, parts, res);
      return;
    }
    if (method === 'PUT' && url.pathname === '/configs') {
      this.reloads.push(JSON.parse(await readBody(req)));
      res.writeHead(204);
      res.end();
      return;
    }
    sendJson(res, 404, { message: 'resource not found' });
  }

  private handleProxies(
    method: string,
    parts: string[],
    url: URL,
    body: string,
    res: http.ServerResponse
  ): void {
    if (parts.length === 1 && method === 'GET') {
      sendJson(res, 200, { proxies: this.proxies });
      return;
    }
    const proxy = this.proxies[parts[1]];
    if (!proxy) {
      sendJson(res, 404, { message: 'resource not found' });
      return;
    }
    if (parts.length === 2 && method === 'GET') {
      sendJson(res, 200, proxy);
      return;
    }
    if (parts.length === 2 && method === 'PUT') {
      const requested: unknown = JSON.parse(body);
      const name =
        typeof requested === 'object' && requested !== null && 'name' in requested
          ? String(requested.name)
          : '';
      if (!proxy.all || !proxy.all.includes(name)) {
        sendJson(res, 400, { message: 'Selector update error: Proxy does not exist' });
        return;
      }
      proxy.now = name;
      res.writeHead(204);
      res.end();
      return;
    }
    if (parts.length === 3 && parts[2] === 'delay' && method === 'GET') {
      this.delayQueries.push(url.search);
      this.delayInFlight++;
      this.maxDelayInFlight = Math.max(this.maxDelayInFlight, this.delayInFlight);
      setTimeout(() => {
        this.delayInFlight--;
        if (this.failingDelays.has(proxy.name)) {
          sendJson(res, 503, { message: 'An error occurred in the delay test' });
        } else {
          sendJson(res, 200, { delay: this.delays[proxy.name] ?? this.delay });
        }
      }, this.delayLatencyMs);
      return;
    }
    sendJson(res, 404, { message: 'resource not found' });
  }

  private handleConnections(method: string, parts: string[], res: http.ServerResponse): void {
    if (method === 'GET' && parts.length === 1) {
      sendJson(res, 200, {
        downloadTotal: 4096,
        uploadTotal: 512,
        connections: this.connections.length > 0 ? this.connections : null,
      });
      return;
    }
    if (method === 'DELETE' && parts.length === 1) {
      this.connections = [];
      res.writeHead(204);
      res.end();
      return;
    }
    if (method === 'DELETE' && parts.length === 2) {
      this.connections = this.connections.filter((c) => c.id !== parts[1]);
      res.writeHead(204);
      res.end();
      return;
    }
    sendJson(res, 404, { message: 'resource not found' });
  }
}

function isStreamPath(pathname: string): pathname is StreamPath {
  return pathname === '/logs' || pathname === '/traffic' || pathname === '/memory';
}

export async function waitUntil(condition: () => boolean, timeoutMs = 5000): Promise<void> {
  const deadline = Date.now() + timeoutMs;
  while (!condition()) {
    if (Date.now() > deadline) throw new Error('condition not met in time');
    await new Promise((resolve) => setTimeout(resolve, 10));
  }
}
