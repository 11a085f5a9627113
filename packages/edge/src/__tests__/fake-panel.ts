import { vi } from 'vitest';
import type { HubSocket, HubSocketFactory, HubSocketOptions } from '../event-stream.js';
import { RECORD_SEPARATOR } from '../signalr.js';

/**
 * In-process stand-in for the panel's HTTP API. Install with
 * `vi.stubGlobal('fetch', panel.fetch)`.
 */

export interface RecordedCall {
  method: string;
  path: string;
  query: URLSearchParams;
  body: unknown;
  cookie: string | null;
}

export type Route = (call: RecordedCall) => Response | Promise<Response>;

export function json(data: unknown, status = 200): Response {
  return new Response(JSON.stringify(data), { status, headers: { 'Content-Type': 'application/json' } });
}

export class FakePanel {
  readonly calls: RecordedCall[] = [];
  logins = 0;
  /** Token the panel currently accepts; null after `expireSession()`. */
  validToken: string | null = null;
  rejectLogin = false;
  private readonly routes = new Map<string, Route>();

  readonly fetch = vi.fn(async (input: string | URL | Request, init?: RequestInit): Promise<Response> => {
    const url = new URL(input instanceof Request ? input.url : String(input));
    const method = init?.method ?? 'GET';
    const headers = new Headers(init?.headers);
    const body: unknown = typeof init?.body === 'string' ? JSON.parse(init.body) : undefined;

    if (url.pathname === '/auth') {
      if (this.rejectLogin) return json({ Message: 'Invalid credentials' }, 401);
      this.logins++;
      this.validToken = `tok-${this.logins}`;
      return new Response('{}', {
        status: 200,
        headers: { 'Set-Cookie': `ss-id=${this.validToken}; Path=/; HttpOnly` },
      });
    }

    const call: RecordedCall = {
      method,
      path: url.pathname,
      query: url.searchParams,
      body,
      cookie: headers.get('cookie'),
    };
    this.calls.push(call);

    if (call.cookie !== `ss-id=${this.validToken}`) {
      return json({ Message: 'Unauthorized' }, 401);
    }
    const route = this.routes.get(`${method} ${url.pathname}`);
    return route ? route(call) : json({ Message: `No route for ${method} ${url.pathname}` }, 404);
  });

  on(method: string, path: string, route: Route): this {
    this.routes.set(`${method} ${path}`, route);
    return this;
  }

  /** Reply with the same JSON every time. */
  reply(method: string, path: string, data: unknown, status = 200): this {
    return this.on(method, path, () => json(data, status));
  }

  expireSession(): void {
    this.validToken = null;
  }

  callsTo(method: string, path: string): RecordedCall[] {
    return this.calls.filter((c) => c.method === method && c.path === path);
  }
}

// ============================================================================
// Fake hub socket
// ============================================================================

export class FakeSocket implements HubSocket {
  readonly sent: string[] = [];
  closed: { code?: number; reason?: string } | null = null;
  private openCallbacks: Array<() => void> = [];
  private messageCallbacks: Array<(text: string) => void> = [];
  private closeCallbacks: Array<(code: number, reason: string) => void> = [];
  private errorCallbacks: Array<(err: Error) => void> = [];

  constructor(
    readonly url: string,
    readonly options: HubSocketOptions,
  ) {}

  send(data: string): void {
    this.sent.push(data);
  }

  close(code?: number, reason?: string): void {
    if (this.closed) return;
    this.closed = { code, reason };
    for (const callback of this.closeCallbacks) callback(code ?? 1005, reason ?? '');
  }

  onOpen(callback: () => void): void {
    this.openCallbacks.push(callback);
  }

  onMessage(callback: (text: string) => void): void {
    this.messageCallbacks.push(callback);
  }

  onClose(callback: (code: number, reason: string) => void): void {
    this.closeCallbacks.push(callback);
  }

  onError(callback: (err: Error) => void): void {
    this.errorCallbacks.push(callback);
  }

  // ---------- Test controls ----------

  open(): void {
    for (const callback of this.openCallbacks) callback();
  }

  receive(...messages: object[]): void {
    const text = messages.map((m) => `${JSON.stringify(m)}${RECORD_SEPARATOR}`).join('');
    for (const callback of this.messageCallbacks) callback(text);
  }

  /** Open and complete the handshake. */
  accept(): void {
    this.open();
    this.receive({});
  }

  fail(err: Error): void {
    for (const callback of this.errorCallbacks) callback(err);
  }

  /** Server-side drop. */
  drop(code = 1006): void {
    if (this.closed) return;
    this.closed = { code };
    for (const callback of this.closeCallbacks) callback(code, '');
  }

  /** Parsed JSON records this socket sent. */
  sentRecords(): unknown[] {
    return this.sent.flatMap((payload) =>
      payload
        .split(RECORD_SEPARATOR)
        .filter((r) => r.trim())
        .map((r): unknown => JSON.parse(r)),
    );
  }
}

export class FakeSocketFactory {
  readonly sockets: FakeSocket[] = [];

  readonly create: HubSocketFactory = (url, options) => {
    const socket = new FakeSocket(url, options);
    this.sockets.push(socket);
    return socket;
  };

  latest(): FakeSocket {
    const socket = this.sockets[this.sockets.length - 1];
    if (!socket) throw new Error('No socket created yet');
    return socket;
  }
}

/** Let queued promise callbacks run. */
export async function flush(rounds = 10): Promise<void> {
  for (let i = 0; i < rounds; i++) {
    await Promise.resolve();
  }
}
