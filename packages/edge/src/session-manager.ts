/**
 * doorsync Session Manager
 *
 * Executes HTTP requests against the panel with its `ss-id` session cookie.
 * A 401 triggers exactly one re-login and one retry. Concurrent callers that
 * hit a 401 share a single login.
 */

import { Agent } from 'undici';
import type { Session } from '@doorsync/core';
import {
  AuthError,
  RemoteRejection,
  TransportError,
  createLogger,
  errorMessage,
  type Logger,
} from './edge-logger.js';
import { isRecord } from './payload.js';

export const SESSION_COOKIE = 'ss-id';

/** Credentials and the current session token. Holds no logic. */
export interface CredentialStore {
  baseUrl: string;
  username: string;
  password: string;
  token: string | null;
}

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'DELETE';

export interface PanelRequest {
  method: HttpMethod;
  path: string;
  query?: Record<string, string | number | boolean | undefined>;
  body?: unknown;
  timeoutMs?: number;
}

export interface SessionManagerConfig {
  baseUrl: string;
  username: string;
  password: string;
  /** Default: 10000 (10s) */
  timeoutMs?: number;
  /** Verify the panel's TLS certificate. Default: false (panels ship self-signed certificates) */
  verifyTls?: boolean;
  logger?: Logger;
}

type PanelRequestInit = RequestInit & { dispatcher?: Agent };

/**
 * Pull the panel's own error text out of a response body. Panels answer with
 * `Message`, `message`, `error`, `Error` or `ResponseStatus.Message`.
 */
export function extractPanelMessage(data: unknown, fallback: string): string {
  if (typeof data === 'string') {
    const text = data.trim();
    return text ? text.slice(0, 500) : fallback;
  }
  if (isRecord(data)) {
    for (const key of ['Message', 'message', 'error', 'Error']) {
      const value = data[key];
      if (typeof value === 'string' && value.trim()) return value.trim();
    }
    const status = data.ResponseStatus;
    if (isRecord(status) && typeof status.Message === 'string' && status.Message) {
      return status.Message;
    }
  }
  return fallback;
}

export class SessionManager {
  private readonly store: CredentialStore;
  private readonly timeoutMs: number;
  private readonly dispatcher?: Agent;
  private readonly log: Logger;
  private loginInFlight: Promise<string> | null = null;
  private expired = false;
  private loginCount = 0;

  constructor(config: SessionManagerConfig) {
    this.store = {
      baseUrl: config.baseUrl.replace(/\/+$/, ''),
      username: config.username,
      password: config.password,
      token: null,
    };
    this.timeoutMs = config.timeoutMs ?? 10000;
    if (!(config.verifyTls ?? false)) {
      this.dispatcher = new Agent({ connect: { rejectUnauthorized: false } });
    }
    this.log = config.logger ?? createLogger('session');
  }

  get baseUrl(): string {
    return this.store.baseUrl;
  }

  /** Number of logins performed so far. */
  get logins(): number {
    return this.loginCount;
  }

  getToken(): string | null {
    return this.store.token;
  }

  getSession(): Session | null {
    if (!this.store.token) return null;
    return {
      baseUrl: this.store.baseUrl,
      username: this.store.username,
      token: this.store.token,
      expiryState: this.expired ? 'expired' : 'valid',
    };
  }

  /** `Cookie` header value for the current session, or null before login. */
  cookieHeader(): string | null {
    return this.store.token ? `${SESSION_COOKIE}=${this.store.token}` : null;
  }

  /** Replace the credentials. The current session is dropped. */
  setCredentials(username: string, password: string): void {
    this.store.username = username;
    this.store.password = password;
    this.store.token = null;
    this.expired = false;
  }

  /** Return the current token, logging in first when there is none. */
  async ensureSession(): Promise<string> {
    return this.store.token ?? this.login();
  }

  /** Log in, joining a login already in flight. */
  login(): Promise<string> {
    if (!this.loginInFlight) {
      this.loginInFlight = this.performLogin().finally(() => {
        this.loginInFlight = null;
      });
    }
    return this.loginInFlight;
  }

  /**
   * Execute a request with the session cookie and return the parsed body
   * (JSON when it parses, text otherwise, null when empty).
   */
  async execute(request: PanelRequest): Promise<unknown> {
    const usedToken = await this.ensureSession();
    let response = await this.send(request, usedToken);

    if (response.status === 401) {
      this.log.info({ path: request.path }, 'Session rejected, re-authenticating');
      await discardBody(response);
      const renewed = await this.renew(usedToken);
      response = await this.send(request, renewed);
      if (response.status === 401) {
        await discardBody(response);
        throw new AuthError(`Unauthorized after re-authentication: ${request.method} ${request.path}`, 'credentials', 401);
      }
    }

    const data = await readBody(response);
    if (!response.ok) {
      const message = extractPanelMessage(data, response.statusText || `HTTP ${response.status}`);
      throw new RemoteRejection(message, response.status, `${request.method} ${request.path}`);
    }
    return data;
  }

  /** Dispose of the HTTP connection pool. */
  async close(): Promise<void> {
    await this.dispatcher?.close();
  }

  // ---------- Internals ----------

  private renew(staleToken: string): Promise<string> {
    // Another caller already replaced the token this request was sent with.
    if (this.store.token && this.store.token !== staleToken) {
      return Promise.resolve(this.store.token);
    }
    this.expired = true;
    return this.login();
  }

  private async performLogin(): Promise<string> {
    const url = `${this.store.baseUrl}/auth`;
    let response: Response;
    try {
      response = await fetch(url, this.init({
        method: 'POST',
        headers: { 'Content-Type': 'application/json', Accept: 'application/json' },
        body: JSON.stringify({ Username: this.store.username, Password: this.store.password }),
      }));
    } catch (err: unknown) {
      throw new AuthError(`Login failed, panel unreachable: ${errorMessage(err)}`, 'network');
    }

    // Only the status and the cookie matter.
    await discardBody(response);
    if (response.status === 401 || response.status === 403) {
      throw new AuthError('Login rejected: invalid username or password', 'credentials', response.status);
    }
    if (!response.ok) {
      throw new AuthError(`Login failed with HTTP ${response.status}`, 'network', response.status);
    }

    const token = extractSessionCookie(response);
    if (!token) {
      throw new AuthError(`Login response carried no ${SESSION_COOKIE} cookie`, 'credentials', response.status);
    }

    this.store.token = token;
    this.expired = false;
    this.loginCount++;
    this.log.info({ username: this.store.username }, 'Logged in to panel');
    return token;
  }

  private async send(request: PanelRequest, token: string): Promise<Response> {
    const url = new URL(`${this.store.baseUrl}${request.path}`);
    for (const [key, value] of Object.entries(request.query ?? {})) {
      if (value !== undefined) url.searchParams.set(key, String(value));
    }

    const headers: Record<string, string> = {
      Accept: 'application/json',
      Cookie: `${SESSION_COOKIE}=${token}`,
    };
    const init: RequestInit = { method: request.method, headers };
    if (request.body !== undefined) {
      headers['Content-Type'] = 'application/json';
      init.body = JSON.stringify(request.body);
    }

    const timeoutMs = request.timeoutMs ?? this.timeoutMs;
    try {
      return await fetch(url, this.init(init, timeoutMs));
    } catch (err: unknown) {
      if (err instanceof Error && (err.name === 'TimeoutError' || err.name === 'AbortError')) {
        throw new TransportError(`Request timed out after ${timeoutMs}ms: ${request.method} ${request.path}`, undefined, true);
      }
      throw new TransportError(`Network error: ${errorMessage(err)}`);
    }
  }

  private init(init: Omit<RequestInit, 'dispatcher'>, timeoutMs = this.timeoutMs): PanelRequestInit {
    const full: PanelRequestInit = { ...init, signal: AbortSignal.timeout(timeoutMs) };
    if (this.dispatcher) full.dispatcher = this.dispatcher;
    return full;
  }
}

function extractSessionCookie(response: Response): string | null {
  const headers = response.headers.getSetCookie();
  const raw = headers.length > 0 ? headers : (response.headers.get('set-cookie') ?? '').split(/,(?=\s*[^;,=\s]+=)/);
  for (const cookie of raw) {
    const [pair] = cookie.split(';');
    const eq = pair?.indexOf('=') ?? -1;
    if (pair && eq > 0 && pair.slice(0, eq).trim() === SESSION_COOKIE) {
      const value = pair.slice(eq + 1).trim();
      if (value) return value;
    }
  }
  return null;
}

/** Release the connection behind a response whose body is not needed. */
async function discardBody(response: Response): Promise<void> {
  if (response.bodyUsed) return;
  await response.body?.cancel();
}

async function readBody(response: Response): Promise<unknown> {
  const text = await response.text();
  if (!text) return null;
  try {
    const parsed: unknown = JSON.parse(text);
    return parsed;
  } catch {
    return text;
  }
}
