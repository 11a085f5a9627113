/**
 * doorsync Event Stream
 *
 * Maintains the SignalR connection to the panel's notification hub:
 *
 *   negotiate → websocket → handshake → Init → subscribeToStatus(panels)
 *
 * The door directory is rebuilt on every connect, so a reconnect picks up
 * doors and controllers added while the stream was down.
 *
 * Inbound payloads are handled one at a time in arrival order. Lost
 * connections are retried with capped exponential backoff plus jitter.
 * Repeated credential rejections stop the loop in the ERROR state until
 * `start()` is called again. While running, door status is also polled on an
 * interval so that anything missed while disconnected is caught up.
 */

import WebSocket from 'ws';
import { z } from 'zod';
import { ConnectionState, type PanelEvent } from '@doorsync/core';
import type { DoorDirectory } from './door-directory.js';
import { AuthError, createLogger, errorMessage, type Logger } from './edge-logger.js';
import type { EventNormalizer } from './event-normalizer.js';
import type { JsonRecord } from './payload.js';
import type { SessionManager } from './session-manager.js';
import {
  HubMessageType,
  decodeFrames,
  encodeHandshake,
  encodeInvocation,
  encodePing,
  type HubMessage,
} from './signalr.js';

// ============================================================================
// Socket abstraction
// ============================================================================

/** The parts of a websocket the stream uses. */
export interface HubSocket {
  send(data: string): void;
  close(code?: number, reason?: string): void;
  onOpen(callback: () => void): void;
  onMessage(callback: (text: string) => void): void;
  onClose(callback: (code: number, reason: string) => void): void;
  onError(callback: (err: Error) => void): void;
}

export interface HubSocketOptions {
  cookie: string | null;
  verifyTls: boolean;
}

export type HubSocketFactory = (url: string, options: HubSocketOptions) => HubSocket;

function rawDataToText(data: WebSocket.RawData): string {
  if (Array.isArray(data)) return Buffer.concat(data).toString('utf8');
  if (data instanceof ArrayBuffer) return Buffer.from(data).toString('utf8');
  return data.toString('utf8');
}

/** Default factory backed by the `ws` package. */
export const createWsSocket: HubSocketFactory = (url, options) => {
  const ws = new WebSocket(url, {
    headers: options.cookie ? { Cookie: options.cookie } : {},
    rejectUnauthorized: options.verifyTls,
  });
  return {
    send: (data) => ws.send(data),
    close: (code, reason) => ws.close(code, reason),
    onOpen: (callback) => ws.on('open', callback),
    onMessage: (callback) => ws.on('message', (data) => callback(rawDataToText(data))),
    onClose: (callback) => ws.on('close', (code, reason) => callback(code, reason.toString())),
    onError: (callback) => ws.on('error', callback),
  };
};

// ============================================================================
// Types
// ============================================================================

export interface DoorStatusSource {
  getDoorStatus(doorId: number): Promise<JsonRecord | null>;
}

export type ConnectionStateCallback = (state: ConnectionState, detail?: string) => void;

export interface EventStreamConfig {
  session: SessionManager;
  directory: DoorDirectory;
  normalizer: EventNormalizer;
  statusSource: DoorStatusSource;
  onEvents: (events: PanelEvent[]) => void;
  /** Called after the directory was rebuilt because of pushed data. */
  onDirectoryRefreshed?: () => void;
  verifyTls?: boolean;
  /** Default: 5000 (5s) */
  reconnectBaseMs?: number;
  /** Default: 30000 (30s) */
  reconnectMaxMs?: number;
  /** Upper bound of the random delay added to each backoff. Default: 1500 */
  reconnectJitterMs?: number;
  /** Default: 15000 (15s) */
  keepAliveMs?: number;
  /** Connection is considered dead after this long without inbound data. Default: 30000 (30s) */
  silenceTimeoutMs?: number;
  /** Default: 60000 (1m) */
  snapshotIntervalMs?: number;
  /** Time allowed for open plus handshake. Default: 10000 (10s) */
  handshakeTimeoutMs?: number;
  /** Consecutive credential failures before giving up. Default: 3 */
  maxAuthFailures?: number;
  /** Minimum time between directory refreshes triggered by pushed data. Default: 10000 (10s) */
  directoryRefreshCooldownMs?: number;
  /** Time `stop()` waits for in-flight inbound handling. Default: 3000 (3s) */
  stopGraceMs?: number;
  socketFactory?: HubSocketFactory;
  random?: () => number;
  now?: () => number;
  logger?: Logger;
}

const negotiateSchema = z
  .object({
    connectionToken: z.string().optional(),
    connectionId: z.string().optional(),
  })
  .passthrough();

const HUB_PATH = '/rt/notificationHub';
const INIT_INVOCATION_ID = '1';

// ============================================================================
// EventStream
// ============================================================================

export class EventStream {
  private readonly session: SessionManager;
  private readonly directory: DoorDirectory;
  private readonly normalizer: EventNormalizer;
  private readonly statusSource: DoorStatusSource;
  private readonly onEvents: (events: PanelEvent[]) => void;
  private readonly onDirectoryRefreshed?: () => void;
  private readonly verifyTls: boolean;
  private readonly reconnectBaseMs: number;
  private readonly reconnectMaxMs: number;
  private readonly reconnectJitterMs: number;
  private readonly keepAliveMs: number;
  private readonly silenceTimeoutMs: number;
  private readonly snapshotIntervalMs: number;
  private readonly handshakeTimeoutMs: number;
  private readonly maxAuthFailures: number;
  private readonly directoryRefreshCooldownMs: number;
  private readonly stopGraceMs: number;
  private readonly socketFactory: HubSocketFactory;
  private readonly random: () => number;
  private readonly now: () => number;
  private readonly log: Logger;

  private state: ConnectionState = ConnectionState.IDLE;
  private stateCallbacks: ConnectionStateCallback[] = [];
  private socket: HubSocket | null = null;
  private subscribedPanels: string[] = [];
  private attempt = 0;
  private authFailures = 0;
  private stopped = true;
  private connectGeneration = 0;
  private nextInvocationId = 1;
  private lastReceivedAt = 0;
  private lastDirectoryRefreshAt = Number.NEGATIVE_INFINITY;
  private inbound: Promise<void> = Promise.resolve();
  private snapshotInFlight: Promise<number> | null = null;

  private reconnectHandle: ReturnType<typeof setTimeout> | null = null;
  private keepAliveHandle: ReturnType<typeof setInterval> | null = null;
  private snapshotHandle: ReturnType<typeof setInterval> | null = null;

  constructor(config: EventStreamConfig) {
    this.session = config.session;
    this.directory = config.directory;
    this.normalizer = config.normalizer;
    this.statusSource = config.statusSource;
    this.onEvents = config.onEvents;
    this.onDirectoryRefreshed = config.onDirectoryRefreshed;
    this.verifyTls = config.verifyTls ?? false;
    this.reconnectBaseMs = config.reconnectBaseMs ?? 5000;
    this.reconnectMaxMs = config.reconnectMaxMs ?? 30000;
    this.reconnectJitterMs = config.reconnectJitterMs ?? 1500;
    this.keepAliveMs = config.keepAliveMs ?? 15000;
    this.silenceTimeoutMs = config.silenceTimeoutMs ?? 30000;
    this.snapshotIntervalMs = config.snapshotIntervalMs ?? 60000;
    this.handshakeTimeoutMs = config.handshakeTimeoutMs ?? 10000;
    this.maxAuthFailures = config.maxAuthFailures ?? 3;
    this.directoryRefreshCooldownMs = config.directoryRefreshCooldownMs ?? 10000;
    this.stopGraceMs = config.stopGraceMs ?? 3000;
    this.socketFactory = config.socketFactory ?? createWsSocket;
    this.random = config.random ?? Math.random;
    this.now = config.now ?? Date.now;
    this.log = config.logger ?? createLogger('event-stream');
  }

  // ---------- Public API ----------

  get connectionState(): ConnectionState {
    return this.state;
  }

  get panels(): readonly string[] {
    return this.subscribedPanels;
  }

  onStateChange(callback: ConnectionStateCallback): () => void {
    this.stateCallbacks.push(callback);
    return () => {
      this.stateCallbacks = this.stateCallbacks.filter((c) => c !== callback);
    };
  }

  /** Connect and keep the connection alive until `stop()`. */
  start(): void {
    if (!this.stopped) return;
    this.stopped = false;
    this.attempt = 0;
    this.authFailures = 0;
    this.connect().catch((err: unknown) => {
      this.log.error({ err: errorMessage(err) }, 'Connect loop failed');
    });
  }

  async stop(): Promise<void> {
    this.stopped = true;
    this.connectGeneration++;
    this.clearTimers();
    this.closeSocket(1000, 'client stopping');

    let graceHandle: ReturnType<typeof setTimeout> | undefined;
    const grace = new Promise<void>((resolve) => {
      graceHandle = setTimeout(resolve, this.stopGraceMs);
    });
    await Promise.race([this.inbound, grace]);
    clearTimeout(graceHandle);

    this.setState(ConnectionState.STOPPED);
  }

  /**
   * Poll every door's status once. Concurrent calls share one poll.
   * Resolves to the number of doors read.
   */
  snapshotNow(): Promise<number> {
    if (!this.snapshotInFlight) {
      this.snapshotInFlight = this.pollStatus().finally(() => {
        this.snapshotInFlight = null;
      });
    }
    return this.snapshotInFlight;
  }

  /** The delay before reconnect attempt `attempt` (0-based). */
  backoffDelay(attempt: number): number {
    const exponential = Math.min(this.reconnectBaseMs * 2 ** attempt, this.reconnectMaxMs);
    return exponential + this.random() * this.reconnectJitterMs;
  }

  // ---------- Connection lifecycle ----------

  private async connect(): Promise<void> {
    const generation = ++this.connectGeneration;
    this.setState(ConnectionState.CONNECTING);

    try {
      await this.session.ensureSession();
      await this.directory.refresh();
      this.onDirectoryRefreshed?.();
      const url = await this.negotiate();
      if (generation !== this.connectGeneration) return;

      const socket = this.socketFactory(url, { cookie: this.session.cookieHeader(), verifyTls: this.verifyTls });
      this.socket = socket;
      await this.openAndHandshake(socket);
      if (generation !== this.connectGeneration) {
        socket.close(1000, 'superseded');
        return;
      }

      socket.onClose((code, reason) => this.handleClose(socket, code, reason));
      this.normalizer.resetConnection();
      this.lastReceivedAt = this.now();
      this.nextInvocationId = Number(INIT_INVOCATION_ID) + 1;
      socket.send(encodeInvocation('Init', [null, null], INIT_INVOCATION_ID));
      this.subscribe(socket);

      this.attempt = 0;
      this.authFailures = 0;
      this.startTimers();
      this.setState(ConnectionState.RUNNING);
      this.log.info({ panels: this.subscribedPanels.length }, 'Event stream connected');

      this.snapshotNow().catch((err: unknown) => {
        this.log.warn({ err: errorMessage(err) }, 'Initial snapshot failed');
      });
    } catch (err: unknown) {
      if (generation !== this.connectGeneration || this.stopped) return;
      this.closeSocket(1000, 'connect failed');
      this.handleConnectFailure(err);
    }
  }

  private handleConnectFailure(err: unknown): void {
    if (err instanceof AuthError && err.reason === 'credentials') {
      this.authFailures++;
      if (this.authFailures >= this.maxAuthFailures) {
        this.log.error({ failures: this.authFailures }, 'Credentials rejected repeatedly; giving up');
        this.stopped = true;
        this.setState(ConnectionState.ERROR, err.message);
        return;
      }
    }
    this.log.warn({ err: errorMessage(err), attempt: this.attempt }, 'Event stream connect failed');
    this.scheduleReconnect();
  }

  private scheduleReconnect(): void {
    if (this.stopped || this.reconnectHandle) return;
    const wait = this.backoffDelay(this.attempt);
    this.attempt++;
    this.setState(ConnectionState.RECONNECTING);
    this.log.info({ delayMs: Math.round(wait), attempt: this.attempt }, 'Reconnecting');

    this.reconnectHandle = setTimeout(() => {
      this.reconnectHandle = null;
      this.connect().catch((err: unknown) => {
        this.log.error({ err: errorMessage(err) }, 'Reconnect failed');
      });
    }, wait);
  }

  private async negotiate(): Promise<string> {
    const data = await this.session.execute({
      method: 'POST',
      path: `${HUB_PATH}/negotiate`,
      query: { negotiateVersion: '1' },
    });
    const parsed = negotiateSchema.safeParse(data);
    const token = parsed.success ? (parsed.data.connectionToken ?? parsed.data.connectionId) : undefined;
    if (!token) {
      throw new Error('Negotiate response carried no connection token');
    }
    const wsBase = this.session.baseUrl.replace(/^http/i, 'ws');
    return `${wsBase}${HUB_PATH}?id=${encodeURIComponent(token)}`;
  }

  private openAndHandshake(socket: HubSocket): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      let settled = false;
      const finish = (err?: Error) => {
        if (settled) return;
        settled = true;
        clearTimeout(timeout);
        if (err) reject(err);
        else resolve();
      };
      const timeout = setTimeout(() => finish(new Error('Hub handshake timed out')), this.handshakeTimeoutMs);

      socket.onOpen(() => socket.send(encodeHandshake()));
      socket.onError((err) => finish(err));
      socket.onClose((code, reason) => finish(new Error(`Socket closed during handshake (${code}${reason ? `: ${reason}` : ''})`)));
      socket.onMessage((text) => {
        const receivedAt = this.now();
        if (!settled) {
          const { frames } = decodeFrames(text);
          const handshake = frames.find((f) => f.kind === 'handshake');
          if (!handshake) return;
          if (handshake.error) {
            finish(new Error(`Hub handshake rejected: ${handshake.error}`));
            return;
          }
          finish();
          const rest = frames.filter((f) => f !== handshake);
          const messages = rest.flatMap((f) => (f.kind === 'message' ? [f.message] : []));
          if (messages.length > 0) this.enqueue(() => this.handleMessages(messages, receivedAt));
          return;
        }
        this.lastReceivedAt = receivedAt;
        this.enqueue(() => this.handlePayload(text, receivedAt));
      });
    });
  }

  private subscribe(socket: HubSocket): void {
    const panels = this.directory.panels();
    this.subscribedPanels = panels;
    if (panels.length > 0) {
      socket.send(encodeInvocation('subscribeToStatus', [panels], String(this.nextInvocationId++)));
    }
  }

  private handleClose(socket: HubSocket, code: number, reason: string): void {
    if (socket !== this.socket) return;
    this.socket = null;
    this.clearTimers();
    if (this.stopped) return;
    this.log.warn({ code, reason }, 'Event stream disconnected');
    this.scheduleReconnect();
  }

  private closeSocket(code: number, reason: string): void {
    const socket = this.socket;
    this.socket = null;
    if (!socket) return;
    try {
      socket.close(code, reason);
    } catch (err: unknown) {
      this.log.debug({ err: errorMessage(err) }, 'Socket close failed');
    }
  }

  // ---------- Inbound ----------

  private enqueue(task: () => Promise<void>): void {
    this.inbound = this.inbound.then(task).catch((err: unknown) => {
      this.log.error({ err: errorMessage(err) }, 'Inbound handling failed');
    });
  }

  /** `receivedAt` is the arrival time, which stamps every event the payload yields. */
  private async handlePayload(text: string, receivedAt: number): Promise<void> {
    const { frames, malformed } = decodeFrames(text);
    for (const record of malformed) {
      this.log.debug({ record: record.slice(0, 200) }, 'Malformed hub record ignored');
    }
    await this.handleMessages(
      frames.flatMap((f) => (f.kind === 'message' ? [f.message] : [])),
      receivedAt,
    );
  }

  private async handleMessages(messages: HubMessage[], receivedAt: number): Promise<void> {
    for (const message of messages) {
      if (message.type === HubMessageType.INVOCATION) {
        const result = this.normalizer.normalizeInvocation(message, receivedAt);
        if (result.events.length > 0) this.onEvents(result.events);
        if (result.refreshDirectory) await this.refreshDirectory();
      } else if (message.type === HubMessageType.COMPLETION) {
        if (message.error) {
          this.log.warn({ invocationId: message.invocationId, error: message.error }, 'Hub invocation failed');
        } else if (message.invocationId === INIT_INVOCATION_ID) {
          this.normalizer.observeDialect(message.result);
        }
      } else if (message.type === HubMessageType.CLOSE) {
        this.log.warn({ error: message.error }, 'Hub requested close');
        this.socket?.close(1000, 'hub close');
      }
    }
  }

  /** Rebuild the directory, retry buffered notifications and pick up new panels. */
  private async refreshDirectory(): Promise<void> {
    const now = this.now();
    if (now - this.lastDirectoryRefreshAt < this.directoryRefreshCooldownMs) return;
    this.lastDirectoryRefreshAt = now;

    try {
      await this.directory.refresh();
    } catch (err: unknown) {
      this.log.warn({ err: errorMessage(err) }, 'Directory refresh failed');
      return;
    }
    this.onDirectoryRefreshed?.();

    const retried = this.normalizer.retryPending();
    if (retried.length > 0) this.onEvents(retried);

    const panels = this.directory.panels();
    const socket = this.socket;
    if (socket && panels.join('|') !== this.subscribedPanels.join('|')) {
      this.subscribe(socket);
    }
  }

  // ---------- Timers ----------

  private startTimers(): void {
    this.clearTimers();
    this.keepAliveHandle = setInterval(() => this.keepAlive(), this.keepAliveMs);
    this.snapshotHandle = setInterval(() => {
      this.snapshotNow().catch((err: unknown) => {
        this.log.warn({ err: errorMessage(err) }, 'Snapshot failed');
      });
    }, this.snapshotIntervalMs);
  }

  private clearTimers(): void {
    if (this.keepAliveHandle) {
      clearInterval(this.keepAliveHandle);
      this.keepAliveHandle = null;
    }
    if (this.snapshotHandle) {
      clearInterval(this.snapshotHandle);
      this.snapshotHandle = null;
    }
    if (this.reconnectHandle) {
      clearTimeout(this.reconnectHandle);
      this.reconnectHandle = null;
    }
  }

  private keepAlive(): void {
    const socket = this.socket;
    if (!socket) return;
    if (this.now() - this.lastReceivedAt > this.silenceTimeoutMs) {
      this.log.warn({ silentMs: this.now() - this.lastReceivedAt }, 'Hub silent; dropping connection');
      this.socket = null;
      this.closeQuietly(socket);
      this.clearTimers();
      this.scheduleReconnect();
      return;
    }
    socket.send(encodePing());
  }

  private closeQuietly(socket: HubSocket): void {
    try {
      socket.close(4000, 'silence');
    } catch (err: unknown) {
      this.log.debug({ err: errorMessage(err) }, 'Socket close failed');
    }
  }

  private async pollStatus(): Promise<number> {
    if (this.normalizer.pendingCount > 0) await this.refreshDirectory();

    const doorIds = this.directory.doorIds();
    let read = 0;
    for (const doorId of doorIds) {
      if (this.stopped) break;
      const requestedAt = this.now();
      try {
        const payload = await this.statusSource.getDoorStatus(doorId);
        if (!payload) continue;
        const events = this.normalizer.normalizeSnapshot(doorId, payload, requestedAt);
        if (events.length > 0) this.onEvents(events);
        read++;
      } catch (err: unknown) {
        this.log.warn({ doorId, err: errorMessage(err) }, 'Door status poll failed');
      }
    }
    return read;
  }

  private setState(state: ConnectionState, detail?: string): void {
    if (this.state === state) return;
    this.state = state;
    for (const callback of this.stateCallbacks) {
      try {
        callback(state, detail);
      } catch (err: unknown) {
        this.log.error({ err: errorMessage(err) }, 'State callback error');
      }
    }
  }
}
