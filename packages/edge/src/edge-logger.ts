/**
 * Logger and error taxonomy for @doorsync/edge
 *
 * createLogger(name) returns a pino child logger tagged with the component
 * name. Session cookies and passwords are redacted.
 */

import { pino, type Logger } from 'pino';

export type { Logger };

function defaultLevel(): string {
  if (process.env.LOG_LEVEL) return process.env.LOG_LEVEL;
  return process.env.NODE_ENV === 'test' ? 'silent' : 'info';
}

let root: Logger | null = null;

function rootLogger(): Logger {
  if (!root) {
    root = pino({
      name: 'doorsync',
      level: defaultLevel(),
      redact: ['password', '*.password', 'headers.cookie', 'headers.Cookie', 'token'],
      transport:
        process.env.NODE_ENV === 'development'
          ? { target: 'pino-pretty', options: { translateTime: 'HH:MM:ss Z', ignore: 'pid,hostname' } }
          : undefined,
    });
  }
  return root;
}

export function createLogger(name: string): Logger {
  return rootLogger().child({ component: name });
}

// ============================================================================
// Errors
// ============================================================================

export type AuthFailureReason = 'credentials' | 'network';

/** Login failed, or a request stayed unauthorized after one re-login. */
export class AuthError extends Error {
  readonly reason: AuthFailureReason;
  readonly statusCode?: number;

  constructor(message: string, reason: AuthFailureReason, statusCode?: number) {
    super(message);
    this.name = 'AuthError';
    this.reason = reason;
    this.statusCode = statusCode;
  }
}

export class TransportError extends Error {
  readonly statusCode?: number;
  readonly isTimeout: boolean;

  constructor(message: string, statusCode?: number, isTimeout = false) {
    super(message);
    this.name = 'TransportError';
    this.statusCode = statusCode;
    this.isTimeout = isTimeout;
  }
}

export class ValidationError extends Error {
  readonly field: string;

  constructor(message: string, field: string) {
    super(message);
    this.name = 'ValidationError';
    this.field = field;
  }
}

/** The panel answered a command with an error. `panelMessage` is its own text. */
export class RemoteRejection extends Error {
  readonly statusCode: number;
  readonly panelMessage: string;

  constructor(panelMessage: string, statusCode: number, context?: string) {
    super(context ? `${context}: ${panelMessage}` : panelMessage);
    this.name = 'RemoteRejection';
    this.statusCode = statusCode;
    this.panelMessage = panelMessage;
  }
}

/** Logged when pushed data cannot be reconciled. Never thrown. */
export class ReconciliationWarning extends Error {
  readonly doorId?: number;
  readonly detail: Record<string, unknown>;

  constructor(message: string, detail: Record<string, unknown> = {}, doorId?: number) {
    super(message);
    this.name = 'ReconciliationWarning';
    this.detail = detail;
    this.doorId = doorId;
  }

  toLogObject(): Record<string, unknown> {
    return { warning: this.name, doorId: this.doorId, ...this.detail };
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
