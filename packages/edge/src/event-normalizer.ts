/**
 * doorsync Event Normalizer
 *
 * Turns hub invocations and snapshot payloads into canonical PanelEvents.
 *
 * - `status` frames become lock-state and override events through the
 *   connection's dialect codec.
 * - `notification` frames are routed to a door, then become access, plan or
 *   schedule events (which set the door's log actor) or door messages (which
 *   never do). Some notification texts also imply a status change; those are
 *   synthesized unless a real status frame for the door arrived within the
 *   last second.
 * - Reader notifications that cannot be routed yet wait in a bounded buffer
 *   for one retry after the directory is refreshed, then are dropped.
 */

import { z } from 'zod';
import {
  Dialect,
  LockState,
  ReaderMode,
  findReaderModeInText,
  type LockStateEvent,
  type ModeLegend,
  type OverrideEvent,
  type PanelEvent,
} from '@doorsync/core';
import { codecFor, detectDialect, type DialectCodec, type DoorStatusReading } from './dialects.js';
import type { DoorDirectory } from './door-directory.js';
import { ReconciliationWarning, createLogger, type Logger } from './edge-logger.js';
import { isRecord, type JsonRecord } from './payload.js';
import type { InvocationMessage } from './signalr.js';

// ============================================================================
// Raw payload schemas
// ============================================================================

const idLike = z.union([z.number(), z.string()]).nullish();

const notificationSchema = z
  .object({
    NotificationType: z.string().nullish(),
    Message: z.string().nullish(),
    SourceType: z.string().nullish(),
    SourceName: z.string().nullish(),
    SourceId: idLike,
    UserId: idLike,
    Date: z.string().nullish(),
    PartitionId: idLike,
  })
  .passthrough();

const statusSchema = z
  .object({
    statusType: z.string().nullish(),
    statusId: z.string().nullish(),
  })
  .passthrough();

export type PanelNotification = z.infer<typeof notificationSchema>;

// ============================================================================
// Types
// ============================================================================

export interface NormalizerConfig {
  directory: DoorDirectory;
  /** Fixed dialect. When omitted the first classifiable payload decides. */
  dialect?: Dialect | null;
  legend?: ModeLegend;
  /** Default: 50 */
  pendingLimit?: number;
  /** Window after a real status frame in which synthesized status is dropped. Default: 1000 */
  synthesisGuardMs?: number;
  logger?: Logger;
}

export interface NormalizeResult {
  events: PanelEvent[];
  /** A frame referenced something the directory does not know yet. */
  refreshDirectory: boolean;
}

interface PendingNotification {
  note: PanelNotification;
  receivedAt: number;
  directoryVersion: number;
}

const ACCESS_TYPES = new Set([
  'READER_ACCESS_GRANTED',
  'READER_ACCESS_DENIED',
  'USER_ACCESS_GRANTED',
  'USER_ACCESS_DENIED',
]);
const PLAN_TYPES = new Set(['ACTIONPLAN_MESSAGE', 'ACTIONPLAN_STATE']);

const RESUME_PHRASES = [
  'resume schedule',
  'schedule resumed',
  'returned to schedule',
  'override cleared',
  'has resumed from an overridden state',
];
const UNLOCK_PHRASES = ['unlock until resume', 'unlock until next schedule', 'timed override unlock'];
const CARD_OR_PIN_PHRASES = ['cardorpin until resume', 'card or pin until resume'];

function toId(value: string | number | null | undefined): number | null {
  if (typeof value === 'number') return Number.isFinite(value) ? value : null;
  if (typeof value === 'string' && /^\d+$/.test(value.trim())) return Number(value);
  return null;
}

function isOtrNotification(type: string, message: string): boolean {
  return type.includes('ONETIMERUN') || type.includes('ONE_TIME_RUN') || /\bone[\s-]time[\s-]run\b/i.test(message);
}

function looksLikeDoorLockText(lower: string): boolean {
  return lower.includes('door ') && (lower.includes(' unlocked') || lower.includes(' locked'));
}

/** "<Name> Granted Access ..." → "<Name>". */
export function extractAccessName(message: string): string | null {
  return /^(.+?)\s+(?:granted|denied)\s+access\b/i.exec(message)?.[1]?.trim() ?? null;
}

/** "<Name> unlocked <Door>" → "<Name>". */
export function extractActionName(message: string): string | null {
  return /^(.+?)\s+(?:unlocked|locked)\b/i.exec(message)?.[1]?.trim() ?? null;
}

// ============================================================================
// Normalizer
// ============================================================================

export class EventNormalizer {
  private readonly directory: DoorDirectory;
  private readonly fixedDialect: Dialect | null;
  private readonly pendingLimit: number;
  private readonly synthesisGuardMs: number;
  private readonly log: Logger;
  private codec: DialectCodec | null;
  private legend: ModeLegend | undefined;
  private pending: PendingNotification[] = [];
  private bufferedTotal = 0;
  private readonly lastRealStatusAt = new Map<number, number>();
  private readonly baselineMode = new Map<number, ReaderMode>();

  constructor(config: NormalizerConfig) {
    this.directory = config.directory;
    this.fixedDialect = config.dialect ?? null;
    this.codec = this.fixedDialect ? codecFor(this.fixedDialect) : null;
    this.legend = config.legend;
    this.pendingLimit = config.pendingLimit ?? 50;
    this.synthesisGuardMs = config.synthesisGuardMs ?? 1000;
    this.log = config.logger ?? createLogger('event-normalizer');
  }

  get dialect(): Dialect | null {
    return this.codec?.dialect ?? null;
  }

  get pendingCount(): number {
    return this.pending.length;
  }

  /** The reader mode a door returns to when its override ends. */
  baselineModeFor(doorId: number): ReaderMode {
    return this.baselineMode.get(doorId) ?? ReaderMode.CARD;
  }

  setLegend(legend: ModeLegend): void {
    this.legend = legend;
  }

  /** Forget the detected dialect. Called when a new connection starts. */
  resetConnection(): void {
    this.codec = this.fixedDialect ? codecFor(this.fixedDialect) : null;
  }

  /** Fix the dialect from a payload if it is still undecided. */
  observeDialect(sample: unknown): Dialect | null {
    if (this.codec || !isRecord(sample)) return this.dialect;
    const detected = detectDialect(sample);
    if (detected) {
      this.codec = codecFor(detected);
      this.log.info({ dialect: detected }, 'Backend dialect detected');
    }
    return this.dialect;
  }

  normalizeInvocation(message: InvocationMessage, receivedAt: number): NormalizeResult {
    const target = message.target.toLowerCase();
    if (target === 'status') {
      return this.normalizeStatusFrame(message.arguments[0], receivedAt);
    }
    if (target === 'notification') {
      const events: PanelEvent[] = [];
      const bufferedBefore = this.bufferedTotal;
      for (const note of this.collectNotes(message.arguments)) {
        events.push(...this.normalizeNotification(note, receivedAt, true));
      }
      return { events, refreshDirectory: this.bufferedTotal !== bufferedBefore };
    }
    return { events: [], refreshDirectory: false };
  }

  /** Events for a polled door status, stamped with the time the poll was issued. */
  normalizeSnapshot(doorId: number, payload: JsonRecord, requestedAt: number): PanelEvent[] {
    this.observeDialect(payload);
    const reading = this.codecOrDefault().readStatus(payload, this.legend);
    return this.statusEvents(doorId, reading, requestedAt, 'snapshot');
  }

  /**
   * Retry buffered notifications that were queued before the latest directory
   * refresh. Those still unresolved are dropped with a warning.
   */
  retryPending(): PanelEvent[] {
    const version = this.directory.version;
    const ready = this.pending.filter((p) => p.directoryVersion < version);
    this.pending = this.pending.filter((p) => p.directoryVersion >= version);

    const events: PanelEvent[] = [];
    for (const entry of ready) {
      const resolved = this.normalizeNotification(entry.note, entry.receivedAt, false);
      events.push(...resolved);
    }
    return events;
  }

  // ---------- Status frames ----------

  private normalizeStatusFrame(arg: unknown, receivedAt: number): NormalizeResult {
    const parsed = statusSchema.safeParse(arg);
    if (!parsed.success || parsed.data.statusType !== 'Door' || !parsed.data.statusId) {
      return { events: [], refreshDirectory: false };
    }
    const statusId = parsed.data.statusId;
    this.observeDialect(parsed.data);

    const doorId = this.directory.doorForStatusId(statusId);
    if (doorId === null) {
      // A door on a subscribed controller outside this partition is expected.
      if (this.directory.isKnownPanel(statusId)) {
        this.log.debug({ statusId }, 'Status for door outside partition ignored');
        return { events: [], refreshDirectory: false };
      }
      return { events: [], refreshDirectory: true };
    }

    this.lastRealStatusAt.set(doorId, receivedAt);
    const reading = this.codecOrDefault().readStatus(parsed.data, this.legend);
    return { events: this.statusEvents(doorId, reading, receivedAt, 'push'), refreshDirectory: false };
  }

  private statusEvents(
    doorId: number,
    reading: DoorStatusReading,
    observedAt: number,
    source: PanelEvent['source'],
  ): PanelEvent[] {
    if (reading.overridden === false && reading.readerMode) {
      this.baselineMode.set(doorId, reading.readerMode);
    }

    const events: PanelEvent[] = [];
    if (reading.lockState) {
      const event: LockStateEvent = { kind: 'lock_state', doorId, observedAt, source, lockState: reading.lockState };
      events.push(event);
    }
    if (reading.overridden !== undefined || reading.readerMode) {
      const event: OverrideEvent = { kind: 'override', doorId, observedAt, source };
      if (reading.overridden !== undefined) event.overridden = reading.overridden;
      if (reading.readerMode) event.readerMode = reading.readerMode;
      events.push(event);
    }
    return events;
  }

  // ---------- Notifications ----------

  private collectNotes(args: unknown[]): PanelNotification[] {
    const first = args[0];
    const raw = Array.isArray(first) ? first : isRecord(first) ? [first] : args;
    const notes: PanelNotification[] = [];
    for (const item of raw) {
      const parsed = notificationSchema.safeParse(item);
      if (parsed.success) notes.push(parsed.data);
    }
    return notes;
  }

  private normalizeNotification(note: PanelNotification, receivedAt: number, mayBuffer: boolean): PanelEvent[] {
    const type = (note.NotificationType ?? '').toUpperCase();
    const message = (note.Message ?? '').trim();
    const sourceType = note.SourceType ?? '';

    const doorId = this.directory.doorForNotification({
      sourceType,
      sourceName: note.SourceName ?? '',
      sourceId: toId(note.SourceId),
      message,
    });

    if (doorId === null) {
      if (type.startsWith('ACTIONPLAN_')) return [];
      if (sourceType.trim().toLowerCase() === 'reader') {
        if (mayBuffer) {
          this.buffer(note, receivedAt);
        } else {
          const warning = new ReconciliationWarning('Dropped notification for unmapped reader', {
            sourceId: note.SourceId,
            sourceName: note.SourceName,
            notificationType: type,
          });
          this.log.warn(warning.toLogObject(), warning.message);
        }
        return [];
      }
      this.log.debug({ notificationType: type, sourceType }, 'Unmapped notification');
      return [];
    }

    if (!this.directory.hasDoor(doorId)) return [];

    const time = this.codecOrDefault().readTime(note.Date) ?? new Date(receivedAt).toISOString();
    const base = { doorId, observedAt: receivedAt, source: 'notification' as const };
    const lower = message.toLowerCase();
    const events: PanelEvent[] = [];

    if (ACCESS_TYPES.has(type)) {
      const who = extractAccessName(message) ?? note.SourceName ?? null;
      const granted = type.endsWith('GRANTED');
      events.push({
        ...base,
        kind: 'access',
        granted,
        actor: who ? `${who} ${granted ? 'granted' : 'denied'} access` : message,
        message,
        time,
      });
    } else if (PLAN_TYPES.has(type)) {
      const who = extractActionName(message) ?? note.SourceName ?? null;
      let actor = who ?? message;
      if (who && /\bunlock(?:ed)?\b/.test(lower)) actor = `${who} unlocked`;
      else if (who && /\block(?:ed)?\b/.test(lower)) actor = `${who} locked`;
      events.push({ ...base, kind: 'plan', actor, message: message || `${actor} action`, time });
    } else if (isOtrNotification(type, message)) {
      events.push({ ...base, kind: 'schedule', actor: note.SourceName || 'One-time run', message, time });
    } else if (type === 'DOOR_LOCK_STATE' || looksLikeDoorLockText(lower)) {
      if (looksLikeDoorLockText(lower)) {
        events.push({ ...base, kind: 'lock_state', doorMessage: message });
      }
    }

    events.push(...this.synthesizeStatus(doorId, type, lower, receivedAt));
    return events;
  }

  private buffer(note: PanelNotification, receivedAt: number): void {
    if (this.pending.length >= this.pendingLimit) {
      const dropped = this.pending.shift();
      const warning = new ReconciliationWarning('Reader buffer full, dropped oldest notification', {
        sourceId: dropped?.note.SourceId,
        sourceName: dropped?.note.SourceName,
      });
      this.log.warn(warning.toLogObject(), warning.message);
    }
    this.pending.push({ note, receivedAt, directoryVersion: this.directory.version });
    this.bufferedTotal++;
  }

  /** Status implied by notification text. */
  private synthesizeStatus(doorId: number, type: string, lower: string, receivedAt: number): PanelEvent[] {
    const lastReal = this.lastRealStatusAt.get(doorId);
    if (lastReal !== undefined && receivedAt - lastReal <= this.synthesisGuardMs) {
      return [];
    }

    const base = { doorId, observedAt: receivedAt, source: 'notification' as const };
    const events: PanelEvent[] = [];

    if (lower.includes('has been overridden') && lower.includes('current state is')) {
      const modeText = /current state is\s+([a-z\s/]+)/.exec(lower)?.[1] ?? '';
      const mode = findReaderModeInText(modeText);
      const override: OverrideEvent = { ...base, kind: 'override', overridden: true };
      if (mode) override.readerMode = mode;
      events.push(override);
      if (mode === ReaderMode.UNLOCK) events.push({ ...base, kind: 'lock_state', lockState: LockState.UNLOCKED });
    } else if (UNLOCK_PHRASES.some((p) => lower.includes(p))) {
      events.push({ ...base, kind: 'override', overridden: true, readerMode: ReaderMode.UNLOCK });
      events.push({ ...base, kind: 'lock_state', lockState: LockState.UNLOCKED });
    } else if (CARD_OR_PIN_PHRASES.some((p) => lower.includes(p))) {
      events.push({ ...base, kind: 'override', overridden: true, readerMode: ReaderMode.CARD_OR_PIN });
    } else if (RESUME_PHRASES.some((p) => lower.includes(p))) {
      events.push({
        ...base,
        kind: 'override',
        overridden: false,
        readerMode: this.baselineModeFor(doorId),
      });
    }

    if (type === 'DOOR_LOCK_STATE') {
      if (lower.includes('unlocked')) events.push({ ...base, kind: 'lock_state', lockState: LockState.UNLOCKED });
      else if (lower.includes('locked')) events.push({ ...base, kind: 'lock_state', lockState: LockState.LOCKED });
    }
    return events;
  }

  private codecOrDefault(): DialectCodec {
    return this.codec ?? codecFor(Dialect.PROTECTORNET);
  }
}
