// doorsync Core Types

// ============================================================================
// Door State
// ============================================================================

export enum LockState {
  LOCKED = 'LOCKED',
  UNLOCKED = 'UNLOCKED',
}

/** Reader mode a door runs in, either on its schedule or under an override. */
export enum ReaderMode {
  NONE = 'NONE',
  CARD = 'CARD',
  PIN = 'PIN',
  UNLOCK = 'UNLOCK',
  CARD_AND_PIN = 'CARD_AND_PIN',
  CARD_OR_PIN = 'CARD_OR_PIN',
  FIRST_CREDENTIAL_IN = 'FIRST_CREDENTIAL_IN',
  DUAL_CREDENTIAL = 'DUAL_CREDENTIAL',
  LOCKDOWN = 'LOCKDOWN',
}

export enum OverrideType {
  TIMED = 'TIMED',
  UNTIL_RESUMED = 'UNTIL_RESUMED',
  UNTIL_NEXT_SCHEDULE = 'UNTIL_NEXT_SCHEDULE',
}

export interface OverrideState {
  type: OverrideType | null;
  mode: ReaderMode;
  minutes?: number;
  until?: string; // ISO-8601 UTC
}

/** Latest log line per door. Only the most recent entry is kept. */
export interface LogEntry {
  actor: string | null;
  readerMessage: string | null;
  readerMessageTime: string | null; // ISO-8601 UTC
  doorMessage: string | null;
  timestamp: string | null; // ISO-8601 UTC
}

export interface Door {
  id: number;
  name: string;
  partitionId: number;
  lockState: LockState;
  overridden: boolean;
  readerMode: ReaderMode;
  override: OverrideState;
  lastLog: LogEntry;
}

// ============================================================================
// Topology
// ============================================================================

export interface Partition {
  id: number;
  name: string;
}

export interface Reader {
  id: number;
  name: string;
  doorId: number | null;
}

export interface ActionPlan {
  id: number;
  name: string;
  planType: string;
  partitionId: number | null;
}

export enum Dialect {
  PROTECTORNET = 'PROTECTORNET',
  ODYSSEY = 'ODYSSEY',
}

// ============================================================================
// Temp Codes & One-Time-Run Schedules
// ============================================================================

export interface TempCode {
  doorId: number;
  codeName: string;
  code: string;
  userId: number;
  startTime: string | null; // ISO-8601 UTC
  endTime: string | null; // ISO-8601 UTC
}

export interface OtrSchedule {
  id: number;
  doorId: number | null;
  doorName: string | null;
  name: string;
  mode: string;
  startUtc: string | null;
  stopUtc: string | null;
  description?: string;
}

// ============================================================================
// Session & Connection
// ============================================================================

export interface Session {
  baseUrl: string;
  username: string;
  token: string;
  expiryState: 'valid' | 'expired';
}

export enum ConnectionState {
  IDLE = 'IDLE',
  CONNECTING = 'CONNECTING',
  RUNNING = 'RUNNING',
  RECONNECTING = 'RECONNECTING',
  STOPPED = 'STOPPED',
  ERROR = 'ERROR',
}

// ============================================================================
// Canonical Events
// ============================================================================

/** Where a door event came from. `notification` marks status synthesized from notification text. */
export type EventSource = 'push' | 'notification' | 'snapshot' | 'command';

interface DoorEventBase {
  doorId: number;
  /** Local clock (ms) at which the observation was made; orders events per door. */
  observedAt: number;
  source: EventSource;
}

export interface LockStateEvent extends DoorEventBase {
  kind: 'lock_state';
  lockState?: LockState;
  doorMessage?: string;
}

export interface OverrideEvent extends DoorEventBase {
  kind: 'override';
  overridden?: boolean;
  readerMode?: ReaderMode;
  override?: OverrideState;
}

export interface AccessEvent extends DoorEventBase {
  kind: 'access';
  granted: boolean;
  actor: string;
  message: string;
  time: string; // ISO-8601 UTC
}

export interface PlanEvent extends DoorEventBase {
  kind: 'plan';
  actor: string;
  message: string;
  time: string;
}

/** A one-time-run schedule started or stopped on the door. */
export interface ScheduleEvent extends DoorEventBase {
  kind: 'schedule';
  actor: string;
  message: string;
  time: string;
}

export type PanelEvent = LockStateEvent | OverrideEvent | AccessEvent | PlanEvent | ScheduleEvent;

// ============================================================================
// Command Results
// ============================================================================

export type TargetResult<T> =
  | { target: T; success: true }
  | { target: T; success: false; error: string };

export interface CommandOutcome<T = number> {
  results: TargetResult<T>[];
  succeeded: T[];
  failed: T[];
}

export function summarizeOutcome<T>(results: TargetResult<T>[]): CommandOutcome<T> {
  return {
    results,
    succeeded: results.filter((r) => r.success).map((r) => r.target),
    failed: results.filter((r) => !r.success).map((r) => r.target),
  };
}
