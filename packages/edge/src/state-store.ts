/**
 * doorsync Door State Store
 *
 * Authoritative in-memory view of every door in the partition, plus the temp
 * codes and one-time-run schedules last read from the panel.
 *
 * Each status field is a last-write-wins register keyed by `observedAt`, so
 * the final view does not depend on the order events arrive in. An event
 * older than a field's register leaves that field alone. The two halves of
 * the door log (the actor line and the door message) are registers of their
 * own: a lock/unlock message never replaces the actor.
 */

import {
  LockState,
  OverrideType,
  ReaderMode,
  type Door,
  type LogEntry,
  type OtrSchedule,
  type OverrideState,
  type PanelEvent,
  type TempCode,
} from '@doorsync/core';
import type { PanelDoor } from './command-client.js';

// ============================================================================
// Registers
// ============================================================================

interface Register<T> {
  value: T;
  observedAt: number;
}

function register<T>(value: T): Register<T> {
  return { value, observedAt: Number.NEGATIVE_INFINITY };
}

/** Claim the register for an observation. Ties go to the later write. */
function advance(reg: { observedAt: number }, observedAt: number): boolean {
  if (observedAt < reg.observedAt) return false;
  reg.observedAt = observedAt;
  return true;
}

interface ActorLine {
  actor: string | null;
  readerMessage: string | null;
  readerMessageTime: string | null;
  time: string | null;
}

interface DoorMessageLine {
  message: string | null;
  time: string | null;
}

interface DoorRecord {
  id: number;
  name: string;
  partitionId: number;
  lockState: Register<LockState>;
  overridden: Register<boolean>;
  readerMode: Register<ReaderMode>;
  /** Override the runtime itself issued; cleared when the door resumes. */
  command: Register<OverrideState | null>;
  actorLine: Register<ActorLine>;
  doorLine: Register<DoorMessageLine>;
  view: Readonly<Door>;
}

const NO_OVERRIDE: OverrideState = Object.freeze({ type: null, mode: ReaderMode.NONE });

// ============================================================================
// Store
// ============================================================================

export class DoorStateStore {
  /** Used for doors the panel lists without a partition. */
  private readonly partitionId: number;
  private readonly doors = new Map<number, DoorRecord>();
  private readonly tempCodes = new Map<number, readonly TempCode[]>();
  private otrSchedules: readonly OtrSchedule[] = Object.freeze([]);

  constructor(partitionId: number) {
    this.partitionId = partitionId;
  }

  /**
   * Align the store with the directory. New doors start LOCKED in CARD mode
   * with no override; removed doors are dropped. Returns the ids that were added.
   */
  seedDoors(doors: PanelDoor[]): number[] {
    const keep = new Set(doors.map((d) => d.id));
    for (const id of [...this.doors.keys()]) {
      if (!keep.has(id)) {
        this.doors.delete(id);
        this.tempCodes.delete(id);
      }
    }

    const added: number[] = [];
    for (const door of doors) {
      const existing = this.doors.get(door.id);
      if (existing) {
        existing.name = door.name;
        existing.partitionId = door.partitionId ?? this.partitionId;
        existing.view = this.buildView(existing);
        continue;
      }
      const partitionId = door.partitionId ?? this.partitionId;
      const record: DoorRecord = {
        id: door.id,
        name: door.name,
        partitionId,
        lockState: register(LockState.LOCKED),
        overridden: register(false),
        readerMode: register(ReaderMode.CARD),
        command: register<OverrideState | null>(null),
        actorLine: register<ActorLine>({ actor: null, readerMessage: null, readerMessageTime: null, time: null }),
        doorLine: register<DoorMessageLine>({ message: null, time: null }),
        view: Object.freeze(emptyDoor(door.id, door.name, partitionId)),
      };
      record.view = this.buildView(record);
      this.doors.set(door.id, record);
      added.push(door.id);
    }
    return added;
  }

  reset(): void {
    this.doors.clear();
    this.tempCodes.clear();
    this.otrSchedules = Object.freeze([]);
  }

  /**
   * Merge one event. Returns the new door view when anything visible changed,
   * or null for unknown doors and events superseded by newer observations.
   */
  apply(event: PanelEvent): Readonly<Door> | null {
    const record = this.doors.get(event.doorId);
    if (!record) return null;

    let changed = false;
    const at = event.observedAt;

    switch (event.kind) {
      case 'lock_state':
        if (event.lockState !== undefined) changed = this.set(record.lockState, event.lockState, at) || changed;
        if (event.doorMessage !== undefined && advance(record.doorLine, at)) {
          record.doorLine.value = { message: event.doorMessage, time: new Date(at).toISOString() };
          changed = true;
        }
        break;

      case 'override':
        if (event.override !== undefined && advance(record.command, at)) {
          record.command.value = event.override.type === null ? null : { ...event.override };
          changed = true;
        }
        if (event.overridden !== undefined) {
          const accepted = advance(record.overridden, at);
          if (accepted) {
            changed = changed || record.overridden.value !== event.overridden;
            record.overridden.value = event.overridden;
            if (!event.overridden && event.override === undefined && advance(record.command, at)) {
              record.command.value = null;
            }
          }
        }
        if (event.readerMode !== undefined) changed = this.set(record.readerMode, event.readerMode, at) || changed;
        break;

      case 'access':
        if (advance(record.actorLine, at)) {
          record.actorLine.value = {
            actor: event.actor,
            readerMessage: event.message,
            readerMessageTime: event.time,
            time: event.time,
          };
          changed = true;
        }
        break;

      case 'plan':
      case 'schedule':
        if (advance(record.actorLine, at)) {
          record.actorLine.value = { ...record.actorLine.value, actor: event.actor, time: event.time };
          changed = true;
        }
        break;
    }

    if (!changed) return null;
    record.view = this.buildView(record);
    return record.view;
  }

  getDoor(doorId: number): Readonly<Door> | null {
    return this.doors.get(doorId)?.view ?? null;
  }

  getDoors(): Readonly<Door>[] {
    return [...this.doors.values()].map((r) => r.view).sort((a, b) => a.id - b.id);
  }

  setTempCodes(doorId: number, codes: TempCode[]): readonly TempCode[] {
    const frozen = Object.freeze(codes.map((c) => Object.freeze({ ...c })));
    this.tempCodes.set(doorId, frozen);
    return frozen;
  }

  getTempCodes(doorId: number): readonly TempCode[] {
    return this.tempCodes.get(doorId) ?? [];
  }

  setOtrSchedules(schedules: OtrSchedule[]): readonly OtrSchedule[] {
    this.otrSchedules = Object.freeze(schedules.map((s) => Object.freeze({ ...s })));
    return this.otrSchedules;
  }

  getOtrSchedules(doorId?: number): readonly OtrSchedule[] {
    return doorId === undefined ? this.otrSchedules : this.otrSchedules.filter((s) => s.doorId === doorId);
  }

  // ---------- Internal helpers ----------

  private set<T>(reg: Register<T>, value: T, at: number): boolean {
    if (!advance(reg, at)) return false;
    const changed = reg.value !== value;
    reg.value = value;
    return changed;
  }

  private buildView(record: DoorRecord): Readonly<Door> {
    const overridden = record.overridden.value;
    let override: OverrideState = NO_OVERRIDE;
    if (overridden) {
      const command = record.command.value;
      const state: OverrideState = { type: command?.type ?? null, mode: record.readerMode.value };
      if (command?.type === OverrideType.TIMED) {
        if (command.minutes !== undefined) state.minutes = command.minutes;
        if (command.until !== undefined) state.until = command.until;
      }
      override = Object.freeze(state);
    }

    const actorLine = record.actorLine;
    const doorLine = record.doorLine;
    const latest = doorLine.observedAt > actorLine.observedAt ? doorLine.value.time : actorLine.value.time;
    const lastLog: LogEntry = Object.freeze({
      actor: actorLine.value.actor,
      readerMessage: actorLine.value.readerMessage,
      readerMessageTime: actorLine.value.readerMessageTime,
      doorMessage: doorLine.value.message,
      timestamp: latest ?? actorLine.value.time ?? doorLine.value.time,
    });

    return Object.freeze({
      id: record.id,
      name: record.name,
      partitionId: record.partitionId,
      lockState: record.lockState.value,
      overridden,
      readerMode: record.readerMode.value,
      override,
      lastLog,
    });
  }
}

function emptyDoor(id: number, name: string, partitionId: number): Door {
  return {
    id,
    name,
    partitionId,
    lockState: LockState.LOCKED,
    overridden: false,
    readerMode: ReaderMode.CARD,
    override: NO_OVERRIDE,
    lastLog: { actor: null, readerMessage: null, readerMessageTime: null, doorMessage: null, timestamp: null },
  };
}
