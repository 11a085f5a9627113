/**
 * doorsync Door Directory
 *
 * Partition-scoped lookup tables used to route pushed frames to doors:
 * status ids, reader ids and reader names. Built from the door list, the
 * system overview tree and the partition's available readers.
 */

import type { Reader } from '@doorsync/core';
import type { PanelDoor } from './command-client.js';
import { createLogger, errorMessage, type Logger } from './edge-logger.js';
import { isRecord, readNumber, readString, type JsonRecord } from './payload.js';

export interface DirectorySource {
  getDoors(): Promise<PanelDoor[]>;
  getSystemOverview(): Promise<unknown>;
  getAvailableReaders(): Promise<Reader[]>;
}

/** Fields of a notification that can identify its door. */
export interface NotificationOrigin {
  sourceType: string;
  sourceName: string;
  sourceId: number | null;
  message: string;
}

export interface DirectorySnapshot {
  doors: PanelDoor[];
  statusIds: Map<string, number>;
  readersById: Map<number, number>;
  readersByName: Map<string, number>;
  namesIndex: Map<string, number>;
}

export function normalizeName(value: string): string {
  return value.trim().toLowerCase().replace(/\s+/g, ' ');
}

/** Drop a trailing "reader", "reader 2", "door" or "gate". */
export function stripReaderSuffix(value: string): string {
  return normalizeName(value)
    .replace(/\s+reader(\s+\d+)?$/, '')
    .replace(/\s+(door|gate)$/, '')
    .trim();
}

function childNodes(node: JsonRecord): JsonRecord[] {
  const nodes = node.Nodes;
  return Array.isArray(nodes) ? nodes.filter(isRecord) : [];
}

/** Build the lookup tables. Doors outside `doors` are left out. */
export function buildDirectory(doors: PanelDoor[], overview: unknown, readers: Reader[]): DirectorySnapshot {
  const allowed = new Set(doors.map((d) => d.id));
  const statusIds = new Map<string, number>();
  const readersById = new Map<number, number>();
  const readersByName = new Map<string, number>();
  const namesIndex = new Map<string, number>();

  const addReaderName = (name: string, doorId: number) => {
    const lower = name.trim().toLowerCase();
    if (!lower) return;
    readersByName.set(lower, doorId);
    const base = stripReaderSuffix(name);
    if (base && base !== lower) readersByName.set(base, doorId);
  };

  for (const door of doors) {
    namesIndex.set(normalizeName(door.name), door.id);
    if (door.statusId) statusIds.set(door.statusId, door.id);
  }

  const walk = (node: JsonRecord, currentDoor: number | null): void => {
    for (const child of childNodes(node)) {
      const type = readString(child, 'Type');
      const id = readNumber(child, 'Id');
      if (type === 'Door') {
        if (id !== null && allowed.has(id)) {
          const statusId = readString(child, 'StatusId');
          const name = readString(child, 'Name');
          if (statusId) statusIds.set(statusId, id);
          if (name) namesIndex.set(normalizeName(name), id);
          walk(child, id);
        } else {
          walk(child, null);
        }
      } else if (type === 'Reader' && currentDoor !== null) {
        if (id !== null) readersById.set(id, currentDoor);
        addReaderName(readString(child, 'Name') ?? '', currentDoor);
        walk(child, currentDoor);
      } else {
        walk(child, currentDoor);
      }
    }
  };

  const status = isRecord(overview) ? overview.Status : null;
  if (isRecord(status)) {
    for (const site of childNodes(status)) walk(site, null);
  }

  for (const reader of readers) {
    if (reader.doorId === null || !allowed.has(reader.doorId)) continue;
    readersById.set(reader.id, reader.doorId);
    addReaderName(reader.name, reader.doorId);
  }

  return { doors, statusIds, readersById, readersByName, namesIndex };
}

export class DoorDirectory {
  private readonly source: DirectorySource;
  private readonly log: Logger;
  private snapshot: DirectorySnapshot = buildDirectory([], null, []);
  private refreshInFlight: Promise<void> | null = null;
  private refreshCount = 0;

  constructor(source: DirectorySource, logger?: Logger) {
    this.source = source;
    this.log = logger ?? createLogger('door-directory');
  }

  /** Incremented after every completed refresh. */
  get version(): number {
    return this.refreshCount;
  }

  /** Rebuild the tables, joining a refresh already in flight. */
  refresh(): Promise<void> {
    if (!this.refreshInFlight) {
      this.refreshInFlight = this.load().finally(() => {
        this.refreshInFlight = null;
      });
    }
    return this.refreshInFlight;
  }

  doors(): PanelDoor[] {
    return [...this.snapshot.doors];
  }

  doorIds(): number[] {
    return this.snapshot.doors.map((d) => d.id);
  }

  hasDoor(doorId: number): boolean {
    return this.snapshot.doors.some((d) => d.id === doorId);
  }

  doorForStatusId(statusId: string): number | null {
    return this.snapshot.statusIds.get(statusId) ?? null;
  }

  /** Controllers to subscribe to: the part of each status id before `::`. */
  panels(): string[] {
    const roots = new Set<string>();
    for (const statusId of this.snapshot.statusIds.keys()) {
      const root = statusId.split('::', 1)[0];
      if (root) roots.add(root);
    }
    return [...roots].sort();
  }

  isKnownPanel(statusId: string): boolean {
    const root = statusId.split('::', 1)[0];
    return root ? this.panels().includes(root) : false;
  }

  /** Match a door by name inside free text, exact first and then by containment. */
  doorFromText(text: string): number | null {
    const norm = normalizeName(text);
    if (!norm) return null;
    const variants = new Set([norm]);
    const stripped = stripReaderSuffix(norm);
    if (stripped) variants.add(stripped);

    for (const variant of variants) {
      const exact = this.snapshot.namesIndex.get(variant);
      if (exact !== undefined) return exact;
    }
    for (const variant of variants) {
      for (const [name, doorId] of this.snapshot.namesIndex) {
        if (variant.includes(name) || name.includes(variant)) return doorId;
      }
    }
    return null;
  }

  doorForNotification(origin: NotificationOrigin): number | null {
    const sourceType = origin.sourceType.trim().toLowerCase();
    const sourceName = origin.sourceName.trim();

    if (sourceType === 'door' && origin.sourceId !== null) {
      return origin.sourceId;
    }

    if (sourceType === 'reader') {
      if (origin.sourceId !== null) {
        const byId = this.snapshot.readersById.get(origin.sourceId);
        if (byId !== undefined) return byId;
      }
      if (sourceName) {
        const byName = this.snapshot.readersByName.get(sourceName.toLowerCase());
        if (byName !== undefined) return byName;
        const base = stripReaderSuffix(sourceName);
        if (base) {
          const byBase = this.snapshot.readersByName.get(base) ?? this.doorFromText(base);
          if (byBase !== null) return byBase;
        }
      }
    }

    for (const candidate of [sourceName, origin.message]) {
      const doorId = this.doorFromText(candidate);
      if (doorId !== null) return doorId;
    }

    const phrase = /\b(?:to|on|for)\s+(.+)$/i.exec(origin.message);
    return phrase?.[1] ? this.doorFromText(phrase[1]) : null;
  }

  private async load(): Promise<void> {
    const doors = await this.source.getDoors();

    let overview: unknown = null;
    try {
      overview = await this.source.getSystemOverview();
    } catch (err: unknown) {
      this.log.error({ err: errorMessage(err) }, 'Failed to fetch system overview');
    }

    let readers: Reader[] = [];
    try {
      readers = await this.source.getAvailableReaders();
    } catch (err: unknown) {
      this.log.error({ err: errorMessage(err) }, 'Failed to fetch partition readers');
    }

    this.snapshot = buildDirectory(doors, overview, readers);
    this.refreshCount++;
    this.log.debug(
      {
        doors: doors.length,
        statusIds: this.snapshot.statusIds.size,
        readersById: this.snapshot.readersById.size,
        readersByName: this.snapshot.readersByName.size,
      },
      'Door directory rebuilt',
    );
  }
}
