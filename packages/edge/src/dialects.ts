/**
 * Backend dialects.
 *
 * ProtectorNET and Odyssey servers push the same door status fields with
 * different encodings. ProtectorNET sends booleans and a numeric `timeZone`
 * index with offset-less UTC times; Odyssey sends `"True"`/`"False"` strings,
 * mode names (or numeric strings) and offset-bearing times. A codec turns
 * either form into a canonical status reading.
 */

import {
  Dialect,
  LockState,
  ReaderMode,
  readerModeFromIndex,
  readerModeFromName,
  type ModeLegend,
} from '@doorsync/core';
import { toIsoUtc } from './panel-time.js';
import { pick, readBoolean, readNumber, readString, type JsonRecord } from './payload.js';

export interface DoorStatusReading {
  lockState?: LockState;
  overridden?: boolean;
  readerMode?: ReaderMode;
}

export interface DialectCodec {
  readonly dialect: Dialect;
  readStatus(payload: JsonRecord, legend?: ModeLegend): DoorStatusReading;
  /** Panel time → ISO-8601 UTC, or null when absent or unreadable. */
  readTime(value: unknown): string | null;
}

function lockStateFrom(strike: boolean | null, opener: boolean | null): LockState | undefined {
  if (strike === true || opener === true) return LockState.UNLOCKED;
  if (strike === false && opener === false) return LockState.LOCKED;
  return undefined;
}

function readTime(value: unknown): string | null {
  return typeof value === 'string' ? toIsoUtc(value) : null;
}

export const protectorNetCodec: DialectCodec = {
  dialect: Dialect.PROTECTORNET,

  readStatus(payload, legend) {
    const reading: DoorStatusReading = {};
    const lockState = lockStateFrom(readBoolean(payload, 'strike'), readBoolean(payload, 'opener'));
    if (lockState) reading.lockState = lockState;

    const overridden = pick(payload, 'overridden');
    if (typeof overridden === 'boolean') reading.overridden = overridden;

    const index = readNumber(payload, 'timeZone');
    const mode = index === null ? null : readerModeFromIndex(index, legend);
    if (mode) reading.readerMode = mode;
    return reading;
  },

  readTime,
};

export const odysseyCodec: DialectCodec = {
  dialect: Dialect.ODYSSEY,

  readStatus(payload, legend) {
    const reading: DoorStatusReading = {};

    const explicit = readString(payload, 'lockState');
    if (explicit && /^unlocked$/i.test(explicit)) reading.lockState = LockState.UNLOCKED;
    else if (explicit && /^locked$/i.test(explicit)) reading.lockState = LockState.LOCKED;
    else {
      const lockState = lockStateFrom(readBoolean(payload, 'strike'), readBoolean(payload, 'opener'));
      if (lockState) reading.lockState = lockState;
    }

    const overridden = readBoolean(payload, 'overridden');
    if (overridden !== null) reading.overridden = overridden;

    const timeZone = pick(payload, 'timeZone');
    let mode: ReaderMode | null = null;
    if (typeof timeZone === 'string' && timeZone.trim()) {
      const asIndex = Number(timeZone);
      mode = Number.isInteger(asIndex) ? readerModeFromIndex(asIndex, legend) : readerModeFromName(timeZone);
    } else if (typeof timeZone === 'number') {
      mode = readerModeFromIndex(timeZone, legend);
    }
    if (mode) reading.readerMode = mode;
    return reading;
  },

  readTime,
};

export function codecFor(dialect: Dialect): DialectCodec {
  return dialect === Dialect.ODYSSEY ? odysseyCodec : protectorNetCodec;
}

/**
 * Classify a payload by shape. Returns null when nothing in it tells the two
 * dialects apart.
 */
export function detectDialect(sample: JsonRecord): Dialect | null {
  for (const key of ['product', 'serverType', 'server', 'version']) {
    const value = readString(sample, key)?.toLowerCase() ?? '';
    if (value.includes('odyssey')) return Dialect.ODYSSEY;
    if (value.includes('protector')) return Dialect.PROTECTORNET;
  }

  const overridden = pick(sample, 'overridden');
  const timeZone = pick(sample, 'timeZone');
  if (typeof overridden === 'string' || typeof timeZone === 'string') return Dialect.ODYSSEY;
  if (typeof overridden === 'boolean' || typeof timeZone === 'number') return Dialect.PROTECTORNET;
  return null;
}
