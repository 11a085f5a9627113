// doorsync Reader Mode Tables
//
// Conversions between the canonical ReaderMode and the forms the panel uses:
// the numeric `timeZone` index on status frames, the OverrideDoor and
// one-time-run tokens, and the mode names found in notification text.

import { ReaderMode } from './types.js';

export interface ReaderModeInfo {
  /** Token accepted by PanelCommands/OverrideDoor `TimeZoneMode`. */
  commandToken: string;
  /** Token accepted by OneTimeRunTimeZones `Mode`. */
  scheduleToken: string;
  index: number;
}

const MODE_INFO: Record<Exclude<ReaderMode, ReaderMode.NONE>, ReaderModeInfo> = {
  [ReaderMode.LOCKDOWN]: { commandToken: 'Lockdown', scheduleToken: 'Lockdown', index: 0 },
  [ReaderMode.CARD]: { commandToken: 'Card', scheduleToken: 'Card', index: 1 },
  [ReaderMode.PIN]: { commandToken: 'Pin', scheduleToken: 'Pin', index: 2 },
  [ReaderMode.CARD_OR_PIN]: { commandToken: 'CardOrPin', scheduleToken: 'CardOrPin', index: 3 },
  [ReaderMode.CARD_AND_PIN]: { commandToken: 'CardAndPin', scheduleToken: 'CardAndPin', index: 4 },
  [ReaderMode.UNLOCK]: { commandToken: 'Unlock', scheduleToken: 'Unlock', index: 5 },
  [ReaderMode.FIRST_CREDENTIAL_IN]: {
    commandToken: 'UnlockWithFirstCardIn',
    scheduleToken: 'UnlockWithFirstCardIn',
    index: 6,
  },
  [ReaderMode.DUAL_CREDENTIAL]: { commandToken: 'DualCard', scheduleToken: 'DualCard', index: 7 },
};

// Some panels report lockdown as 8 as well as 0.
const INDEX_TO_MODE: ReadonlyMap<number, ReaderMode> = new Map<number, ReaderMode>([
  [0, ReaderMode.LOCKDOWN],
  [1, ReaderMode.CARD],
  [2, ReaderMode.PIN],
  [3, ReaderMode.CARD_OR_PIN],
  [4, ReaderMode.CARD_AND_PIN],
  [5, ReaderMode.UNLOCK],
  [6, ReaderMode.FIRST_CREDENTIAL_IN],
  [7, ReaderMode.DUAL_CREDENTIAL],
  [8, ReaderMode.LOCKDOWN],
]);

/**
 * Spellings seen in notification text, legends and API tokens, compacted to
 * lowercase letters only. Longer phrases are matched first by `findReaderModeInText`.
 */
const NAME_TO_MODE: ReadonlyMap<string, ReaderMode> = new Map<string, ReaderMode>([
  ['lockdown', ReaderMode.LOCKDOWN],
  ['card', ReaderMode.CARD],
  ['pin', ReaderMode.PIN],
  ['cardorpin', ReaderMode.CARD_OR_PIN],
  ['cardandpin', ReaderMode.CARD_AND_PIN],
  ['unlock', ReaderMode.UNLOCK],
  ['unlocked', ReaderMode.UNLOCK],
  ['firstcredentialin', ReaderMode.FIRST_CREDENTIAL_IN],
  ['unlockwithfirstcardin', ReaderMode.FIRST_CREDENTIAL_IN],
  ['firstcardin', ReaderMode.FIRST_CREDENTIAL_IN],
  ['dualcredential', ReaderMode.DUAL_CREDENTIAL],
  ['dualcard', ReaderMode.DUAL_CREDENTIAL],
  ['none', ReaderMode.NONE],
]);

const TEXT_PATTERNS: ReadonlyArray<[RegExp, ReaderMode]> = [
  [/\bcard\s+or\s+pin\b/, ReaderMode.CARD_OR_PIN],
  [/\bcard\s+and\s+pin\b/, ReaderMode.CARD_AND_PIN],
  [/\bfirst\s+credential\s+in\b/, ReaderMode.FIRST_CREDENTIAL_IN],
  [/\bdual\s+credential\b/, ReaderMode.DUAL_CREDENTIAL],
  [/\blockdown\b/, ReaderMode.LOCKDOWN],
  [/\bunlock(?:ed)?\b/, ReaderMode.UNLOCK],
  [/\bpin\b/, ReaderMode.PIN],
  [/\bcard\b/, ReaderMode.CARD],
];

/** Panel legend: DoorTimeZoneMode index → display name. */
export type ModeLegend = ReadonlyMap<number, string>;

export function getReaderModeInfo(mode: ReaderMode): ReaderModeInfo | null {
  return mode === ReaderMode.NONE ? null : MODE_INFO[mode];
}

export function readerModeFromName(name: string): ReaderMode | null {
  const compact = name.toLowerCase().replace(/[^a-z]/g, '');
  return NAME_TO_MODE.get(compact) ?? null;
}

/**
 * Resolve a status-frame `timeZone` index. The panel's own legend wins when it
 * names a known mode; otherwise the static table is used.
 */
export function readerModeFromIndex(index: number, legend?: ModeLegend): ReaderMode | null {
  const legendName = legend?.get(index);
  if (legendName) {
    const fromLegend = readerModeFromName(legendName);
    if (fromLegend) return fromLegend;
  }
  return INDEX_TO_MODE.get(index) ?? null;
}

/** Index to send with an override command, preferring the panel legend. */
export function readerModeIndex(mode: ReaderMode, legend?: ModeLegend): number | null {
  if (legend) {
    for (const [index, name] of legend) {
      if (readerModeFromName(name) === mode) return index;
    }
  }
  return getReaderModeInfo(mode)?.index ?? null;
}

/** Find the first mode phrase in free text, longest phrases first. */
export function findReaderModeInText(text: string): ReaderMode | null {
  const lower = text.toLowerCase();
  for (const [pattern, mode] of TEXT_PATTERNS) {
    if (pattern.test(lower)) return mode;
  }
  return null;
}
