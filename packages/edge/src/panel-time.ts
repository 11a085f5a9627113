/**
 * Panel time helpers.
 *
 * The panel stores times as UTC without an offset (`YYYY-MM-DDTHH:mm:ss`).
 * Everything inside the runtime is UTC; conversion to local time is left to
 * the presentation layer.
 */

const OFFSET_SUFFIX = /(Z|[+-]\d{2}:?\d{2})$/i;

/** Parse a caller- or panel-supplied time. Strings without an offset are UTC. */
export function parseUtc(value: Date | string | null | undefined): Date | null {
  if (value === null || value === undefined) return null;
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? null : value;
  }
  const trimmed = value.trim();
  if (!trimmed) return null;
  const normalized = /^\d{4}-\d{2}-\d{2}$/.test(trimmed) ? `${trimmed}T00:00:00` : trimmed.replace(' ', 'T');
  const withZone = OFFSET_SUFFIX.test(normalized) ? normalized : `${normalized}Z`;
  const parsed = new Date(withZone);
  return Number.isNaN(parsed.getTime()) ? null : parsed;
}

/** Format as the panel's offset-less UTC form. */
export function toPanelTime(value: Date): string {
  return value.toISOString().slice(0, 19);
}

/** Canonical ISO-8601 UTC form of a panel time, or null when it cannot be read. */
export function toIsoUtc(value: Date | string | null | undefined): string | null {
  const parsed = parseUtc(value);
  return parsed ? parsed.toISOString() : null;
}

/**
 * Whole minutes from `now` until `until`, rounded up. May be zero or
 * negative when `until` is not in the future.
 */
export function minutesUntil(until: Date, now: Date): number {
  return Math.ceil((until.getTime() - now.getTime()) / 60_000);
}
