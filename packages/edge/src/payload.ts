// Readers for loosely-typed panel JSON. Panels differ in key casing
// (`overridden` vs `Overridden`) and in encoding (`true` vs `"True"`).

export type JsonRecord = Record<string, unknown>;

export function isRecord(value: unknown): value is JsonRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Look up a key ignoring the case of its first letter. */
export function pick(record: JsonRecord, key: string): unknown {
  if (key in record) return record[key];
  const first = key.charAt(0);
  const alt = (first === first.toUpperCase() ? first.toLowerCase() : first.toUpperCase()) + key.slice(1);
  return record[alt];
}

export function readString(record: JsonRecord, key: string): string | null {
  const value = pick(record, key);
  if (typeof value === 'string') return value;
  if (typeof value === 'number') return String(value);
  return null;
}

export function readNumber(record: JsonRecord, key: string): number | null {
  const value = pick(record, key);
  if (typeof value === 'number' && Number.isFinite(value)) return value;
  if (typeof value === 'string' && value.trim() !== '' && Number.isFinite(Number(value))) return Number(value);
  return null;
}

export function readBoolean(record: JsonRecord, key: string): boolean | null {
  const value = pick(record, key);
  if (typeof value === 'boolean') return value;
  if (typeof value === 'number') return value !== 0;
  if (typeof value === 'string') {
    const lower = value.trim().toLowerCase();
    if (lower === 'true' || lower === '1' || lower === 'yes') return true;
    if (lower === 'false' || lower === '0' || lower === 'no') return false;
  }
  return null;
}

/** `Results` of a paged panel response, or the body itself when it is an array. */
export function readResults(data: unknown): JsonRecord[] {
  const list = Array.isArray(data) ? data : isRecord(data) ? pick(data, 'Results') : null;
  return Array.isArray(list) ? list.filter(isRecord) : [];
}

/** `Result` of a single-entity panel response, or the body itself. */
export function readResult(data: unknown): JsonRecord | null {
  if (!isRecord(data)) return null;
  const inner = pick(data, 'Result');
  return isRecord(inner) ? inner : data;
}
