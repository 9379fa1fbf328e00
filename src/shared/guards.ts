/**
 * Narrowing helpers for JSON payloads coming from Plex, the catalogs and the player.
 */

export type JsonRecord = Record<string, unknown>;

export function isRecord(value: unknown): value is JsonRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Returns the string at `key`, or the fallback when missing or not a string. */
export function readString(source: JsonRecord, key: string, fallback = ''): string {
  const value = source[key];
  return typeof value === 'string' ? value : fallback;
}

/** Returns the finite number at `key`, or null. Numeric strings are accepted. */
export function readNumber(source: JsonRecord, key: string): number | null {
  const value = source[key];
  if (typeof value === 'number' && Number.isFinite(value)) {
    return value;
  }
  if (typeof value === 'string' && value.trim().length > 0) {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : null;
  }
  return null;
}

/** Returns the record at `key`, or an empty record. */
export function readRecord(source: JsonRecord, key: string): JsonRecord {
  const value = source[key];
  return isRecord(value) ? value : {};
}

/** Returns the record entries of the array at `key`; non-record items are dropped. */
export function readRecordArray(source: JsonRecord, key: string): JsonRecord[] {
  const value = source[key];
  return Array.isArray(value) ? value.filter(isRecord) : [];
}

/** Returns the non-empty string entries of the array at `key`. */
export function readStringArray(source: JsonRecord, key: string): string[] {
  const value = source[key];
  if (!Array.isArray(value)) {
    return [];
  }
  return value.filter((entry): entry is string => typeof entry === 'string' && entry.trim().length > 0);
}
