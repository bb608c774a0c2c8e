/**
 * Optional-field lookups over untrusted response payloads.
 *
 * Every reader returns a defined fallback (`null`, `[]`) instead of assuming
 * the field exists or has the expected type.
 */

export type RawRecord = Record<string, unknown>;

export const isRecord = (value: unknown): value is RawRecord =>
  value !== null && typeof value === "object" && !Array.isArray(value);

export const readString = (record: RawRecord, key: string): string | null => {
  const value = record[key];
  if (typeof value === "string") {
    return value;
  }
  if (typeof value === "number" && Number.isFinite(value)) {
    return String(value);
  }
  return null;
};

/** Numbers and numeric strings (`"0.5"`), anything else reads as null. */
export const readNumber = (record: RawRecord, key: string): number | null => {
  const value = record[key];
  if (typeof value === "number") {
    return Number.isFinite(value) ? value : null;
  }
  if (typeof value === "string" && value.trim() !== "") {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : null;
  }
  return null;
};

export const readRecord = (record: RawRecord, key: string): RawRecord | null => {
  const value = record[key];
  return isRecord(value) ? value : null;
};

export const readRecordList = (record: RawRecord, key: string): RawRecord[] => {
  const value = record[key];
  return Array.isArray(value) ? value.filter(isRecord) : [];
};
