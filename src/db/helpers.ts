/**
 * Data-layer utilities shared by the MongoDB and in-process repositories.
 *
 * Pure functions: nothing here opens a connection or runs a query.
 */

/**
 * Deep copy of a stored record so callers can never mutate repository state
 * through a returned reference.
 */
export function deepClone<T>(value: T): T {
  if (value === null || value === undefined) {
    return value;
  }
  return structuredClone(value);
}

/**
 * Own-property read from an id-keyed record. Ids such as `constructor` or
 * `toString` must not resolve to `Object.prototype` members.
 */
export function ownValue<T>(record: Readonly<Record<string, T>>, key: string): T | undefined {
  return Object.hasOwn(record, key) ? record[key] : undefined;
}

/** Normalize anything thrown by a driver or callback into an `Error`. */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

const readCode = (error: unknown): unknown =>
  typeof error === "object" && error !== null && "code" in error
    ? error.code
    : undefined;

/**
 * E11000: a unique index rejected the write. Translated by each repository
 * into a domain outcome (duplicate like, replayed idempotency key, held badge).
 */
export function isDuplicateKeyError(error: unknown): boolean {
  return readCode(error) === 11000;
}

/** Whether the driver tagged the error with a transaction error label. */
export function hasErrorLabel(error: unknown, label: string): boolean {
  if (typeof error !== "object" || error === null) return false;
  if (!("hasErrorLabel" in error)) return false;
  const check = error.hasErrorLabel;
  return typeof check === "function" && check.call(error, label) === true;
}

const MS_PER_DAY = 1000 * 60 * 60 * 24;

/**
 * UTC day stamp (days since the Unix epoch). UTC avoids DST drift so the same
 * instant always lands on the same calendar day.
 */
export function getUtcDayStamp(date: Date): number {
  return Math.floor(
    Date.UTC(date.getUTCFullYear(), date.getUTCMonth(), date.getUTCDate()) /
      MS_PER_DAY,
  );
}

/** `YYYY-MM-DD` for the UTC calendar day of `date`. */
export function formatUtcDay(date: Date): string {
  return date.toISOString().slice(0, 10);
}
