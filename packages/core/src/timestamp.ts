/**
 * Timestamp normalization.
 *
 * The annotations API accepts exactly one format:
 * `YYYY-MM-DDTHH:MM:SSZ`. Operators type these by hand, so one malformed
 * shape seen in practice is repaired rather than rejected: a spurious
 * `:NN` segment after the seconds (`2025-01-27T10:00:00:11Z`).
 *
 * Everything else must already be a UTC date-time. Non-UTC offsets are
 * rejected, not converted.
 */

import { ValidationError } from "./errors.js";

const INVALID_TIMESTAMP = "invalid timestamp";

/** `...T10:00:00:11Z` → `...T10:00:00Z` */
const EXTRA_SEGMENT = /^(\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}):\d{2}([Zz]|\+00:00)$/;

const STRICT_UTC =
  /^(\d{4})-(\d{2})-(\d{2})T(\d{2}):(\d{2}):(\d{2})(?:\.\d+)?(?:[Zz]|\+00:00)$/;

export type NormalizeResult =
  | { readonly ok: true; readonly value: string; readonly repaired: boolean }
  | { readonly ok: false; readonly error: ValidationError };

function pad(value: number, width: number): string {
  return String(value).padStart(width, "0");
}

/**
 * Normalize a user-supplied timestamp without throwing.
 */
export function tryNormalizeTimestamp(raw: string): NormalizeResult {
  const compact = raw.replace(/\s+/g, "");
  const repairedValue = compact.replace(EXTRA_SEGMENT, "$1$2");
  const repaired = repairedValue !== compact;

  const match = STRICT_UTC.exec(repairedValue);
  if (match === null) {
    return { ok: false, error: new ValidationError(INVALID_TIMESTAMP, raw) };
  }

  const [, y, mo, d, h, mi, s] = match;
  const year = Number(y);
  const month = Number(mo);
  const day = Number(d);
  const hour = Number(h);
  const minute = Number(mi);
  const second = Number(s);

  // Out-of-range fields roll over; a round trip catches Feb 30, hour 24, ...
  // setUTCFullYear keeps years 0-99 literal where Date.UTC maps them to 19xx.
  const date = new Date(Date.UTC(2000, 0, 1, hour, minute, second));
  date.setUTCFullYear(year, month - 1, day);
  if (
    date.getUTCFullYear() !== year ||
    date.getUTCMonth() !== month - 1 ||
    date.getUTCDate() !== day ||
    date.getUTCHours() !== hour ||
    date.getUTCMinutes() !== minute ||
    date.getUTCSeconds() !== second
  ) {
    return { ok: false, error: new ValidationError(INVALID_TIMESTAMP, raw) };
  }

  const value =
    `${pad(year, 4)}-${pad(month, 2)}-${pad(day, 2)}` +
    `T${pad(hour, 2)}:${pad(minute, 2)}:${pad(second, 2)}Z`;

  return { ok: true, value, repaired };
}

/**
 * Normalize a user-supplied timestamp into wire format.
 *
 * @throws {ValidationError} with reason "invalid timestamp"
 */
export function normalizeTimestamp(raw: string): string {
  const result = tryNormalizeTimestamp(raw);
  if (!result.ok) {
    throw result.error;
  }
  return result.value;
}

/**
 * Format a Date as a wire timestamp, dropping milliseconds.
 */
export function toWireTimestamp(date: Date): string {
  return date.toISOString().replace(/\.\d{3}Z$/, "Z");
}
