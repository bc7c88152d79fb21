/**
 * Temporal normalizer: turns the timestamp shapes found in governance documents
 * into one comparable UTC instant, or UNKNOWN_INSTANT when nothing usable is there.
 *
 * Strings follow ISO-8601 in its extended (`2024-01-15T10:30:00Z`) or basic
 * (`20240115T103000Z`) form; `/` is also accepted as the date separator.
 * Strings without an explicit offset are read as UTC, never as server-local time.
 */

export interface KnownInstant {
  readonly kind: "instant";
  readonly epochMs: number;
}

export interface UnknownInstant {
  readonly kind: "unknown";
}

export type Instant = KnownInstant | UnknownInstant;

export const UNKNOWN_INSTANT: UnknownInstant = Object.freeze({ kind: "unknown" });

export const DAY_MS = 24 * 60 * 60 * 1000;

// ECMAScript time value range.
const MAX_EPOCH_MS = 8.64e15;

// YYYY-MM-DD or YYYY/MM/DD, optional time, optional fraction, optional zone.
const EXTENDED_TIMESTAMP_PATTERN =
  /^(\d{4})[-/](\d{1,2})[-/](\d{1,2})(?:[T ](\d{1,2}):(\d{2})(?::(\d{2})(?:[.,](\d{1,9}))?)?)?\s*(Z|UTC|GMT|[+-]\d{2}(?::?\d{2})?)?$/i;

// YYYYMMDD, optional Thhmm[ss[.fff]], optional zone.
const BASIC_TIMESTAMP_PATTERN =
  /^(\d{4})(\d{2})(\d{2})(?:T(\d{2})(\d{2})(?:(\d{2})(?:[.,](\d{1,9}))?)?)?(Z|[+-]\d{2}(?:\d{2})?)?$/i;

export function instantFromEpochMs(epochMs: number): Instant {
  if (!Number.isFinite(epochMs) || Math.abs(epochMs) > MAX_EPOCH_MS) return UNKNOWN_INSTANT;
  return { kind: "instant", epochMs };
}

export function isKnownInstant(instant: Instant): instant is KnownInstant {
  return instant.kind === "instant";
}

function isLeapYear(year: number): boolean {
  return (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;
}

function daysInMonth(year: number, month: number): number {
  if (month === 2) return isLeapYear(year) ? 29 : 28;
  return [4, 6, 9, 11].includes(month) ? 30 : 31;
}

function parseOffsetMinutes(zone: string | undefined): number | null {
  if (!zone) return 0;
  const upper = zone.toUpperCase();
  if (upper === "Z" || upper === "UTC" || upper === "GMT") return 0;
  const match = /^([+-])(\d{2}):?(\d{2})?$/.exec(zone);
  if (!match) return null;
  const hours = Number(match[2]);
  const minutes = Number(match[3] ?? "0");
  if (hours > 23 || minutes > 59) return null;
  const total = hours * 60 + minutes;
  return match[1] === "-" ? -total : total;
}

function utcEpochMs(
  year: number,
  month: number,
  day: number,
  hours: number,
  minutes: number,
  seconds: number,
  millis: number
): number {
  const date = new Date(0);
  // setUTCFullYear keeps years below 100 literal (Date.UTC would map them to 19xx).
  date.setUTCFullYear(year, month - 1, day);
  date.setUTCHours(hours, minutes, seconds, millis);
  return date.getTime();
}

function parseTimestampString(raw: string): Instant {
  const text = raw.trim();
  const match = EXTENDED_TIMESTAMP_PATTERN.exec(text) ?? BASIC_TIMESTAMP_PATTERN.exec(text);
  if (!match) return UNKNOWN_INSTANT;

  const [, yearText, monthText, dayText, hourText, minuteText, secondText, fractionText, zone] = match;
  const year = Number(yearText);
  const month = Number(monthText);
  const day = Number(dayText);
  const hours = Number(hourText ?? "0");
  const minutes = Number(minuteText ?? "0");
  const seconds = Number(secondText ?? "0");
  const millis = fractionText ? Number(fractionText.slice(0, 3).padEnd(3, "0")) : 0;

  if (month < 1 || month > 12) return UNKNOWN_INSTANT;
  if (day < 1 || day > daysInMonth(year, month)) return UNKNOWN_INSTANT;
  if (minutes > 59 || seconds > 59) return UNKNOWN_INSTANT;
  // 24:00:00 is the end of the day, i.e. midnight of the next one.
  if (hours > 24 || (hours === 24 && (minutes > 0 || seconds > 0 || millis > 0))) return UNKNOWN_INSTANT;

  const offsetMinutes = parseOffsetMinutes(zone);
  if (offsetMinutes === null) return UNKNOWN_INSTANT;

  return instantFromEpochMs(
    utcEpochMs(year, month, day, hours, minutes, seconds, millis) - offsetMinutes * 60_000
  );
}

/**
 * Normalize a raw timestamp. Accepts null, "", ISO-8601 strings with or without
 * offset, epoch milliseconds and Date objects. Never throws.
 */
export function normalizeInstant(raw: unknown): Instant {
  if (raw === null || raw === undefined) return UNKNOWN_INSTANT;
  if (typeof raw === "string") {
    return raw.trim().length === 0 ? UNKNOWN_INSTANT : parseTimestampString(raw);
  }
  if (typeof raw === "number") return instantFromEpochMs(raw);
  if (raw instanceof Date) return instantFromEpochMs(raw.getTime());
  return UNKNOWN_INSTANT;
}

/** Ordering where UNKNOWN_INSTANT sits below every known instant. */
export function compareInstants(a: Instant, b: Instant): number {
  if (!isKnownInstant(a)) return isKnownInstant(b) ? -1 : 0;
  if (!isKnownInstant(b)) return 1;
  return a.epochMs - b.epochMs;
}

/** Latest known instant; UNKNOWN_INSTANT when none of the candidates is known. */
export function latestInstant(candidates: readonly Instant[]): Instant {
  let latest: Instant = UNKNOWN_INSTANT;
  for (const candidate of candidates) {
    if (compareInstants(candidate, latest) > 0) latest = candidate;
  }
  return latest;
}

/** ISO-8601 UTC with a `Z` suffix; milliseconds only when non-zero. "" for unknown. */
export function formatInstant(instant: Instant): string {
  if (!isKnownInstant(instant)) return "";
  return new Date(instant.epochMs).toISOString().replace(".000Z", "Z");
}

/** Whole days from `from` to `to`, floored. Negative when `from` is later. */
export function wholeDaysBetween(from: KnownInstant, to: KnownInstant): number {
  return Math.floor((to.epochMs - from.epochMs) / DAY_MS);
}
