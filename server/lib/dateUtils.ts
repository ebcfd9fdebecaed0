/**
 * UTC date/time helpers shared by the sync modules.
 * All functions are pure.
 */

const MINUTE_MS = 60_000;
const HOUR_MS = 60 * MINUTE_MS;
const DAY_MS = 24 * HOUR_MS;

function addUtcDays(date: Date, days: number): Date {
  return new Date(date.getTime() + days * DAY_MS);
}

function addMs(date: Date, ms: number): Date {
  return new Date(date.getTime() + ms);
}

function daysToMs(days: number): number {
  return Math.max(0, Number(days) || 0) * DAY_MS;
}

function toUnixSeconds(date: Date): number {
  return Math.floor(date.getTime() / 1000);
}

// ISO strings carrying "Z" or a "+hh:mm" / "-hhmm" suffix.
const EXPLICIT_OFFSET_RE = /(?:z|[+-]\d{2}:?\d{2})$/i;

/**
 * Convert a provider timestamp into a UTC `Date`.
 *
 * Numbers are epoch values: milliseconds above 1e10, seconds otherwise.
 * Strings are ISO-8601; a string without an offset is read as UTC, never as
 * host-local time.
 */
function toUtcDate(value: unknown): Date | null {
  if (value instanceof Date) {
    return Number.isFinite(value.getTime()) ? new Date(value.getTime()) : null;
  }
  if (typeof value === 'number') {
    if (!Number.isFinite(value)) return null;
    const ms = value > 1e10 ? Math.floor(value) : Math.floor(value * 1000);
    return new Date(ms);
  }
  if (typeof value === 'string' && value.trim()) {
    const trimmed = value.trim();
    if (/^-?\d+(\.\d+)?$/.test(trimmed)) return toUtcDate(Number(trimmed));
    if (/^\d{4}-\d{2}-\d{2}$/.test(trimmed)) return new Date(`${trimmed}T00:00:00Z`);
    const isoish = trimmed.includes('T') ? trimmed : trimmed.replace(' ', 'T');
    const parsedMs = Date.parse(EXPLICIT_OFFSET_RE.test(isoish) ? isoish : `${isoish}Z`);
    return Number.isFinite(parsedMs) ? new Date(parsedMs) : null;
  }
  return null;
}

export { MINUTE_MS, HOUR_MS, DAY_MS, addUtcDays, addMs, daysToMs, toUnixSeconds, toUtcDate };
