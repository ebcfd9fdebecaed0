/**
 * Supported bar intervals. `code` is the terminal's native timeframe constant
 * sent to the bridge; `minutes` drives chunk sizing and gap tolerance.
 */
export const TIMEFRAMES = {
  M1: { minutes: 1, code: 1 },
  M5: { minutes: 5, code: 5 },
  M15: { minutes: 15, code: 15 },
  M30: { minutes: 30, code: 30 },
  H1: { minutes: 60, code: 16385 },
  H4: { minutes: 240, code: 16388 },
  D1: { minutes: 1440, code: 16408 },
} as const;

export type TimeframeName = keyof typeof TIMEFRAMES;

export const ALL_TIMEFRAMES: readonly TimeframeName[] = ['M1', 'M5', 'M15', 'M30', 'H1', 'H4', 'D1'];

export function isTimeframeName(value: string): value is TimeframeName {
  return Object.prototype.hasOwnProperty.call(TIMEFRAMES, value);
}

export function timeframeMinutes(timeframe: TimeframeName): number {
  return TIMEFRAMES[timeframe].minutes;
}

export function timeframeCode(timeframe: TimeframeName): number {
  return TIMEFRAMES[timeframe].code;
}

export function timeframeMs(timeframe: TimeframeName): number {
  return TIMEFRAMES[timeframe].minutes * 60_000;
}

/**
 * Parse a comma-separated timeframe list (e.g. `"M5, h1,D1"`). Names are
 * upper-cased and duplicates dropped; an unknown name throws.
 */
export function parseTimeframeList(raw: string): TimeframeName[] {
  const result: TimeframeName[] = [];
  for (const part of String(raw || '').split(',')) {
    const name = part.trim().toUpperCase();
    if (!name) continue;
    if (!isTimeframeName(name)) {
      throw new Error(`Unknown timeframe "${part.trim()}" (expected one of ${ALL_TIMEFRAMES.join(', ')})`);
    }
    if (!result.includes(name)) result.push(name);
  }
  return result;
}
