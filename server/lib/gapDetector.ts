/**
 * Gap detection over stored bar timestamps.
 *
 * A gap is reported between two adjacent stored bars whose spacing exceeds
 * `toleranceFactor × interval`. The default 1.5× keeps weekend/holiday edges
 * and small provider jitter from being flagged on every pass.
 */

import type { Gap, Series, TimeRange } from '../services/syncTypes.js';
import { timeframeMinutes } from './timeframes.js';

export const DEFAULT_GAP_TOLERANCE_FACTOR = 1.5;

/** Timestamps must be ascending. */
export function detectGaps(
  timestamps: readonly Date[],
  intervalMinutes: number,
  toleranceFactor = DEFAULT_GAP_TOLERANCE_FACTOR,
): Gap[] {
  if (timestamps.length < 2) return [];
  const maxDeltaSeconds = toleranceFactor * intervalMinutes * 60;
  const gaps: Gap[] = [];
  for (let i = 1; i < timestamps.length; i += 1) {
    const prev = timestamps[i - 1];
    const current = timestamps[i];
    const deltaSeconds = (current.getTime() - prev.getTime()) / 1000;
    if (deltaSeconds > maxDeltaSeconds) {
      gaps.push({ start: prev, end: current });
    }
  }
  return gaps;
}

export interface TimestampReader {
  listTimestamps(series: Series, range: TimeRange): Promise<Date[]>;
}

/** Read-only scan of one series over `window`. */
export async function findGaps(
  store: TimestampReader,
  series: Series,
  window: TimeRange,
  toleranceFactor = DEFAULT_GAP_TOLERANCE_FACTOR,
): Promise<Gap[]> {
  const timestamps = await store.listTimestamps(series, window);
  return detectGaps(timestamps, timeframeMinutes(series.timeframe), toleranceFactor);
}
