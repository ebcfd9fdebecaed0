import type { ManagedConnection } from '../lib/connectionSupervisor.js';
import type { TimestampReader } from '../lib/gapDetector.js';
import type { Bar, Series, TimeRange } from './syncTypes.js';

export type EventLevel = 'INFO' | 'WARNING' | 'ERROR';

/** One row of the append-only collection event log. */
export interface CollectionEvent {
  level: EventLevel;
  message: string;
  instrument?: string | null;
  timeframe?: string | null;
  details?: Record<string, unknown> | null;
  /** Defaults to the store's clock. */
  timestamp?: Date;
}

/**
 * Durable bar storage. Implementations classify their failures into
 * `ConnectivityError` and `StorageIntegrityError`.
 */
export interface BarStore extends ManagedConnection, TimestampReader {
  /**
   * Insert-or-ignore keyed on (instrument, timeframe, timestamp). Resolves to
   * the number of rows actually written; existing keys are left untouched.
   */
  insertBars(bars: readonly Bar[]): Promise<number>;
  /** Latest stored timestamp for the series, or null when it has no bars. */
  getHighWaterMark(series: Series): Promise<Date | null>;
  countBars(series: Series): Promise<number>;
  /** Stored bars with timestamp in `[range.start, range.end)`, ascending. */
  getBarsInRange(series: Series, range: TimeRange): Promise<Bar[]>;
  /** Stored timestamps in `[range.start, range.end)`, ascending. */
  listTimestamps(series: Series, range: TimeRange): Promise<Date[]>;
  logEvent(event: CollectionEvent): Promise<void>;
}
