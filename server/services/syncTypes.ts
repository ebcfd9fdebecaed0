import type { TimeframeName } from '../lib/timeframes.js';

export interface Series {
  instrument: string;
  timeframe: TimeframeName;
}

/** A series whose instrument has been mapped to the source's native symbol. */
export interface ResolvedSeries extends Series {
  nativeSymbol: string;
}

export interface Bar {
  instrument: string;
  timeframe: TimeframeName;
  /** Bar open time, UTC. */
  timestamp: Date;
  open: number;
  high: number;
  low: number;
  close: number;
  volume: number;
}

/** Half-open `[start, end)`. */
export interface TimeRange {
  start: Date;
  end: Date;
}

export type Chunk = TimeRange;

/** Two adjacent stored bars farther apart than the tolerance allows. */
export interface Gap {
  start: Date;
  end: Date;
}

export type SyncOperation = 'backfill' | 'repair-gaps' | 'collect-live';

export type SyncStatus = 'completed' | 'skipped' | 'failed';

export interface SyncResult {
  operation: SyncOperation;
  instrument: string;
  timeframe: TimeframeName;
  status: SyncStatus;
  fetched: number;
  inserted: number;
  /** Sub-ranges the source kept rejecting after the chunk span bottomed out. */
  skippedChunks: number;
  error?: string;
}

export interface GapRepairResult extends SyncResult {
  operation: 'repair-gaps';
  gapsFound: number;
  gapsRepaired: number;
  gapsFailed: number;
}

export function seriesLabel(series: Series): string {
  return `${series.instrument} ${series.timeframe}`;
}
