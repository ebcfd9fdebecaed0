/**
 * Sync Engine: Backfill, RepairGaps and CollectLive for one series at a time.
 *
 * Every operation resolves to a result and never throws. Connectivity loss
 * and unknown instruments end in `skipped`, storage failures and anything
 * unexpected in `failed`; sibling series are never affected. The engine keeps
 * no state between calls beyond what the store records.
 */

import { DEFAULT_MAX_BARS_PER_CALL, MIN_CHUNK_SPAN_MS, fetchInChunks } from '../lib/chunkPlanner.js';
import type { ConnectionSupervisor } from '../lib/connectionSupervisor.js';
import { addMs, addUtcDays, daysToMs } from '../lib/dateUtils.js';
import { ConnectivityError, UnknownInstrumentError, errorMessage, isSyncError } from '../lib/errors.js';
import { DEFAULT_GAP_TOLERANCE_FACTOR, findGaps } from '../lib/gapDetector.js';
import { timeframeMinutes, timeframeMs } from '../lib/timeframes.js';
import type { BarStore } from './barStore.js';
import type { EventContext, EventLogger } from './eventLog.js';
import type { SourceGateway } from './sourceGateway.js';
import {
  seriesLabel,
  type Bar,
  type GapRepairResult,
  type ResolvedSeries,
  type Series,
  type SyncOperation,
  type SyncResult,
  type TimeRange,
} from './syncTypes.js';

export const DEFAULT_BACKFILL_OVERLAP_DAYS = 1;
export const DEFAULT_GAP_REPAIR_WINDOW_DAYS = 30;
export const DEFAULT_LIVE_COLLECT_COUNT = 10;

export interface SyncEngineDeps {
  gateway: SourceGateway;
  store: BarStore;
  sourceSupervisor: ConnectionSupervisor;
  storeSupervisor: ConnectionSupervisor;
  events: EventLogger;
}

export interface SyncEngineOptions {
  now?: () => Date;
  backfillOverlapDays?: number;
  gapRepairWindowDays?: number;
  liveCollectCount?: number;
  maxBarsPerCall?: number;
  minChunkSpanMs?: number;
  gapToleranceFactor?: number;
  signal?: AbortSignal | null;
}

/** Keep the first bar per timestamp, ascending. */
function dedupeBars(bars: readonly Bar[]): Bar[] {
  const byTime = new Map<number, Bar>();
  for (const bar of bars) {
    const key = bar.timestamp.getTime();
    if (!byTime.has(key)) byTime.set(key, bar);
  }
  return [...byTime.values()].sort((a, b) => a.timestamp.getTime() - b.timestamp.getTime());
}

/** Drop bars whose interval has not closed yet at `now`. */
function closedBars(bars: readonly Bar[], now: Date): Bar[] {
  const nowMs = now.getTime();
  return bars.filter((bar) => bar.timestamp.getTime() + timeframeMs(bar.timeframe) <= nowMs);
}

function emptyResult(operation: SyncOperation, series: Series): SyncResult {
  return {
    operation,
    instrument: series.instrument,
    timeframe: series.timeframe,
    status: 'completed',
    fetched: 0,
    inserted: 0,
    skippedChunks: 0,
  };
}

function context(series: Series, details?: Record<string, unknown>): EventContext {
  return { instrument: series.instrument, timeframe: series.timeframe, details };
}

export class SyncEngine {
  private readonly gateway: SourceGateway;
  private readonly store: BarStore;
  private readonly sourceSupervisor: ConnectionSupervisor;
  private readonly storeSupervisor: ConnectionSupervisor;
  private readonly events: EventLogger;
  private readonly now: () => Date;
  private readonly overlapMs: number;
  private readonly gapWindowMs: number;
  private readonly liveCollectCount: number;
  private readonly maxBarsPerCall: number;
  private readonly minChunkSpanMs: number;
  private readonly gapToleranceFactor: number;
  private readonly signal: AbortSignal | null;

  constructor(deps: SyncEngineDeps, options: SyncEngineOptions = {}) {
    this.gateway = deps.gateway;
    this.store = deps.store;
    this.sourceSupervisor = deps.sourceSupervisor;
    this.storeSupervisor = deps.storeSupervisor;
    this.events = deps.events;
    this.now = options.now ?? (() => new Date());
    this.overlapMs = daysToMs(options.backfillOverlapDays ?? DEFAULT_BACKFILL_OVERLAP_DAYS);
    this.gapWindowMs = daysToMs(options.gapRepairWindowDays ?? DEFAULT_GAP_REPAIR_WINDOW_DAYS);
    this.liveCollectCount = Math.max(1, Math.floor(options.liveCollectCount ?? DEFAULT_LIVE_COLLECT_COUNT));
    this.maxBarsPerCall = Math.max(1, Math.floor(options.maxBarsPerCall ?? DEFAULT_MAX_BARS_PER_CALL));
    this.minChunkSpanMs = Math.max(1, options.minChunkSpanMs ?? MIN_CHUNK_SPAN_MS);
    this.gapToleranceFactor = options.gapToleranceFactor ?? DEFAULT_GAP_TOLERANCE_FACTOR;
    this.signal = options.signal ?? null;
  }

  // -----------------------------------------------------------------------
  // Operations
  // -----------------------------------------------------------------------

  /**
   * Fetch `[resumePoint, now)` and store it. The resume point is the
   * high-water mark minus the overlap, or `now - lookbackDays` for an empty
   * series.
   */
  async backfill(series: Series, lookbackDays: number): Promise<SyncResult> {
    const result = emptyResult('backfill', series);
    return this.guard(result, series, async () => {
      const resolved = await this.prepare(series);
      const now = this.now();
      const highWaterMark = await this.store.getHighWaterMark(series);
      const start = highWaterMark ? addMs(highWaterMark, -this.overlapMs) : addUtcDays(now, -Math.max(0, lookbackDays));
      if (highWaterMark) {
        this.events.info(`Resuming ${seriesLabel(series)} from ${start.toISOString()}`, context(series));
      } else {
        this.events.info(`No stored data for ${seriesLabel(series)}, fetching from ${start.toISOString()}`, context(series));
      }

      const bars = await this.fetchRange(resolved, { start, end: now }, result);
      result.fetched = bars.length;
      if (bars.length === 0) {
        this.events.warning(`No historical data to sync for ${seriesLabel(series)}`, context(series));
        return;
      }
      result.inserted = await this.store.insertBars(bars);
      this.events.info(
        `Backfill ${seriesLabel(series)} complete: ${result.inserted} new bar(s) inserted`,
        context(series, { inserted: result.inserted, fetched: result.fetched, skippedChunks: result.skippedChunks }),
      );
    });
  }

  /**
   * Scan `[highWaterMark - window, now)` for gaps and re-fetch each one. A
   * failing gap is counted and the rest are still attempted.
   */
  async repairGaps(series: Series): Promise<GapRepairResult> {
    const result: GapRepairResult = {
      ...emptyResult('repair-gaps', series),
      operation: 'repair-gaps',
      gapsFound: 0,
      gapsRepaired: 0,
      gapsFailed: 0,
    };
    return this.guard(result, series, async () => {
      const resolved = await this.prepare(series);
      const highWaterMark = await this.store.getHighWaterMark(series);
      if (!highWaterMark) {
        this.events.info(`No stored data for ${seriesLabel(series)}, nothing to repair`, context(series));
        return;
      }

      const window: TimeRange = { start: addMs(highWaterMark, -this.gapWindowMs), end: this.now() };
      const gaps = await findGaps(this.store, series, window, this.gapToleranceFactor);
      result.gapsFound = gaps.length;
      if (gaps.length === 0) {
        this.events.debug(`No gaps detected for ${seriesLabel(series)}`, context(series));
        return;
      }
      this.events.warning(`Detected ${gaps.length} gap(s) in ${seriesLabel(series)}`, context(series, { gapCount: gaps.length }));

      for (const gap of gaps) {
        if (this.signal?.aborted) break;
        const gapDetails = { gapStart: gap.start.toISOString(), gapEnd: gap.end.toISOString() };
        try {
          const skippedBefore = result.skippedChunks;
          const bars = await this.fetchRange(resolved, gap, result);
          result.fetched += bars.length;
          const inserted = await this.store.insertBars(bars);
          result.inserted += inserted;
          const rejected = result.skippedChunks - skippedBefore;
          if (rejected > 0) {
            result.gapsFailed++;
            this.events.warning(
              `Gap ${gapDetails.gapStart}..${gapDetails.gapEnd} in ${seriesLabel(series)} not repaired: ${rejected} chunk(s) rejected by the source`,
              context(series, { ...gapDetails, inserted, rejectedChunks: rejected }),
            );
            continue;
          }
          result.gapsRepaired++;
          this.events.info(
            `Gap ${gapDetails.gapStart}..${gapDetails.gapEnd} in ${seriesLabel(series)}: ${inserted} bar(s) inserted`,
            context(series, { ...gapDetails, inserted }),
          );
        } catch (err: unknown) {
          result.gapsFailed++;
          const message = `Gap ${gapDetails.gapStart}..${gapDetails.gapEnd} in ${seriesLabel(series)} not repaired: ${errorMessage(err)}`;
          if (isSyncError(err, 'connectivity')) {
            this.events.warning(message, context(series, gapDetails));
          } else {
            this.events.error(message, context(series, gapDetails));
          }
        }
      }
    });
  }

  /** Fetch the latest `count` bars and store the closed ones. */
  async collectLive(series: Series, count = this.liveCollectCount): Promise<SyncResult> {
    const result = emptyResult('collect-live', series);
    return this.guard(result, series, async () => {
      const resolved = await this.prepare(series);
      const latest = await this.gateway.fetchLatest(resolved, count);
      const bars = dedupeBars(closedBars(latest, this.now()));
      result.fetched = bars.length;
      if (latest.length === 0) {
        this.events.warning(`No live data received for ${seriesLabel(series)}`, context(series));
        return;
      }
      result.inserted = await this.store.insertBars(bars);
      if (result.inserted > 0) {
        this.events.info(
          `Collected ${result.inserted} new bar(s) for ${seriesLabel(series)}`,
          context(series, { inserted: result.inserted }),
        );
      }
    });
  }

  /** Stored bar count, or null when the store cannot be reached. */
  async countBars(series: Series): Promise<number | null> {
    try {
      if (!(await this.storeSupervisor.ensureConnected(this.signal))) return null;
      return await this.store.countBars(series);
    } catch (err: unknown) {
      this.events.warning(`Could not count bars for ${seriesLabel(series)}: ${errorMessage(err)}`, context(series));
      return null;
    }
  }

  // -----------------------------------------------------------------------
  // Internal
  // -----------------------------------------------------------------------

  /** Both connections up, instrument resolved. */
  private async prepare(series: Series): Promise<ResolvedSeries> {
    if (!(await this.storeSupervisor.ensureConnected(this.signal))) {
      throw new ConnectivityError('store is unavailable');
    }
    if (!(await this.sourceSupervisor.ensureConnected(this.signal))) {
      throw new ConnectivityError('source is unavailable');
    }
    return this.gateway.resolveSeries(series);
  }

  private async fetchRange(resolved: ResolvedSeries, range: TimeRange, result: SyncResult): Promise<Bar[]> {
    const label = seriesLabel(resolved);
    const walk = await fetchInChunks({
      range,
      intervalMinutes: timeframeMinutes(resolved.timeframe),
      maxBarsPerCall: this.maxBarsPerCall,
      minSpanMs: this.minChunkSpanMs,
      signal: this.signal,
      fetchChunk: (chunk) => this.gateway.fetchRange(resolved, chunk),
      onShrink: (chunk, nextSpanMs) => {
        this.events.warning(
          `Source rejected ${label} chunk at ${chunk.start.toISOString()}, shrinking chunk span to ${Math.round(nextSpanMs / 60_000)} minutes`,
          context(resolved),
        );
      },
      onSkip: (chunk, err) => {
        this.events.warning(
          `Skipping ${label} range ${chunk.start.toISOString()}..${chunk.end.toISOString()}: ${errorMessage(err)}`,
          context(resolved, { chunkStart: chunk.start.toISOString(), chunkEnd: chunk.end.toISOString() }),
        );
      },
    });
    result.skippedChunks += walk.skipped.length;
    return dedupeBars(closedBars(walk.bars, this.now()));
  }

  /** Run `body`, turning any error into a terminal status on `result`. */
  private async guard<T extends SyncResult>(result: T, series: Series, body: () => Promise<void>): Promise<T> {
    try {
      await body();
      return result;
    } catch (err: unknown) {
      result.error = errorMessage(err);
      const label = `${result.operation} ${seriesLabel(series)}`;
      if (err instanceof UnknownInstrumentError) {
        // Already reported by the gateway.
        result.status = 'skipped';
      } else if (isSyncError(err, 'not-found')) {
        result.status = 'skipped';
        this.events.warning(`${label} skipped: ${result.error}`, context(series));
      } else if (isSyncError(err, 'connectivity')) {
        result.status = 'skipped';
        this.events.warning(`${label} skipped: ${result.error}`, context(series));
      } else if (isSyncError(err, 'storage-integrity')) {
        result.status = 'failed';
        this.events.error(`${label} failed to store bars: ${result.error}`, context(series));
      } else {
        result.status = 'failed';
        this.events.error(`${label} failed: ${result.error}`, context(series));
      }
      return result;
    }
  }
}

export { closedBars, dedupeBars };
