import { errorMessage, isAbortError } from '../lib/errors.js';
import { mapWithConcurrency } from '../lib/mapWithConcurrency.js';
import { sleepWithAbort, type SleepFn } from '../lib/sleep.js';
import type { EventContext } from './eventLog.js';
import { seriesLabel, type GapRepairResult, type Series, type SyncResult } from './syncTypes.js';

const DEFAULT_COLLECTION_INTERVAL_MS = 60_000;
const DEFAULT_RECONNECT_DELAY_MS = 10_000;
const DEFAULT_GAP_REPAIR_EVERY_CYCLES = 10;

/** The engine operations the scheduler drives. */
export interface SeriesSyncer {
  backfill(series: Series, lookbackDays: number): Promise<SyncResult>;
  repairGaps(series: Series): Promise<GapRepairResult>;
  collectLive(series: Series): Promise<SyncResult>;
  countBars(series: Series): Promise<number | null>;
}

export interface ConnectionGuard {
  ensureConnected(signal?: AbortSignal | null): Promise<boolean>;
}

export interface SchedulerLog {
  info(message: string, context?: EventContext): void;
  warning(message: string, context?: EventContext): void;
  error(message: string, context?: EventContext): void;
}

export interface SchedulerDeps {
  engine: SeriesSyncer;
  sourceSupervisor: ConnectionGuard;
  storeSupervisor: ConnectionGuard;
  events: SchedulerLog;
}

export interface InitialSyncOptions {
  lookbackDays: number;
  concurrency?: number;
  signal?: AbortSignal | null;
}

export interface InitialSyncSummary {
  results: SyncResult[];
  inserted: number;
}

export interface LiveCollectionOptions {
  intervalMs?: number;
  reconnectDelayMs?: number;
  gapRepairEveryCycles?: number;
  concurrency?: number;
  /** Stop after this many cycles; 0 or absent runs until aborted. */
  maxCycles?: number;
  signal?: AbortSignal | null;
  sleep?: SleepFn;
}

export interface LiveCollectionSummary {
  cycles: number;
  /** Cycles abandoned because the store or the source could not be reached. */
  skippedCycles: number;
  gapRepairPasses: number;
  inserted: number;
}

function settledValues<R>(results: Array<PromiseSettledResult<R>>): R[] {
  const values: R[] = [];
  for (const result of results) {
    if (result.status === 'fulfilled') values.push(result.value);
  }
  return values;
}

function sumInserted(results: readonly SyncResult[]): number {
  return results.reduce((total, result) => total + result.inserted, 0);
}

/**
 * Startup pass: for each series log the stored bar count, then Backfill and
 * RepairGaps.
 */
export async function runInitialSync(
  seriesList: readonly Series[],
  deps: SchedulerDeps,
  options: InitialSyncOptions,
): Promise<InitialSyncSummary> {
  const { engine, events } = deps;
  const signal = options.signal ?? null;
  events.info(`[scheduler] Initial sync started for ${seriesList.length} series`);

  const settled = await mapWithConcurrency(
    seriesList,
    options.concurrency ?? 1,
    async (series) => {
      const context = { instrument: series.instrument, timeframe: series.timeframe };
      const stored = await engine.countBars(series);
      if (stored !== null) {
        events.info(`[scheduler] ${seriesLabel(series)}: ${stored} bar(s) stored`, { ...context, details: { stored } });
      }
      const backfill = await engine.backfill(series, options.lookbackDays);
      const repair = await engine.repairGaps(series);
      return [backfill, repair];
    },
    () => Boolean(signal?.aborted),
  );

  const results = settledValues(settled).flat();
  const inserted = sumInserted(results);
  events.info(`[scheduler] Initial sync finished: ${inserted} bar(s) inserted`, { details: { inserted } });
  return { results, inserted };
}

/**
 * Live loop. Each cycle checks both connections (skipping the cycle when
 * either stays down), collects every series, and runs gap repair on every `gapRepairEveryCycles`-th cycle before waiting the
 * collection interval.
 */
export async function runLiveCollection(
  seriesList: readonly Series[],
  deps: SchedulerDeps,
  options: LiveCollectionOptions = {},
): Promise<LiveCollectionSummary> {
  const { engine, events, sourceSupervisor, storeSupervisor } = deps;
  const signal = options.signal ?? null;
  const sleep = options.sleep ?? sleepWithAbort;
  const intervalMs = Math.max(0, options.intervalMs ?? DEFAULT_COLLECTION_INTERVAL_MS);
  const reconnectDelayMs = Math.max(0, options.reconnectDelayMs ?? DEFAULT_RECONNECT_DELAY_MS);
  const repairEvery = Math.max(1, Math.floor(options.gapRepairEveryCycles ?? DEFAULT_GAP_REPAIR_EVERY_CYCLES));
  const maxCycles = Math.max(0, Math.floor(options.maxCycles ?? 0));
  const concurrency = options.concurrency ?? 1;
  const shouldStop = () => Boolean(signal?.aborted);
  const summary: LiveCollectionSummary = { cycles: 0, skippedCycles: 0, gapRepairPasses: 0, inserted: 0 };

  // False when the wait was cut short by the abort signal.
  const pause = async (ms: number): Promise<boolean> => {
    try {
      await sleep(ms, signal);
      return true;
    } catch (err: unknown) {
      if (isAbortError(err)) return false;
      throw err;
    }
  };

  events.info(`[scheduler] Live collection started (interval ${Math.round(intervalMs / 1000)}s)`);

  while (!shouldStop() && (maxCycles === 0 || summary.cycles < maxCycles)) {
    summary.cycles += 1;
    const cycle = summary.cycles;

    try {
      let unavailable: 'store' | 'source' | null = null;
      if (!(await storeSupervisor.ensureConnected(signal))) unavailable = 'store';
      else if (!(await sourceSupervisor.ensureConnected(signal))) unavailable = 'source';
      if (unavailable) {
        summary.skippedCycles += 1;
        events.error(
          `[scheduler] Cycle ${cycle}: ${unavailable} unavailable, retrying in ${Math.round(reconnectDelayMs / 1000)}s`,
        );
        if (!(await pause(reconnectDelayMs))) break;
        continue;
      }

      const collected = settledValues(
        await mapWithConcurrency(seriesList, concurrency, (series) => engine.collectLive(series), shouldStop),
      );
      summary.inserted += sumInserted(collected);

      if (cycle % repairEvery === 0 && !shouldStop()) {
        events.info(`[scheduler] Cycle ${cycle}: running gap repair`);
        summary.gapRepairPasses += 1;
        const repaired = settledValues(
          await mapWithConcurrency(seriesList, concurrency, (series) => engine.repairGaps(series), shouldStop),
        );
        summary.inserted += sumInserted(repaired);
      }
    } catch (err: unknown) {
      if (isAbortError(err)) break;
      events.error(`[scheduler] Cycle ${cycle} failed: ${errorMessage(err)}`);
    }

    if (maxCycles > 0 && summary.cycles >= maxCycles) break;
    if (!(await pause(intervalMs))) break;
  }

  events.info(`[scheduler] Live collection stopped after ${summary.cycles} cycle(s)`, {
    details: { ...summary },
  });
  return summary;
}
