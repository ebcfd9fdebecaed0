import pino from 'pino';

import type { AccountResponse, TerminalResponse } from '../../server/lib/apiSchemas.js';
import { ConnectionSupervisor } from '../../server/lib/connectionSupervisor.js';
import { ConnectivityError, InvalidRangeError } from '../../server/lib/errors.js';
import { TIMEFRAMES, ALL_TIMEFRAMES } from '../../server/lib/timeframes.js';
import type { BarStore, CollectionEvent } from '../../server/services/barStore.js';
import type { MarketDataSource, SourceSymbol } from '../../server/services/bridgeSource.js';
import { EventLogger } from '../../server/services/eventLog.js';
import { SourceGateway } from '../../server/services/sourceGateway.js';
import { SyncEngine, type SyncEngineOptions } from '../../server/services/syncEngine.js';
import type { Bar, Series, TimeRange } from '../../server/services/syncTypes.js';

export const HOUR_MS = 60 * 60 * 1000;
export const DAY_MS = 24 * HOUR_MS;

// ---------------------------------------------------------------------------
// In-memory store
// ---------------------------------------------------------------------------

function barKey(instrument: string, timeframe: string, ms: number): string {
  return `${instrument}|${timeframe}|${ms}`;
}

export class MemoryBarStore implements BarStore {
  readonly name = 'store';
  readonly rows = new Map<string, Bar>();
  readonly events: CollectionEvent[] = [];
  online = true;
  connectCalls = 0;
  insertCalls = 0;
  insertError: Error | null = null;

  async connect(): Promise<void> {
    this.connectCalls++;
    if (!this.online) throw new ConnectivityError('store offline');
  }

  async disconnect(): Promise<void> {}

  async probe(): Promise<boolean> {
    return this.online;
  }

  async insertBars(bars: readonly Bar[]): Promise<number> {
    this.insertCalls++;
    if (this.insertError) throw this.insertError;
    let inserted = 0;
    for (const bar of bars) {
      const key = barKey(bar.instrument, bar.timeframe, bar.timestamp.getTime());
      if (this.rows.has(key)) continue;
      this.rows.set(key, bar);
      inserted++;
    }
    return inserted;
  }

  seriesBars(series: Series): Bar[] {
    return [...this.rows.values()]
      .filter((bar) => bar.instrument === series.instrument && bar.timeframe === series.timeframe)
      .sort((a, b) => a.timestamp.getTime() - b.timestamp.getTime());
  }

  async getHighWaterMark(series: Series): Promise<Date | null> {
    const bars = this.seriesBars(series);
    return bars.length > 0 ? bars[bars.length - 1].timestamp : null;
  }

  async countBars(series: Series): Promise<number> {
    return this.seriesBars(series).length;
  }

  async getBarsInRange(series: Series, range: TimeRange): Promise<Bar[]> {
    const startMs = range.start.getTime();
    const endMs = range.end.getTime();
    return this.seriesBars(series).filter((bar) => {
      const ms = bar.timestamp.getTime();
      return ms >= startMs && ms < endMs;
    });
  }

  async listTimestamps(series: Series, range: TimeRange): Promise<Date[]> {
    return (await this.getBarsInRange(series, range)).map((bar) => bar.timestamp);
  }

  async logEvent(event: CollectionEvent): Promise<void> {
    this.events.push(event);
  }
}

export function makeBar(series: Series, timestamp: Date, price = 100): Bar {
  return {
    instrument: series.instrument,
    timeframe: series.timeframe,
    timestamp,
    open: price,
    high: price + 1,
    low: price - 1,
    close: price + 0.5,
    volume: 10,
  };
}

// ---------------------------------------------------------------------------
// Fake market-data source
// ---------------------------------------------------------------------------

export interface RangeCall {
  symbol: string;
  timeframeCode: number;
  from: Date;
  to: Date;
}

export interface FakeSourceOptions {
  now: () => Date;
  symbols?: SourceSymbol[];
  /** Ranges wider than this are rejected with InvalidRangeError. */
  maxRangeMs?: number;
}

function minutesForCode(code: number): number {
  for (const name of ALL_TIMEFRAMES) {
    if (TIMEFRAMES[name].code === code) return TIMEFRAMES[name].minutes;
  }
  throw new Error(`unknown timeframe code ${code}`);
}

function rateRecord(ms: number): Record<string, number> {
  const price = 100 + (ms / HOUR_MS) % 50;
  return { time: ms / 1000, open: price, high: price + 1, low: price - 1, close: price + 0.5, tick_volume: 10 };
}

/**
 * Generates a continuous bar series for every symbol. Like the terminal,
 * ranges are inclusive of both ends and only bars that have opened by `now`
 * exist.
 */
export class FakeMarketDataSource implements MarketDataSource {
  symbols: SourceSymbol[];
  online = true;
  maxRangeMs: number;
  emptyLatest = false;
  rangeError: ((from: Date, to: Date) => Error | null) | null = null;
  readonly rangeCalls: RangeCall[] = [];
  readonly latestCalls: Array<{ symbol: string; count: number }> = [];
  readonly selected: string[] = [];
  listSymbolsCalls = 0;
  private readonly now: () => Date;

  constructor(options: FakeSourceOptions) {
    this.now = options.now;
    this.symbols = options.symbols ?? [
      { name: 'US30', visible: true },
      { name: 'NAS100', visible: true },
      { name: 'EURUSD', visible: true },
    ];
    this.maxRangeMs = options.maxRangeMs ?? Infinity;
  }

  async connect(): Promise<void> {
    if (!this.online) throw new ConnectivityError('terminal offline');
  }

  async disconnect(): Promise<void> {}

  async accountInfo(): Promise<AccountResponse> {
    if (!this.online) throw new ConnectivityError('terminal offline');
    return { login: 1001, server: 'Demo-Server' };
  }

  async terminalInfo(): Promise<TerminalResponse> {
    return { name: 'Test Terminal' };
  }

  async listSymbols(): Promise<SourceSymbol[]> {
    this.listSymbolsCalls++;
    if (!this.online) throw new ConnectivityError('terminal offline');
    return this.symbols.map((s) => ({ ...s }));
  }

  async selectSymbol(name: string): Promise<void> {
    this.selected.push(name);
  }

  async fetchRatesRange(symbol: string, timeframeCode: number, from: Date, to: Date): Promise<unknown[]> {
    this.rangeCalls.push({ symbol, timeframeCode, from, to });
    if (!this.online) throw new ConnectivityError('terminal offline');
    const injected = this.rangeError?.(from, to) ?? null;
    if (injected) throw injected;
    if (to.getTime() - from.getTime() > this.maxRangeMs) {
      throw new InvalidRangeError('range too large', { code: -2 });
    }
    const intervalMs = minutesForCode(timeframeCode) * 60_000;
    const lastMs = Math.min(to.getTime(), this.now().getTime());
    const records: unknown[] = [];
    for (let ms = Math.ceil(from.getTime() / intervalMs) * intervalMs; ms <= lastMs; ms += intervalMs) {
      records.push(rateRecord(ms));
    }
    return records;
  }

  async fetchRatesLatest(symbol: string, timeframeCode: number, count: number): Promise<unknown[]> {
    this.latestCalls.push({ symbol, count });
    if (!this.online) throw new ConnectivityError('terminal offline');
    if (this.emptyLatest) return [];
    const intervalMs = minutesForCode(timeframeCode) * 60_000;
    const lastMs = Math.floor(this.now().getTime() / intervalMs) * intervalMs;
    const records: unknown[] = [];
    for (let i = count - 1; i >= 0; i--) {
      records.push(rateRecord(lastMs - i * intervalMs));
    }
    return records;
  }
}

// ---------------------------------------------------------------------------
// Wiring
// ---------------------------------------------------------------------------

export function silentLogger(): pino.Logger {
  return pino({ level: 'silent' });
}

export async function noSleep(): Promise<void> {}

export interface EngineHarness {
  engine: SyncEngine;
  store: MemoryBarStore;
  source: FakeMarketDataSource;
  gateway: SourceGateway;
  events: EventLogger;
  storeSupervisor: ConnectionSupervisor;
  sourceSupervisor: ConnectionSupervisor;
}

export function createEngineHarness(
  now: Date,
  options: { source?: Partial<FakeSourceOptions>; engine?: SyncEngineOptions; maxAttempts?: number } = {},
): EngineHarness {
  const clock = () => now;
  const store = new MemoryBarStore();
  const source = new FakeMarketDataSource({ now: clock, ...options.source });
  const events = new EventLogger(silentLogger(), store);
  const gateway = new SourceGateway(source, {
    log: (message) => events.info(message),
    warn: (message) => events.warning(message),
  });
  const supervisorOptions = {
    maxAttempts: options.maxAttempts ?? 1,
    retryDelayMs: 0,
    sleep: noSleep,
    log: () => {},
    warn: () => {},
    error: () => {},
  };
  const storeSupervisor = new ConnectionSupervisor(store, supervisorOptions);
  const sourceSupervisor = new ConnectionSupervisor(gateway, supervisorOptions);
  const engine = new SyncEngine(
    { gateway, store, sourceSupervisor, storeSupervisor, events },
    { now: clock, ...options.engine },
  );
  return { engine, store, source, gateway, events, storeSupervisor, sourceSupervisor };
}
