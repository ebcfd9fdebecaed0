/**
 * Source Gateway: the engine's only view of the market-data provider.
 *
 * Resolves user-facing instrument names to the provider's native symbols,
 * probes liveness, and turns raw rate records into canonical `Bar`s.
 */

import { RateRecordSchema, type AccountResponse, type TerminalResponse } from '../lib/apiSchemas.js';
import type { ManagedConnection } from '../lib/connectionSupervisor.js';
import { toUtcDate } from '../lib/dateUtils.js';
import { UnknownInstrumentError, errorMessage, isSyncError } from '../lib/errors.js';
import { timeframeCode } from '../lib/timeframes.js';
import type { MarketDataSource, SourceSymbol } from './bridgeSource.js';
import { seriesLabel, type Bar, type ResolvedSeries, type Series, type TimeRange } from './syncTypes.js';

// ---------------------------------------------------------------------------
// Instrument resolution
// ---------------------------------------------------------------------------

/** Broker-specific spellings of common index CFDs, keyed by lower-case user name. */
export const DEFAULT_INSTRUMENT_ALIASES: Readonly<Record<string, readonly string[]>> = {
  ustech: ['nas100', 'ustec', 'us100', 'nasdaq100', 'ndx100'],
  us30: ['dj30', 'dow30', 'wallst30', 'us30cash'],
  us500: ['spx500', 'sp500', 'us500cash'],
  ger40: ['de40', 'dax40', 'ger30'],
  uk100: ['ftse100'],
};

/** Lower tier wins. */
const MatchTier = {
  Exact: 0,
  Prefix: 1,
  Substring: 2,
  AliasExact: 3,
  AliasPrefix: 4,
} as const;

type MatchTier = (typeof MatchTier)[keyof typeof MatchTier];

function matchTier(query: string, candidate: string, aliases: readonly string[]): MatchTier | null {
  if (candidate === query) return MatchTier.Exact;
  if (candidate.startsWith(query)) return MatchTier.Prefix;
  if (candidate.includes(query)) return MatchTier.Substring;
  if (aliases.includes(candidate)) return MatchTier.AliasExact;
  if (aliases.some((alias) => candidate.startsWith(alias))) return MatchTier.AliasPrefix;
  return null;
}

/**
 * Pick the native symbol for `symbol` out of `candidates`, or null.
 * Ties go to the best tier, then the shortest name, then lexicographic order.
 */
function matchInstrument(
  symbol: string,
  candidates: readonly string[],
  aliasTable: Readonly<Record<string, readonly string[]>> = DEFAULT_INSTRUMENT_ALIASES,
): string | null {
  const query = String(symbol || '').trim().toLowerCase();
  if (!query) return null;
  const aliases = aliasTable[query] ?? [];
  let best: { name: string; tier: MatchTier } | null = null;
  for (const name of candidates) {
    const tier = matchTier(query, name.toLowerCase(), aliases);
    if (tier === null) continue;
    if (
      !best ||
      tier < best.tier ||
      (tier === best.tier && name.length < best.name.length) ||
      (tier === best.tier && name.length === best.name.length && name < best.name)
    ) {
      best = { name, tier };
    }
  }
  return best ? best.name : null;
}

// ---------------------------------------------------------------------------
// Normalization
// ---------------------------------------------------------------------------

export interface NormalizedRates {
  bars: Bar[];
  dropped: number;
}

/**
 * Validate and convert raw rate records one at a time. Malformed records are
 * counted and dropped; bars outside `range` (half-open) are discarded without
 * being counted. Output is ascending by timestamp.
 */
function normalizeRates(series: Series, records: readonly unknown[], range?: TimeRange): NormalizedRates {
  const bars: Bar[] = [];
  let dropped = 0;
  const startMs = range ? range.start.getTime() : -Infinity;
  const endMs = range ? range.end.getTime() : Infinity;

  for (const record of records) {
    const parsed = RateRecordSchema.safeParse(record);
    if (!parsed.success) {
      dropped++;
      continue;
    }
    const rate = parsed.data;
    const timestamp = toUtcDate(rate.time);
    const prices = [rate.open, rate.high, rate.low, rate.close];
    if (!timestamp || !prices.every(Number.isFinite)) {
      dropped++;
      continue;
    }
    const ms = timestamp.getTime();
    if (ms < startMs || ms >= endMs) continue;
    bars.push({
      instrument: series.instrument,
      timeframe: series.timeframe,
      timestamp,
      open: rate.open,
      high: rate.high,
      low: rate.low,
      close: rate.close,
      volume: Math.trunc(rate.tick_volume ?? 0),
    });
  }

  bars.sort((a, b) => a.timestamp.getTime() - b.timestamp.getTime());
  return { bars, dropped };
}

// ---------------------------------------------------------------------------
// Gateway
// ---------------------------------------------------------------------------

export interface SourceDescription {
  terminal: TerminalResponse;
  account: AccountResponse;
}

export interface SourceGatewayOptions {
  aliases?: Readonly<Record<string, readonly string[]>>;
  log?: (message: string) => void;
  warn?: (message: string) => void;
}

export class SourceGateway implements ManagedConnection {
  readonly name = 'source';
  private readonly source: MarketDataSource;
  private readonly aliases: Readonly<Record<string, readonly string[]>>;
  /**
   * Write-once per key. Lookups in flight are shared; a rejected lookup stays
   * cached only when the instrument was not found.
   */
  private readonly resolutionCache = new Map<string, Promise<string>>();
  private readonly log: (message: string) => void;
  private readonly warn: (message: string) => void;

  constructor(source: MarketDataSource, options: SourceGatewayOptions = {}) {
    this.source = source;
    this.aliases = options.aliases ?? DEFAULT_INSTRUMENT_ALIASES;
    this.log = options.log ?? ((message: string) => console.log(message));
    this.warn = options.warn ?? ((message: string) => console.warn(message));
  }

  connect(): Promise<void> {
    return this.source.connect();
  }

  disconnect(): Promise<void> {
    return this.source.disconnect();
  }

  /** True iff the source answers an account call. */
  async probe(): Promise<boolean> {
    try {
      await this.source.accountInfo();
      return true;
    } catch {
      return false;
    }
  }

  async describe(): Promise<SourceDescription> {
    const [terminal, account] = await Promise.all([this.source.terminalInfo(), this.source.accountInfo()]);
    return { terminal, account };
  }

  /**
   * Map `symbol` to the provider's native name. Throws UnknownInstrumentError
   * (logged once, then served from the cache); directory read failures
   * propagate and are not cached.
   */
  resolveInstrument(symbol: string): Promise<string> {
    const key = String(symbol || '').trim().toLowerCase();
    const cached = this.resolutionCache.get(key);
    if (cached) return cached;

    const pending = this.lookupInstrument(symbol).catch((err: unknown) => {
      if (!(err instanceof UnknownInstrumentError)) this.resolutionCache.delete(key);
      throw err;
    });
    this.resolutionCache.set(key, pending);
    return pending;
  }

  async resolveSeries(series: Series): Promise<ResolvedSeries> {
    const nativeSymbol = await this.resolveInstrument(series.instrument);
    return { ...series, nativeSymbol };
  }

  /** Bars with open time in `[range.start, range.end)`. */
  async fetchRange(series: ResolvedSeries, range: TimeRange): Promise<Bar[]> {
    if (range.end.getTime() <= range.start.getTime()) return [];
    const records = await this.source.fetchRatesRange(
      series.nativeSymbol,
      timeframeCode(series.timeframe),
      range.start,
      range.end,
    );
    return this.normalize(series, records, range);
  }

  /** The most recent `count` bars, ascending. */
  async fetchLatest(series: ResolvedSeries, count: number): Promise<Bar[]> {
    const n = Math.max(1, Math.floor(Number(count) || 1));
    const records = await this.source.fetchRatesLatest(series.nativeSymbol, timeframeCode(series.timeframe), n);
    return this.normalize(series, records);
  }

  private normalize(series: Series, records: readonly unknown[], range?: TimeRange): Bar[] {
    const { bars, dropped } = normalizeRates(series, records, range);
    if (dropped > 0) {
      this.warn(`[source] dropped ${dropped} malformed rate record(s) for ${seriesLabel(series)}`);
    }
    return bars;
  }

  private async lookupInstrument(symbol: string): Promise<string> {
    const symbols = await this.source.listSymbols();
    const nativeSymbol = matchInstrument(symbol, symbols.map((s) => s.name), this.aliases);
    if (nativeSymbol === null) {
      const error = new UnknownInstrumentError(`Instrument "${symbol}" is not available on the source`);
      this.warn(`[source] ${error.message}; its series will be skipped`);
      throw error;
    }

    await this.ensureVisible(symbols, nativeSymbol);
    if (nativeSymbol !== symbol) {
      this.log(`[source] resolved ${symbol} -> ${nativeSymbol}`);
    }
    return nativeSymbol;
  }

  private async ensureVisible(symbols: readonly SourceSymbol[], nativeSymbol: string): Promise<void> {
    const info = symbols.find((s) => s.name === nativeSymbol);
    if (!info || info.visible) return;
    try {
      await this.source.selectSymbol(nativeSymbol);
    } catch (err: unknown) {
      if (isSyncError(err, 'connectivity')) throw err;
      this.warn(`[source] could not select ${nativeSymbol}: ${errorMessage(err)}`);
    }
  }
}

export { matchInstrument, normalizeRates };
