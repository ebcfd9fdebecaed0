import 'dotenv/config';

import { parseTimeframeList, ALL_TIMEFRAMES, type TimeframeName } from './lib/timeframes.js';
import { sanitizeBridgeUrl } from './services/bridgeSource.js';
import type { Series } from './services/syncTypes.js';

type Env = Record<string, string | undefined>;

function readList(value: string | undefined, fallback: string): string[] {
  return String(value || fallback)
    .split(',')
    .map((part) => part.trim())
    .filter(Boolean);
}

// Unlike `Number(x) || fallback`, keeps an explicit 0.
function readNumber(value: string | undefined, fallback: number): number {
  if (value === undefined || value.trim() === '') return fallback;
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : fallback;
}

function readBool(value: string | undefined, fallback: boolean): boolean {
  if (value === undefined || value.trim() === '') return fallback;
  return value.trim().toLowerCase() !== 'false';
}

export interface SyncConfig {
  instruments: string[];
  timeframes: TimeframeName[];
  collectionIntervalSeconds: number;
  maxReconnectAttempts: number;
  reconnectDelaySeconds: number;
  historicalLookbackDays: number;
  gapRepairEveryCycles: number;
  gapRepairWindowDays: number;
  backfillOverlapDays: number;
  liveCollectCount: number;
  maxBarsPerCall: number;
  syncConcurrency: number;
  collectionMaxCycles: number;
}

export interface DatabaseConfig {
  url: string;
  ssl: boolean;
  sslRejectUnauthorized: boolean;
  slowQueryThresholdMs: number;
}

export interface SourceConfig {
  baseUrl: string;
  apiKey: string;
  login: string;
  password: string;
  server: string;
  timeoutMs: number;
}

export interface AppConfig {
  sync: SyncConfig;
  database: DatabaseConfig;
  source: SourceConfig;
  logLevel: string;
}

/** Read configuration from `env`; throws on an unknown timeframe name. */
export function loadConfig(env: Env = process.env): AppConfig {
  const timeframes = parseTimeframeList(String(env.SYNC_TIMEFRAMES || ALL_TIMEFRAMES.join(',')));
  return {
    sync: {
      instruments: readList(env.SYNC_INSTRUMENTS, 'US30,USTech'),
      timeframes: timeframes.length > 0 ? timeframes : [...ALL_TIMEFRAMES],
      collectionIntervalSeconds: Math.max(1, Number(env.COLLECTION_INTERVAL_SECONDS) || 60),
      maxReconnectAttempts: Math.max(1, Number(env.MAX_RECONNECT_ATTEMPTS) || 5),
      reconnectDelaySeconds: Math.max(0, readNumber(env.RECONNECT_DELAY_SECONDS, 10)),
      historicalLookbackDays: Math.max(1, Number(env.HISTORICAL_LOOKBACK_DAYS) || 365),
      gapRepairEveryCycles: Math.max(1, Number(env.GAP_REPAIR_EVERY_CYCLES) || 10),
      gapRepairWindowDays: Math.max(1, Number(env.GAP_REPAIR_WINDOW_DAYS) || 30),
      backfillOverlapDays: Math.max(0, readNumber(env.BACKFILL_OVERLAP_DAYS, 1)),
      liveCollectCount: Math.max(1, Number(env.LIVE_COLLECT_COUNT) || 10),
      maxBarsPerCall: Math.max(1, Number(env.MAX_BARS_PER_CALL) || 50_000),
      syncConcurrency: Math.max(1, Number(env.SYNC_CONCURRENCY) || 1),
      collectionMaxCycles: Math.max(0, Number(env.COLLECTION_MAX_CYCLES) || 0),
    },
    database: {
      url: String(env.DATABASE_URL || '').trim(),
      ssl: readBool(env.DB_SSL, false),
      sslRejectUnauthorized: readBool(env.DB_SSL_REJECT_UNAUTHORIZED, true),
      slowQueryThresholdMs: Math.max(0, Number(env.SLOW_QUERY_THRESHOLD_MS) || 500),
    },
    source: {
      baseUrl: String(env.SOURCE_BASE_URL || '').trim(),
      apiKey: String(env.SOURCE_API_KEY || '').trim(),
      login: String(env.SOURCE_LOGIN || '').trim(),
      password: String(env.SOURCE_PASSWORD || ''),
      server: String(env.SOURCE_SERVER || '').trim(),
      timeoutMs: Math.max(1_000, Number(env.SOURCE_TIMEOUT_MS) || 15_000),
    },
    logLevel: String(env.LOG_LEVEL || 'info'),
  };
}

/** Every configured (instrument, timeframe) pair, instrument-major. */
export function buildSeriesList(sync: Pick<SyncConfig, 'instruments' | 'timeframes'>): Series[] {
  const series: Series[] = [];
  for (const instrument of sync.instruments) {
    for (const timeframe of sync.timeframes) {
      series.push({ instrument, timeframe });
    }
  }
  return series;
}

/** Config snapshot safe to log: credentials are masked. */
export function describeConfig(config: AppConfig): Record<string, unknown> {
  return {
    ...config.sync,
    databaseSsl: config.database.ssl,
    sourceBaseUrl: sanitizeBridgeUrl(config.source.baseUrl),
    sourceLogin: config.source.login,
    sourceServer: config.source.server,
    sourceApiKey: config.source.apiKey ? '***' : '',
    sourceTimeoutMs: config.source.timeoutMs,
  };
}
