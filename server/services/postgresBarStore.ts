/**
 * PostgreSQL conformance of `BarStore` on pg + kysely.
 *
 * Writes are `insert ... on conflict do nothing` in fixed-size batches, so a
 * re-delivered bar is ignored rather than updated. Driver errors are mapped
 * onto the sync error taxonomy by SQLSTATE class.
 */

import { Kysely, PostgresDialect, sql } from 'kysely';
import { Pool, type PoolConfig } from 'pg';
import type { Database } from '../db/types.js';
import { instrumentPool } from '../lib/dbMonitor.js';
import { ConnectivityError, StorageIntegrityError, errorMessage, isSyncError } from '../lib/errors.js';
import { isTimeframeName } from '../lib/timeframes.js';
import type { BarStore, CollectionEvent } from './barStore.js';
import { seriesLabel, type Bar, type Series, type TimeRange } from './syncTypes.js';

export const INSERT_BATCH_SIZE = 1000;

// ---------------------------------------------------------------------------
// Query builders (exported so the generated SQL can be checked without a DB)
// ---------------------------------------------------------------------------

function toCandleRow(bar: Bar) {
  return {
    instrument: bar.instrument,
    timeframe: bar.timeframe,
    timestamp: bar.timestamp,
    open: bar.open,
    high: bar.high,
    low: bar.low,
    close: bar.close,
    volume: Math.trunc(bar.volume),
  };
}

function buildInsertBarsQuery(db: Kysely<Database>, bars: readonly Bar[]) {
  return db
    .insertInto('candles')
    .values(bars.map(toCandleRow))
    .onConflict((oc) => oc.columns(['instrument', 'timeframe', 'timestamp']).doNothing());
}

function buildHighWaterMarkQuery(db: Kysely<Database>, series: Series) {
  return db
    .selectFrom('candles')
    .select(sql<Date | null>`max(${sql.ref('timestamp')})`.as('high_water_mark'))
    .where('instrument', '=', series.instrument)
    .where('timeframe', '=', series.timeframe);
}

function buildCountBarsQuery(db: Kysely<Database>, series: Series) {
  return db
    .selectFrom('candles')
    .select((eb) => eb.fn.countAll().as('count'))
    .where('instrument', '=', series.instrument)
    .where('timeframe', '=', series.timeframe);
}

function buildRangeQuery(db: Kysely<Database>, series: Series, range: TimeRange) {
  return db
    .selectFrom('candles')
    .where('instrument', '=', series.instrument)
    .where('timeframe', '=', series.timeframe)
    .where('timestamp', '>=', range.start)
    .where('timestamp', '<', range.end)
    .orderBy('timestamp', 'asc');
}

function buildTimestampsQuery(db: Kysely<Database>, series: Series, range: TimeRange) {
  return buildRangeQuery(db, series, range).select('timestamp');
}

function buildBarsInRangeQuery(db: Kysely<Database>, series: Series, range: TimeRange) {
  return buildRangeQuery(db, series, range).select([
    'instrument',
    'timeframe',
    'timestamp',
    'open',
    'high',
    'low',
    'close',
    'volume',
  ]);
}

function buildLogEventQuery(db: Kysely<Database>, event: CollectionEvent) {
  return db.insertInto('collection_events').values({
    level: event.level,
    message: event.message,
    instrument: event.instrument ?? null,
    timeframe: event.timeframe ?? null,
    details: event.details ? JSON.stringify(event.details) : null,
    timestamp: event.timestamp,
  });
}

// ---------------------------------------------------------------------------
// Error classification
// ---------------------------------------------------------------------------

// SQLSTATE classes; Node's own errno codes (ECONNRESET, EPIPE, ...) never match.
const SQLSTATE_RE = /^(?:[0-9]{2}|F0|HV|P0|XX)[0-9A-Z]{3}$/;

const SOCKET_ERROR_CODES = new Set([
  'ECONNREFUSED',
  'ECONNRESET',
  'ECONNABORTED',
  'ETIMEDOUT',
  'EPIPE',
  'ENOTFOUND',
  'EHOSTUNREACH',
  'ENETUNREACH',
  'EAI_AGAIN',
]);

// pg raises these without a code when the socket goes away.
const LOST_CONNECTION_RE = /connection terminated|not queryable|timeout exceeded when trying to connect/i;

function readErrorCode(err: unknown): string | null {
  if (!err || typeof err !== 'object' || !('code' in err)) return null;
  const code = err.code;
  return typeof code === 'string' ? code : null;
}

function readSqlState(err: unknown): string | null {
  const code = readErrorCode(err);
  return code !== null && SQLSTATE_RE.test(code) ? code : null;
}

function isConnectivityError(err: unknown, sqlState: string | null): boolean {
  if (sqlState !== null) return sqlState.startsWith('08') || sqlState.startsWith('57P');
  const code = readErrorCode(err);
  if (code !== null) return SOCKET_ERROR_CODES.has(code);
  return err instanceof Error && LOST_CONNECTION_RE.test(err.message);
}

/**
 * Connection-class SQLSTATEs and socket errors become ConnectivityError. Any
 * other SQLSTATE becomes StorageIntegrityError on writes. Everything else,
 * and every other read failure, is returned unchanged.
 */
function classifyStoreError(err: unknown, action: string, isWrite: boolean): unknown {
  if (isSyncError(err)) return err;
  const sqlState = readSqlState(err);
  const message = `${action} failed${sqlState ? ` (${sqlState})` : ''}: ${errorMessage(err)}`;
  if (isConnectivityError(err, sqlState)) {
    return new ConnectivityError(message, { cause: err, code: sqlState ?? readErrorCode(err) ?? undefined });
  }
  if (isWrite && sqlState !== null) {
    return new StorageIntegrityError(message, { cause: err, code: sqlState });
  }
  return err;
}

// ---------------------------------------------------------------------------
// Store
// ---------------------------------------------------------------------------

export interface PostgresBarStoreOptions {
  connectionString: string;
  ssl?: boolean;
  sslRejectUnauthorized?: boolean;
  poolMax?: number;
  statementTimeoutMs?: number;
  slowQueryThresholdMs?: number;
}

export class PostgresBarStore implements BarStore {
  readonly name = 'store';
  private readonly options: PostgresBarStoreOptions;
  private db: Kysely<Database> | null = null;

  constructor(options: PostgresBarStoreOptions) {
    if (!String(options.connectionString || '').trim()) {
      throw new Error('DATABASE_URL is not configured');
    }
    this.options = options;
  }

  /** The live kysely handle, for migrations. */
  getDb(): Kysely<Database> {
    if (!this.db) {
      throw new ConnectivityError('Store is not connected');
    }
    return this.db;
  }

  async connect(): Promise<void> {
    if (this.db) return;
    const config: PoolConfig = {
      connectionString: this.options.connectionString,
      ssl: this.options.ssl ? { rejectUnauthorized: this.options.sslRejectUnauthorized !== false } : undefined,
      max: Math.max(1, this.options.poolMax ?? 5),
      idleTimeoutMillis: 30000,
      connectionTimeoutMillis: 5000,
      statement_timeout: Math.max(1, this.options.statementTimeoutMs ?? 30000),
    };
    const pool = new Pool(config);
    pool.on('error', (err) => {
      console.error('[store] unexpected idle client error:', errorMessage(err));
    });
    instrumentPool(pool, { poolName: 'candles', slowQueryThresholdMs: this.options.slowQueryThresholdMs });
    this.db = new Kysely<Database>({ dialect: new PostgresDialect({ pool }) });
  }

  async disconnect(): Promise<void> {
    const db = this.db;
    this.db = null;
    if (db) {
      await db.destroy();
    }
  }

  /** Runs `select 1` on every call. */
  async probe(): Promise<boolean> {
    if (!this.db) return false;
    try {
      await sql`select 1`.execute(this.db);
      return true;
    } catch (err: unknown) {
      console.warn(`[store] probe failed: ${errorMessage(err)}`);
      return false;
    }
  }

  async insertBars(bars: readonly Bar[]): Promise<number> {
    if (bars.length === 0) return 0;
    const db = this.getDb();
    let inserted = 0;
    for (let i = 0; i < bars.length; i += INSERT_BATCH_SIZE) {
      const batch = bars.slice(i, i + INSERT_BATCH_SIZE);
      try {
        const result = await buildInsertBarsQuery(db, batch).executeTakeFirst();
        inserted += Number(result.numInsertedOrUpdatedRows ?? 0n);
      } catch (err: unknown) {
        throw classifyStoreError(err, `insert ${batch.length} bar(s) for ${seriesLabel(batch[0])}`, true);
      }
    }
    return inserted;
  }

  async getHighWaterMark(series: Series): Promise<Date | null> {
    const db = this.getDb();
    try {
      const row = await buildHighWaterMarkQuery(db, series).executeTakeFirst();
      return row?.high_water_mark ? new Date(row.high_water_mark) : null;
    } catch (err: unknown) {
      throw classifyStoreError(err, `high-water mark for ${seriesLabel(series)}`, false);
    }
  }

  async countBars(series: Series): Promise<number> {
    const db = this.getDb();
    try {
      const row = await buildCountBarsQuery(db, series).executeTakeFirst();
      return Number(row?.count ?? 0);
    } catch (err: unknown) {
      throw classifyStoreError(err, `count for ${seriesLabel(series)}`, false);
    }
  }

  async listTimestamps(series: Series, range: TimeRange): Promise<Date[]> {
    const db = this.getDb();
    try {
      const rows = await buildTimestampsQuery(db, series, range).execute();
      return rows.map((row) => new Date(row.timestamp));
    } catch (err: unknown) {
      throw classifyStoreError(err, `timestamps for ${seriesLabel(series)}`, false);
    }
  }

  async getBarsInRange(series: Series, range: TimeRange): Promise<Bar[]> {
    const db = this.getDb();
    try {
      const rows = await buildBarsInRangeQuery(db, series, range).execute();
      const bars: Bar[] = [];
      for (const row of rows) {
        if (!isTimeframeName(row.timeframe)) continue;
        bars.push({
          instrument: row.instrument,
          timeframe: row.timeframe,
          timestamp: new Date(row.timestamp),
          open: Number(row.open),
          high: Number(row.high),
          low: Number(row.low),
          close: Number(row.close),
          volume: Number(row.volume),
        });
      }
      return bars;
    } catch (err: unknown) {
      throw classifyStoreError(err, `bars for ${seriesLabel(series)}`, false);
    }
  }

  async logEvent(event: CollectionEvent): Promise<void> {
    const db = this.getDb();
    try {
      await buildLogEventQuery(db, event).execute();
    } catch (err: unknown) {
      throw classifyStoreError(err, 'event log write', true);
    }
  }
}

export {
  buildBarsInRangeQuery,
  buildCountBarsQuery,
  buildHighWaterMarkQuery,
  buildInsertBarsQuery,
  buildLogEventQuery,
  buildTimestampsQuery,
  classifyStoreError,
};
