/**
 * Query monitoring for the candle store's pg Pool: times query() calls and
 * logs slow queries and query errors via console (captured by pino).
 *
 * Kysely runs its statements on checked-out clients, so clients are wrapped
 * as the pool creates them, in addition to Pool.query itself.
 */

import type { Pool, PoolClient } from 'pg';

export const DEFAULT_SLOW_QUERY_THRESHOLD_MS = 500;

export interface InstrumentPoolOptions {
  poolName?: string;
  slowQueryThresholdMs?: number;
  now?: () => number;
}

interface MonitorSettings {
  poolName: string;
  thresholdMs: number;
  now: () => number;
}

type QueryFn = (...args: unknown[]) => Promise<unknown>;

function extractSql(args: unknown[]): string {
  const first = args[0];
  const raw = typeof first === 'string' ? first : (first as Record<string, unknown>)?.text || '';
  return String(raw).replace(/\s+/g, ' ').trim().slice(0, 200);
}

// Callback-style calls and submittables (cursors) are passed through untimed.
function isPassThroughCall(args: unknown[]): boolean {
  if (typeof args[args.length - 1] === 'function') return true;
  const first = args[0];
  return typeof first === 'object' && first !== null && typeof (first as Record<string, unknown>).submit === 'function';
}

function wrapQuery(target: Pool | PoolClient, settings: MonitorSettings): void {
  const { poolName, thresholdMs, now } = settings;
  // pg's query() overloads cannot be reassigned through the typed interface.
  const queryable = target as unknown as { query: QueryFn };
  const originalQuery = queryable.query.bind(target);

  queryable.query = async function monitoredQuery(...args: unknown[]) {
    if (isPassThroughCall(args)) return originalQuery(...args);
    const start = now();
    try {
      const result = await originalQuery(...args);
      const durationMs = now() - start;
      if (durationMs >= thresholdMs) {
        console.warn(`[slow-query] pool=${poolName} duration=${Math.round(durationMs)}ms sql=${extractSql(args)}`);
      }
      return result;
    } catch (err: unknown) {
      const durationMs = now() - start;
      console.error(
        `[query-error] pool=${poolName} duration=${Math.round(durationMs)}ms sql=${extractSql(args)} error=${err instanceof Error ? err.message : String(err)}`,
      );
      throw err;
    }
  };
}

export function instrumentPool(pool: Pool, options: InstrumentPoolOptions = {}): Pool {
  if (!pool || typeof pool.query !== 'function') return pool;

  const settings: MonitorSettings = {
    poolName: options.poolName || 'candles',
    thresholdMs: Math.max(0, Number(options.slowQueryThresholdMs ?? DEFAULT_SLOW_QUERY_THRESHOLD_MS)),
    now: options.now ?? (() => performance.now()),
  };

  wrapQuery(pool, settings);
  if (typeof pool.on === 'function') {
    pool.on('connect', (client: PoolClient) => wrapQuery(client, settings));
  }
  return pool;
}
