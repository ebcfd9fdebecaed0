/**
 * Chunk planning for range fetches.
 *
 * The source caps how many bars one request may return, so a fetch window is
 * walked in sub-ranges of `intervalMinutes * maxBarsPerCall` minutes. When the
 * source still rejects a chunk as too large, the span is halved (never below
 * `minSpanMs`) and the same cursor is retried.
 */

import type { Bar, Chunk, TimeRange } from '../services/syncTypes.js';
import { DAY_MS, MINUTE_MS } from './dateUtils.js';
import { errorMessage, isSyncError } from './errors.js';

export const DEFAULT_MAX_BARS_PER_CALL = 50_000;
export const MIN_CHUNK_SPAN_MS = DAY_MS;

export function chunkSpanMs(intervalMinutes: number, maxBarsPerCall: number): number {
  const minutes = Math.max(1, Math.floor(Number(intervalMinutes) || 1));
  const bars = Math.max(1, Math.floor(Number(maxBarsPerCall) || 1));
  return minutes * bars * MINUTE_MS;
}

/** Split `range` into consecutive chunks that cover it exactly. */
export function planChunks(range: TimeRange, intervalMinutes: number, maxBarsPerCall: number): Chunk[] {
  const endMs = range.end.getTime();
  const span = chunkSpanMs(intervalMinutes, maxBarsPerCall);
  const chunks: Chunk[] = [];
  for (let cursor = range.start.getTime(); cursor < endMs; cursor = Math.min(endMs, cursor + span)) {
    chunks.push({ start: new Date(cursor), end: new Date(Math.min(endMs, cursor + span)) });
  }
  return chunks;
}

export interface ChunkedFetchOptions {
  range: TimeRange;
  intervalMinutes: number;
  maxBarsPerCall: number;
  fetchChunk: (chunk: Chunk) => Promise<Bar[]>;
  minSpanMs?: number;
  onShrink?: (chunk: Chunk, nextSpanMs: number) => void;
  onSkip?: (chunk: Chunk, err: unknown) => void;
  signal?: AbortSignal | null;
}

export interface ChunkedFetchResult {
  bars: Bar[];
  chunksFetched: number;
  skipped: Chunk[];
  /** Span in effect when the walk finished. */
  finalSpanMs: number;
}

/**
 * Walk `range` chunk by chunk, shrinking on `InvalidRangeError`.
 *
 * A shrunken span stays in effect for the rest of the walk. A chunk that is
 * still rejected at the minimum span is skipped and reported; any other error
 * propagates to the caller.
 */
export async function fetchInChunks(options: ChunkedFetchOptions): Promise<ChunkedFetchResult> {
  const { range, fetchChunk, onShrink, onSkip, signal } = options;
  const endMs = range.end.getTime();
  const minSpanMs = Math.max(1, options.minSpanMs ?? MIN_CHUNK_SPAN_MS);
  let spanMs = chunkSpanMs(options.intervalMinutes, options.maxBarsPerCall);
  let cursor = range.start.getTime();
  const bars: Bar[] = [];
  const skipped: Chunk[] = [];
  let chunksFetched = 0;

  while (cursor < endMs) {
    if (signal?.aborted) break;
    const chunk: Chunk = { start: new Date(cursor), end: new Date(Math.min(endMs, cursor + spanMs)) };
    try {
      const chunkBars = await fetchChunk(chunk);
      chunksFetched += 1;
      for (const bar of chunkBars) bars.push(bar);
    } catch (err: unknown) {
      if (!isSyncError(err, 'invalid-range')) throw err;
      if (spanMs > minSpanMs) {
        spanMs = Math.max(minSpanMs, Math.floor(spanMs / 2));
        onShrink?.(chunk, spanMs);
        continue;
      }
      skipped.push(chunk);
      if (onSkip) onSkip(chunk, err);
      else console.warn(`[chunks] skipping ${chunk.start.toISOString()}..${chunk.end.toISOString()}: ${errorMessage(err)}`);
    }
    cursor = chunk.end.getTime();
  }

  return { bars, chunksFetched, skipped, finalSpanMs: spanMs };
}
