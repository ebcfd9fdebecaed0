import test from 'node:test';
import assert from 'node:assert/strict';

import { chunkSpanMs, fetchInChunks, planChunks } from '../server/lib/chunkPlanner.js';
import { ConnectivityError, InvalidRangeError } from '../server/lib/errors.js';
import type { Chunk, Series } from '../server/services/syncTypes.js';
import { HOUR_MS, makeBar } from './helpers/fakes.js';

const SERIES: Series = { instrument: 'US30', timeframe: 'H1' };
const START = new Date('2026-03-01T00:00:00Z');

function iso(chunks: Chunk[]): string[][] {
  return chunks.map((c) => [c.start.toISOString(), c.end.toISOString()]);
}

test('chunkSpanMs is interval times bar cap', () => {
  assert.equal(chunkSpanMs(1, 50_000), 3_000_000_000);
  assert.equal(chunkSpanMs(60, 24), 24 * HOUR_MS);
});

test('planChunks covers the range exactly with a short final chunk', () => {
  const chunks = planChunks({ start: START, end: new Date('2026-03-03T12:00:00Z') }, 60, 24);
  assert.deepEqual(iso(chunks), [
    ['2026-03-01T00:00:00.000Z', '2026-03-02T00:00:00.000Z'],
    ['2026-03-02T00:00:00.000Z', '2026-03-03T00:00:00.000Z'],
    ['2026-03-03T00:00:00.000Z', '2026-03-03T12:00:00.000Z'],
  ]);
});

test('planChunks chunks are contiguous and end at the range end', () => {
  for (const [minutes, maxBars, hours] of [
    [1, 1000, 50],
    [5, 7, 3],
    [60, 24, 24],
    [1440, 3, 1000],
  ]) {
    const end = new Date(START.getTime() + hours * HOUR_MS + 17_000);
    const chunks = planChunks({ start: START, end }, minutes, maxBars);
    assert.equal(chunks[0].start.getTime(), START.getTime());
    assert.equal(chunks[chunks.length - 1].end.getTime(), end.getTime());
    for (let i = 1; i < chunks.length; i++) {
      assert.equal(chunks[i].start.getTime(), chunks[i - 1].end.getTime());
    }
    assert.ok(chunks.every((c) => c.end.getTime() - c.start.getTime() <= chunkSpanMs(minutes, maxBars)));
  }
});

test('planChunks returns nothing for an empty range', () => {
  assert.deepEqual(planChunks({ start: START, end: START }, 60, 24), []);
  assert.deepEqual(planChunks({ start: START, end: new Date(START.getTime() - HOUR_MS) }, 60, 24), []);
});

test('fetchInChunks shrinks the span until the source accepts it', async () => {
  const shrinks: number[] = [];
  const requested: Chunk[] = [];
  const result = await fetchInChunks({
    range: { start: START, end: new Date(START.getTime() + 48 * HOUR_MS) },
    intervalMinutes: 60,
    maxBarsPerCall: 48,
    minSpanMs: 6 * HOUR_MS,
    fetchChunk: async (chunk) => {
      requested.push(chunk);
      if (chunk.end.getTime() - chunk.start.getTime() > 12 * HOUR_MS) throw new InvalidRangeError('too large');
      return [makeBar(SERIES, chunk.start)];
    },
    onShrink: (_chunk, nextSpanMs) => shrinks.push(nextSpanMs / HOUR_MS),
  });

  assert.deepEqual(shrinks, [24, 12]);
  assert.equal(requested.length, 6);
  assert.equal(result.chunksFetched, 4);
  assert.equal(result.finalSpanMs, 12 * HOUR_MS);
  assert.deepEqual(result.skipped, []);
  assert.deepEqual(
    result.bars.map((b) => b.timestamp.toISOString()),
    ['2026-03-01T00:00:00.000Z', '2026-03-01T12:00:00.000Z', '2026-03-02T00:00:00.000Z', '2026-03-02T12:00:00.000Z'],
  );
});

test('fetchInChunks skips a chunk rejected at the minimum span', async () => {
  const skipped: Chunk[] = [];
  const result = await fetchInChunks({
    range: { start: START, end: new Date(START.getTime() + 2 * HOUR_MS) },
    intervalMinutes: 60,
    maxBarsPerCall: 1,
    minSpanMs: HOUR_MS,
    fetchChunk: async (chunk) => {
      if (chunk.start.getTime() === START.getTime()) throw new InvalidRangeError('no data');
      return [makeBar(SERIES, chunk.start)];
    },
    onSkip: (chunk) => skipped.push(chunk),
  });

  assert.deepEqual(iso(skipped), [['2026-03-01T00:00:00.000Z', '2026-03-01T01:00:00.000Z']]);
  assert.deepEqual(iso(result.skipped), iso(skipped));
  assert.equal(result.bars.length, 1);
});

test('fetchInChunks propagates errors other than an invalid range', async () => {
  await assert.rejects(
    fetchInChunks({
      range: { start: START, end: new Date(START.getTime() + HOUR_MS) },
      intervalMinutes: 60,
      maxBarsPerCall: 10,
      fetchChunk: async () => {
        throw new ConnectivityError('terminal offline');
      },
    }),
    { name: 'ConnectivityError' },
  );
});

test('fetchInChunks fetches nothing once aborted', async () => {
  const controller = new AbortController();
  controller.abort();
  let calls = 0;
  const result = await fetchInChunks({
    range: { start: START, end: new Date(START.getTime() + HOUR_MS) },
    intervalMinutes: 60,
    maxBarsPerCall: 10,
    signal: controller.signal,
    fetchChunk: async () => {
      calls++;
      return [];
    },
  });
  assert.equal(calls, 0);
  assert.deepEqual(result.bars, []);
});
