import test from 'node:test';
import assert from 'node:assert/strict';

import { addUtcDays, daysToMs, toUnixSeconds, toUtcDate } from '../server/lib/dateUtils.js';

const MARCH_1 = '2026-03-01T00:00:00.000Z';

test('toUtcDate reads epoch seconds and milliseconds', () => {
  assert.equal(toUtcDate(1772323200)?.toISOString(), MARCH_1);
  assert.equal(toUtcDate(1772323200000)?.toISOString(), MARCH_1);
  assert.equal(toUtcDate('1772323200')?.toISOString(), MARCH_1);
});

test('toUtcDate reads strings without an offset as UTC', () => {
  assert.equal(toUtcDate('2026-03-01 02:00:00')?.toISOString(), '2026-03-01T02:00:00.000Z');
  assert.equal(toUtcDate('2026-03-01')?.toISOString(), MARCH_1);
  assert.equal(toUtcDate('2026-03-01T02:00:00+02:00')?.toISOString(), MARCH_1);
  assert.equal(toUtcDate('2026-03-01T00:00:00Z')?.toISOString(), MARCH_1);
});

test('toUtcDate returns null for unusable values', () => {
  assert.equal(toUtcDate(Number.NaN), null);
  assert.equal(toUtcDate(''), null);
  assert.equal(toUtcDate('not a date'), null);
  assert.equal(toUtcDate({}), null);
  assert.equal(toUtcDate(new Date('invalid')), null);
});

test('day arithmetic', () => {
  assert.equal(addUtcDays(new Date(MARCH_1), -5).toISOString(), '2026-02-24T00:00:00.000Z');
  assert.equal(daysToMs(2), 172_800_000);
  assert.equal(daysToMs(-1), 0);
  assert.equal(toUnixSeconds(new Date('2026-03-01T00:00:00.999Z')), 1772323200);
});
