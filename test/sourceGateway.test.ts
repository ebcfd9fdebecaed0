import test from 'node:test';
import assert from 'node:assert/strict';

import { SourceGateway, matchInstrument, normalizeRates } from '../server/services/sourceGateway.js';
import type { ResolvedSeries, Series } from '../server/services/syncTypes.js';
import { FakeMarketDataSource } from './helpers/fakes.js';

const NOW = new Date('2026-03-06T00:00:00Z');
const SERIES: Series = { instrument: 'USTech', timeframe: 'H1' };
const RESOLVED: ResolvedSeries = { ...SERIES, nativeSymbol: 'NAS100' };

function createGateway(source = new FakeMarketDataSource({ now: () => NOW })) {
  const logs: string[] = [];
  const warnings: string[] = [];
  const gateway = new SourceGateway(source, {
    log: (message) => logs.push(message),
    warn: (message) => warnings.push(message),
  });
  return { gateway, source, logs, warnings };
}

// ---------------------------------------------------------------------------
// matchInstrument
// ---------------------------------------------------------------------------

test('matchInstrument prefers an alias over a looser alias prefix', () => {
  assert.equal(matchInstrument('USTech', ['US30', 'NAS100', 'USTEC.cash']), 'NAS100');
});

test('matchInstrument ranks exact before prefix', () => {
  assert.equal(matchInstrument('US30', ['US30.cash', 'US30']), 'US30');
});

test('matchInstrument ranks a substring match before an alias', () => {
  assert.equal(matchInstrument('GER40', ['DE40', 'cfd.GER40']), 'cfd.GER40');
});

test('matchInstrument breaks ties by length, then lexicographically', () => {
  assert.equal(matchInstrument('EURUSD', ['EURUSD.pro', 'EURUSDm']), 'EURUSDm');
  assert.equal(matchInstrument('US30', ['US30b', 'US30a']), 'US30a');
});

test('matchInstrument returns null when nothing matches', () => {
  assert.equal(matchInstrument('GOLD', ['US30', 'NAS100']), null);
  assert.equal(matchInstrument('  ', ['US30']), null);
});

// ---------------------------------------------------------------------------
// normalizeRates
// ---------------------------------------------------------------------------

test('normalizeRates validates each record and trims to the range', () => {
  const range = { start: new Date('2026-03-01T00:00:00Z'), end: new Date('2026-03-02T00:00:00Z') };
  const { bars, dropped } = normalizeRates(
    SERIES,
    [
      { time: 1772326800, open: 2, high: 3, low: 1, close: 2.5, tick_volume: 5.9 },
      { time: 1772323200, open: 1, high: 2, low: 0.5, close: 1.5 },
      { time: '2026-03-01 02:00:00', open: 3, high: 4, low: 2, close: 3.5, tick_volume: 1 },
      { time: 1772323200, open: 'x', high: 2, low: 0.5, close: 1.5 },
      { time: 'garbage', open: 1, high: 2, low: 0.5, close: 1.5 },
      { time: 1772330400, open: Infinity, high: 2, low: 0.5, close: 1.5 },
      { time: 1772409600, open: 9, high: 9, low: 9, close: 9 },
    ],
    range,
  );

  assert.equal(dropped, 3);
  assert.deepEqual(
    bars.map((b) => [b.timestamp.toISOString(), b.open, b.volume]),
    [
      ['2026-03-01T00:00:00.000Z', 1, 0],
      ['2026-03-01T01:00:00.000Z', 2, 5],
      ['2026-03-01T02:00:00.000Z', 3, 1],
    ],
  );
  assert.equal(bars[0].instrument, 'USTech');
  assert.equal(bars[0].timeframe, 'H1');
});

// ---------------------------------------------------------------------------
// SourceGateway
// ---------------------------------------------------------------------------

test('resolveInstrument reads the symbol directory once per instrument', async () => {
  const { gateway, source, logs } = createGateway();

  assert.equal(await gateway.resolveInstrument('USTech'), 'NAS100');
  assert.equal(await gateway.resolveInstrument(' ustech '), 'NAS100');
  assert.equal(source.listSymbolsCalls, 1);
  assert.deepEqual(logs, ['[source] resolved USTech -> NAS100']);
});

test('resolveInstrument does not log an exact match', async () => {
  const { gateway, logs } = createGateway();
  assert.equal(await gateway.resolveInstrument('US30'), 'US30');
  assert.deepEqual(logs, []);
});

test('resolveInstrument caches a missing instrument and warns once', async () => {
  const { gateway, source, warnings } = createGateway();

  await assert.rejects(() => gateway.resolveInstrument('GOLD'), { name: 'UnknownInstrumentError' });
  await assert.rejects(() => gateway.resolveInstrument('GOLD'), { name: 'UnknownInstrumentError' });
  assert.equal(source.listSymbolsCalls, 1);
  assert.deepEqual(warnings, ['[source] Instrument "GOLD" is not available on the source; its series will be skipped']);
});

test('resolveInstrument does not cache a directory read failure', async () => {
  const { gateway, source } = createGateway();
  source.online = false;
  await assert.rejects(() => gateway.resolveInstrument('USTech'), { name: 'ConnectivityError' });

  source.online = true;
  assert.equal(await gateway.resolveInstrument('USTech'), 'NAS100');
  assert.equal(source.listSymbolsCalls, 2);
});

test('resolveInstrument shares one directory read between concurrent callers', async () => {
  const { gateway, source, logs } = createGateway();
  source.symbols = [{ name: 'NAS100', visible: false }];

  const resolved = await Promise.all([gateway.resolveInstrument('USTech'), gateway.resolveInstrument('ustech')]);
  assert.deepEqual(resolved, ['NAS100', 'NAS100']);
  assert.equal(source.listSymbolsCalls, 1);
  assert.deepEqual(source.selected, ['NAS100']);
  assert.deepEqual(logs, ['[source] resolved USTech -> NAS100']);
});

test('resolveInstrument warns once when concurrent callers miss the same instrument', async () => {
  const { gateway, source, warnings } = createGateway();

  const outcomes = await Promise.allSettled([gateway.resolveInstrument('GOLD'), gateway.resolveInstrument('GOLD')]);
  assert.deepEqual(
    outcomes.map((o) => o.status),
    ['rejected', 'rejected'],
  );
  assert.equal(source.listSymbolsCalls, 1);
  assert.deepEqual(warnings, ['[source] Instrument "GOLD" is not available on the source; its series will be skipped']);
});

test('resolveSeries keeps the configured instrument name', async () => {
  const { gateway } = createGateway();
  assert.deepEqual(await gateway.resolveSeries(SERIES), RESOLVED);
});

test('fetchRange excludes the bar at the range end', async () => {
  const { gateway, source } = createGateway();
  const bars = await gateway.fetchRange(RESOLVED, {
    start: new Date('2026-03-01T00:00:00Z'),
    end: new Date('2026-03-01T03:00:00Z'),
  });

  assert.deepEqual(
    bars.map((b) => b.timestamp.toISOString()),
    ['2026-03-01T00:00:00.000Z', '2026-03-01T01:00:00.000Z', '2026-03-01T02:00:00.000Z'],
  );
  assert.equal(source.rangeCalls[0].timeframeCode, 16385);
});

test('fetchRange skips the source for an empty range', async () => {
  const { gateway, source } = createGateway();
  assert.deepEqual(await gateway.fetchRange(RESOLVED, { start: NOW, end: NOW }), []);
  assert.equal(source.rangeCalls.length, 0);
});

test('fetchLatest reports malformed records', async () => {
  class MalformedSource extends FakeMarketDataSource {
    override async fetchRatesLatest(): Promise<unknown[]> {
      return [{ time: 1772323200, open: 1, high: 2, low: 0.5, close: 1.5 }, { time: 1772326800 }];
    }
  }
  const { gateway, warnings } = createGateway(new MalformedSource({ now: () => NOW }));

  const bars = await gateway.fetchLatest(RESOLVED, 2);
  assert.equal(bars.length, 1);
  assert.deepEqual(warnings, ['[source] dropped 1 malformed rate record(s) for USTech H1']);
});

test('probe and describe go through the account and terminal calls', async () => {
  const { gateway, source } = createGateway();

  assert.equal(await gateway.probe(), true);
  assert.deepEqual(await gateway.describe(), {
    terminal: { name: 'Test Terminal' },
    account: { login: 1001, server: 'Demo-Server' },
  });

  source.online = false;
  assert.equal(await gateway.probe(), false);
});
