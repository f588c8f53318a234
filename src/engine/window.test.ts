import assert from 'node:assert/strict';
import { test } from 'node:test';
import { TradingCalendar } from './calendar.js';
import type { Sample } from './types.js';
import { backwardTradingInstants, computeWindow } from './window.js';

const cal = new TradingCalendar();
const at = (s: string) => cal.parseLocal(s);
const sample = (s: string, price: number): Sample => ({ timestamp: at(s), price });

function approx(actual: number, expected: number) {
  assert.ok(Math.abs(actual - expected) < 1e-9, `${actual} != ${expected}`);
}

test('walk skips the midday break', () => {
  const got = [...backwardTradingInstants(cal, { from: at('2025-04-04 13:00:02'), floor: at('2025-04-04 11:29:58') })];
  assert.deepEqual(got.map((t) => cal.formatLocal(t).slice(11)), [
    '13:00:02', '13:00:01', '13:00:00', '11:30:00', '11:29:59', '11:29:58'
  ]);
});

test('walk crosses the night and stops at its budget', () => {
  const got = [...backwardTradingInstants(cal, { from: at('2025-04-04 09:30:01'), limit: 4 })];
  assert.deepEqual(got.map((t) => cal.formatLocal(t)), [
    '2025-04-04 09:30:01', '2025-04-04 09:30:00', '2025-04-03 15:00:00', '2025-04-03 14:59:59'
  ]);
});

test('walk crosses the weekend', () => {
  const got = [...backwardTradingInstants(cal, { from: at('2025-04-07 09:30:00'), limit: 2 })];
  assert.deepEqual(got.map((t) => cal.formatLocal(t)), ['2025-04-07 09:30:00', '2025-04-04 15:00:00']);
});

test('no update yet gives zero', () => {
  const r = computeWindow({ samples: [], now: undefined, window: 60, calendar: cal, fallback: 100 });
  assert.equal(r.sma, 0);
  assert.equal(r.count, 0);
});

test('single sample at 09:31 over a 60 second window', () => {
  const samples = [sample('2025-04-04 09:31:00', 100)];
  const r = computeWindow({ samples, now: at('2025-04-04 09:31:00'), window: 60, calendar: cal, fallback: 100, collect: true });
  assert.equal(r.sma, 100);
  assert.equal(r.count, 1);
  // 09:30:00..09:30:59 predate the only sample and resolve to 0
  assert.equal(r.points.length, 61);
  assert.equal(r.points.filter((p) => p.price === 0).length, 60);
  assert.equal(r.continued, false);
});

test('two samples near the open', () => {
  const samples = [sample('2025-04-04 09:30:00', 100), sample('2025-04-04 09:30:05', 101)];
  const r = computeWindow({ samples, now: at('2025-04-04 09:30:05'), window: 10, calendar: cal, fallback: 100 });
  assert.equal(r.count, 6);
  assert.equal(r.sum, 601);
  approx(r.sma, 601 / 6);
});

test('afternoon query continues from the morning close', () => {
  const samples = [sample('2025-04-04 11:00:00', 10), sample('2025-04-04 13:00:05', 20)];
  const r = computeWindow({ samples, now: at('2025-04-04 13:00:10'), window: 20, calendar: cal, fallback: 100 });
  assert.equal(r.continued, true);
  assert.equal(r.count, 20);
  assert.equal(r.sum, 260);
  assert.equal(r.sma, 13);
});

test('continuation restarts at the morning close even when the first walk reached it', () => {
  const samples = [sample('2025-04-04 09:30:00', 50), sample('2025-04-04 13:00:00', 80)];
  const r = computeWindow({ samples, now: at('2025-04-04 13:00:00'), window: 5410, calendar: cal, fallback: 100, collect: true });
  assert.equal(r.count, 5410);
  assert.equal(r.sum, 270530);
  approx(r.sma, 270530 / 5410);
  assert.equal(r.points[1].timestamp, at('2025-04-04 11:30:00'));
  assert.equal(r.points[12].timestamp, at('2025-04-04 11:30:00'));
  assert.equal(r.points[r.points.length - 1].timestamp, at('2025-04-04 10:00:03'));
});

test('weekend gap is skipped and pre-data seconds are excluded', () => {
  const samples = [sample('2025-04-04 14:59:00', 40), sample('2025-04-07 09:30:02', 60)];
  const r = computeWindow({ samples, now: at('2025-04-07 09:30:05'), window: 3 * 86400, calendar: cal, fallback: 100 });
  assert.equal(r.continued, false);
  assert.equal(r.count, 67);
  assert.equal(r.sum, 2760);
  approx(r.sma, 2760 / 67);
});

test('after the close the first walk jumps a day and the continuation covers the morning', () => {
  const samples = [sample('2025-04-04 10:00:00', 10), sample('2025-04-04 14:00:00', 20)];
  const r = computeWindow({ samples, now: at('2025-04-04 15:30:00'), window: 3600, calendar: cal, fallback: 100, collect: true });
  assert.equal(r.continued, true);
  assert.equal(r.count, 3600);
  assert.equal(r.sma, 10);
  assert.equal(r.points[0].timestamp, at('2025-04-04 11:30:00'));
  assert.equal(r.points[r.points.length - 1].timestamp, at('2025-04-04 10:30:01'));
});

test('nothing tradable in the window gives zero', () => {
  const samples = [sample('2025-04-05 10:00:00', 10)];
  const r = computeWindow({ samples, now: at('2025-04-05 10:00:00'), window: 600, calendar: cal, fallback: 100 });
  assert.equal(r.sma, 0);
  assert.equal(r.count, 0);
});
