import assert from 'node:assert/strict';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { after, test } from 'node:test';
import { CSV_HEADER } from '../audit/csv_sink.js';
import { parseConfig } from '../lib/config.js';
import { runReplay } from './run.js';

const tmp = fs.mkdtempSync(path.join(os.tmpdir(), 'sma-replay-'));
after(() => fs.rmSync(tmp, { recursive: true, force: true }));

test('replays a synthetic feed through the engine', () => {
  const config = parseConfig({
    engine: { capacity: 6, window: 600 },
    audit: { enabled: true, kind: 'csv', path: 'out/audit.csv' },
    replay: { points: 15, seed: 7 }
  });
  const lines: string[] = [];
  const { steps, summary, outPath } = runReplay(config, { cwd: tmp, print: (l) => lines.push(l) });

  assert.equal(steps.length, 15);
  assert.equal(lines.length, 16);
  assert.equal(lines[0], 'time\t\t\tprice\tsma');
  assert.equal(steps[0].datetime, '2025-04-04 09:30:00');
  assert.equal(steps[0].sma, 100);
  assert.ok(steps.every((s) => s.sma > 0));

  assert.equal(summary.points, 15);
  assert.equal(summary.lastSma, steps[14].sma);
  assert.ok(summary.retained <= 6);
  assert.equal(summary.auditPath, 'out/audit.csv');

  const saved: unknown = JSON.parse(fs.readFileSync(outPath, 'utf-8'));
  assert.ok(typeof saved === 'object' && saved !== null && 'summary' in saved);

  const audit = fs.readFileSync(path.join(tmp, 'out', 'audit.csv'), 'utf-8').split('\n');
  assert.equal(audit[0], CSV_HEADER);
  assert.ok(audit.length > 15);
});
