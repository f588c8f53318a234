import fs from 'node:fs';
import path from 'node:path';
import { createAuditSink } from '../audit/index.js';
import { SmaEngine } from '../engine/engine.js';
import type { AppConfig } from '../lib/config.js';
import { generateFeed } from './feed.js';

export type ReplayStep = {
  timestamp: number;
  datetime: string;
  price: number;
  sma: number;
};

export type ReplaySummary = {
  generatedAt: string;
  capacity: number;
  window: number;
  points: number;
  firstAt: string | null;
  lastAt: string | null;
  lastSma: number | null;
  minSma: number | null;
  maxSma: number | null;
  retained: number;
  auditPath: string | null;
};

export type ReplayResult = {
  steps: ReplayStep[];
  summary: ReplaySummary;
  outPath: string;
};

// Feeds a synthetic series through the engine, one get() per update.
export function runReplay(config: AppConfig, opts: { cwd: string; print?: (line: string) => void }): ReplayResult {
  const sink = createAuditSink(config.audit, opts.cwd);
  const engine = new SmaEngine({ ...config.engine, calendar: config.calendar, sink });
  const cal = engine.calendar;

  const feed = generateFeed(cal, { ...config.replay, start: cal.parseLocal(config.replay.start) });
  const steps: ReplayStep[] = [];

  try {
    opts.print?.('time\t\t\tprice\tsma');
    for (const s of feed) {
      engine.update(s.timestamp, s.price);
      const sma = engine.get();
      const step = { timestamp: s.timestamp, datetime: cal.formatLocal(s.timestamp), price: s.price, sma };
      steps.push(step);
      opts.print?.(`${step.datetime}\t${step.price.toFixed(2)}\t${step.sma.toFixed(2)}`);
    }
  } finally {
    sink?.close();
  }

  const smas = steps.map((s) => s.sma);
  const first = steps.length ? steps[0] : undefined;
  const last = steps.length ? steps[steps.length - 1] : undefined;
  const summary: ReplaySummary = {
    generatedAt: new Date().toISOString(),
    capacity: engine.capacity,
    window: engine.window,
    points: steps.length,
    firstAt: first?.datetime ?? null,
    lastAt: last?.datetime ?? null,
    lastSma: last?.sma ?? null,
    minSma: smas.length ? Math.min(...smas) : null,
    maxSma: smas.length ? Math.max(...smas) : null,
    retained: engine.size,
    auditPath: config.audit.enabled ? config.audit.path : null
  };

  const outDir = path.join(opts.cwd, 'data', 'replays');
  if (!fs.existsSync(outDir)) fs.mkdirSync(outDir, { recursive: true });
  const ts = summary.generatedAt.replace(/[:.]/g, '-');
  const outPath = path.join(outDir, `replay.${ts}.json`);
  fs.writeFileSync(outPath, JSON.stringify({ summary, steps }, null, 2));

  return { steps, summary, outPath };
}
