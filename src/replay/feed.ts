import type { TradingCalendar } from '../engine/calendar.js';
import type { Sample } from '../engine/types.js';

export type FeedOptions = {
  start: number;
  points: number;
  seed: number;
  minStepSec: number;
  maxStepSec: number;
  startPrice: number;
  floorPrice: number;
};

// Deterministic PRNG in [0, 1).
export function mulberry32(seed: number): () => number {
  return function() {
    let t = (seed += 0x6d2b79f5);
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

/**
 * Synthetic trading-hours price feed: random steps of minStepSec..maxStepSec seconds, moves of up
 * to ±1% per step. Instants outside a session are pushed to the next session open.
 */
export function generateFeed(calendar: TradingCalendar, opts: FeedOptions): Sample[] {
  const rng = mulberry32(opts.seed);
  const stepRange = opts.maxStepSec - opts.minStepSec + 1;

  let ts = calendar.nextSessionOpen(opts.start);
  let price = opts.startPrice;
  const out: Sample[] = [{ timestamp: ts, price }];

  for (let i = 1; i < opts.points; i++) {
    ts += opts.minStepSec + Math.floor(rng() * stepRange);
    ts = calendar.nextSessionOpen(ts);

    price = price * (1 + (rng() * 2 - 1) / 100);
    if (price < opts.floorPrice) price = opts.floorPrice + rng() * 10;

    out.push({ timestamp: ts, price });
  }
  return out;
}
