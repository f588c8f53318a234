import type { TradingCalendar } from './calendar.js';
import { PriceLookup } from './price_lookup.js';
import type { Sample, WindowPoint, WindowResult } from './types.js';

export type WalkBounds = {
  from: number;
  // Stop once the cursor drops below this instant (never below 0).
  floor?: number;
  // Stop after this many trading instants have been yielded.
  limit?: number;
};

/**
 * Trading instants walking backward one second at a time from `from`.
 * Dead time (midday break, nights, weekends) is skipped by jumping to the previous session close.
 */
export function* backwardTradingInstants(calendar: TradingCalendar, bounds: WalkBounds): Generator<number> {
  const floor = Math.max(0, bounds.floor ?? 0);
  const limit = bounds.limit ?? Infinity;
  let c = bounds.from;
  let taken = 0;

  while (c >= floor && taken < limit) {
    if (calendar.isTradingInstant(c)) {
      yield c;
      taken += 1;
    }
    c -= 1;
    if (c > 0 && !calendar.isTradingInstant(c)) {
      const jump = calendar.previousSessionClose(c);
      if (jump < c) c = jump;
    }
  }
}

export type WindowInput = {
  samples: readonly Sample[];
  now: number | undefined;
  window: number;
  calendar: TradingCalendar;
  // Price used only when no samples are stored.
  fallback: number;
  // Keep every visited instant for the audit log.
  collect?: boolean;
};

const EMPTY: WindowResult = { sma: 0, sum: 0, count: 0, continued: false, points: [] };

/**
 * SMA over every trading second in (now - window, now], priced by forward fill.
 *
 * When `now` is labelled afternoon and fewer than `window` points were found, a second walk
 * restarts at that day's morning close and takes up to `window - count` more trading instants.
 */
export function computeWindow(input: WindowInput): WindowResult {
  const { now, window, calendar, fallback, collect = false } = input;
  if (now === undefined) return { ...EMPTY, points: [] };

  const lookup = new PriceLookup(input.samples);
  const points: WindowPoint[] = [];
  let sum = 0;
  let count = 0;

  const visit = (t: number) => {
    const price = lookup.resolvePrice(t, fallback);
    // 0 means "before the data horizon", never a traded price.
    if (price > 0) {
      sum += price;
      count += 1;
    }
    if (collect) points.push({ timestamp: t, price, original: lookup.hasSampleNear(t) });
  };

  for (const t of backwardTradingInstants(calendar, { from: now, floor: now - window })) visit(t);

  let continued = false;
  if (calendar.sessionOf(now) === 'afternoon' && count < window) {
    continued = true;
    const from = calendar.morningCloseOf(now);
    for (const t of backwardTradingInstants(calendar, { from, limit: window - count })) visit(t);
  }

  return { sma: count > 0 ? sum / count : 0, sum, count, continued, points };
}
