import type { Sample } from './types.js';

export const EXACT_TOLERANCE_SEC = 0.1;

type Entry = { sample: Sample; index: number };

/**
 * Forward-fill price resolution over a fixed snapshot of samples.
 * Build once per window computation; each query is a binary search.
 */
export class PriceLookup {
  private readonly ordered: Entry[];

  constructor(samples: readonly Sample[]) {
    this.ordered = samples
      .map((sample, index) => ({ sample, index }))
      .sort((a, b) => a.sample.timestamp - b.sample.timestamp || a.sample.price - b.sample.price);
  }

  get isEmpty() {
    return this.ordered.length === 0;
  }

  /**
   * Price at `t`: the exact sample within tolerance, otherwise the latest sample at or before `t`.
   * Returns 0 when `t` predates every sample and `fallback` when there are none.
   */
  resolvePrice(t: number, fallback: number): number {
    if (this.ordered.length === 0) return fallback;

    const exact = this.nearest(t);
    if (exact) return exact.sample.price;

    const i = this.upperBound(t) - 1;
    if (i < 0) return 0;
    return this.ordered[i].sample.price;
  }

  hasSampleNear(t: number): boolean {
    return this.nearest(t) !== undefined;
  }

  // First stored (by insertion order) sample within tolerance of `t`.
  private nearest(t: number): Entry | undefined {
    let best: Entry | undefined;
    for (let i = this.lowerBound(t - 2 * EXACT_TOLERANCE_SEC); i < this.ordered.length; i++) {
      const e = this.ordered[i];
      if (e.sample.timestamp > t + 2 * EXACT_TOLERANCE_SEC) break;
      if (Math.abs(e.sample.timestamp - t) < EXACT_TOLERANCE_SEC && (!best || e.index < best.index)) best = e;
    }
    return best;
  }

  // First index whose timestamp is >= x.
  private lowerBound(x: number) {
    let lo = 0;
    let hi = this.ordered.length;
    while (lo < hi) {
      const mid = (lo + hi) >>> 1;
      if (this.ordered[mid].sample.timestamp < x) lo = mid + 1;
      else hi = mid;
    }
    return lo;
  }

  // First index whose timestamp is > x.
  private upperBound(x: number) {
    let lo = 0;
    let hi = this.ordered.length;
    while (lo < hi) {
      const mid = (lo + hi) >>> 1;
      if (this.ordered[mid].sample.timestamp <= x) lo = mid + 1;
      else hi = mid;
    }
    return lo;
  }
}
