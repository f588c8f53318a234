import type { Sample } from './types.js';

const EARLY_SPLIT = 0.2;
const MID_SPLIT = 0.5;
const EARLY_KEEP = 0.1;
const MID_KEEP = 0.3;

// Evenly spaced subsequence of `keep` elements (indices may repeat when keep > part.length).
function pick(part: Sample[], keep: number): Sample[] {
  if (part.length === 0 || keep <= 0) return [];
  const out: Sample[] = [];
  for (let i = 0; i < keep; i++) out.push(part[Math.floor((i * part.length) / keep)]);
  return out;
}

/**
 * Tiered downsample to at most `capacity` samples: sparse early history, dense recent history.
 * The sample with the greatest timestamp always survives.
 */
export function downsample(samples: readonly Sample[], capacity: number): Sample[] {
  const sorted = [...samples].sort((a, b) => a.timestamp - b.timestamp);
  const n = sorted.length;
  if (n === 0) return [];

  const earlyEnd = Math.floor(n * EARLY_SPLIT);
  const midEnd = Math.floor(n * MID_SPLIT);

  const earlyKeep = Math.max(1, Math.floor(capacity * EARLY_KEEP));
  const midKeep = Math.max(1, Math.floor(capacity * MID_KEEP));
  const recentKeep = capacity - earlyKeep - midKeep;

  const out = [
    ...pick(sorted.slice(0, earlyEnd), earlyKeep),
    ...pick(sorted.slice(earlyEnd, midEnd), midKeep),
    ...pick(sorted.slice(midEnd), recentKeep)
  ];

  const latest = sorted[n - 1];
  const kept = out.some((s) => s.timestamp === latest.timestamp && s.price === latest.price);
  if (!kept) {
    // Overwrites whatever occupied the last slot.
    if (out.length === 0) out.push(latest);
    else out[out.length - 1] = latest;
  }
  return out;
}

export class PriceSeries {
  readonly capacity: number;
  private samples: Sample[] = [];

  constructor(capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) throw new Error(`capacity must be an integer >= 1, got ${capacity}`);
    this.capacity = capacity;
  }

  get size() {
    return this.samples.length;
  }

  update(timestamp: number, price: number) {
    this.samples.push({ timestamp, price });
    if (this.samples.length > this.capacity) this.samples = downsample(this.samples, this.capacity);
  }

  // Most recently stored element in storage order.
  last(): Sample | undefined {
    return this.samples.length ? this.samples[this.samples.length - 1] : undefined;
  }

  snapshot(): readonly Sample[] {
    return this.samples.slice();
  }
}
