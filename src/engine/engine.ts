import { buildAuditRows } from '../audit/rows.js';
import type { AuditSink } from '../audit/types.js';
import { EngineSchema, type CalendarInput, type EngineInput } from '../lib/config.js';
import { TradingCalendar } from './calendar.js';
import { PriceSeries } from './price_series.js';
import type { Sample, WindowResult } from './types.js';
import { computeWindow } from './window.js';

export type EngineOptions = EngineInput & {
  calendar?: CalendarInput | TradingCalendar;
  sink?: AuditSink;
};

/**
 * Calendar-aware SMA over a bounded sample store.
 *
 * Single writer: callers serialize update/get themselves.
 */
export class SmaEngine {
  readonly calendar: TradingCalendar;
  readonly window: number;
  private readonly defaultPrice: number;
  private readonly series: PriceSeries;
  private readonly sink?: AuditSink;
  private current: number | undefined;

  constructor(options: EngineOptions) {
    const cfg = EngineSchema.parse({
      capacity: options.capacity,
      window: options.window,
      defaultPrice: options.defaultPrice
    });
    this.window = cfg.window;
    this.defaultPrice = cfg.defaultPrice;
    this.series = new PriceSeries(cfg.capacity);
    this.calendar = options.calendar instanceof TradingCalendar
      ? options.calendar
      : new TradingCalendar(options.calendar);
    this.sink = options.sink;
  }

  get now(): number | undefined {
    return this.current;
  }

  get size() {
    return this.series.size;
  }

  get capacity() {
    return this.series.capacity;
  }

  samples(): readonly Sample[] {
    return this.series.snapshot();
  }

  update(timestamp: number, price: number) {
    this.current = timestamp;
    this.series.update(timestamp, price);
  }

  isTradingInstant(timestamp: number): boolean {
    return this.calendar.isTradingInstant(timestamp);
  }

  // Full window result; `get()` is the SMA only.
  compute(collect = false): WindowResult {
    return computeWindow({
      samples: this.series.snapshot(),
      now: this.current,
      window: this.window,
      calendar: this.calendar,
      fallback: this.series.last()?.price ?? this.defaultPrice,
      collect
    });
  }

  get(): number {
    const result = this.compute(this.sink !== undefined);
    if (this.sink && this.current !== undefined && result.points.length) {
      this.sink.write(buildAuditRows({
        points: result.points,
        sma: result.sma,
        now: this.current,
        calendar: this.calendar
      }));
    }
    return result.sma;
  }
}
