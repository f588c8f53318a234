import { CalendarSchema, clockSeconds, type CalendarInput } from '../lib/config.js';

export type SessionLabel = 'morning' | 'afternoon';

// Session boundaries in seconds since local midnight.
export type TradingHours = {
  morningOpen: number;
  morningClose: number;
  afternoonOpen: number;
  afternoonClose: number;
  sessionSplit: number;
};

const DAY = 86400;
const LOCAL_RE = /^(\d{4})-(\d{2})-(\d{2}) (\d{2}):(\d{2}):(\d{2})$/;

function mod(n: number, m: number) {
  return ((n % m) + m) % m;
}

/**
 * Two-session weekday exchange calendar on a fixed-offset wall clock.
 * Every method is a pure function of its arguments; timestamps are epoch seconds.
 */
export class TradingCalendar {
  readonly hours: Readonly<TradingHours>;
  private readonly offsetSec: number;

  constructor(input: CalendarInput = {}) {
    const c = CalendarSchema.parse(input);
    this.offsetSec = c.utcOffsetMinutes * 60;
    this.hours = Object.freeze({
      morningOpen: clockSeconds(c.morningOpen),
      morningClose: clockSeconds(c.morningClose),
      afternoonOpen: clockSeconds(c.afternoonOpen),
      afternoonClose: clockSeconds(c.afternoonClose),
      sessionSplit: clockSeconds(c.sessionSplit)
    });
  }

  isTradingInstant(t: number): boolean {
    if (this.isWeekendDay(this.dayIndex(t))) return false;
    const tod = this.timeOfDay(t);
    const h = this.hours;
    return (tod >= h.morningOpen && tod <= h.morningClose) || (tod >= h.afternoonOpen && tod <= h.afternoonClose);
  }

  /**
   * Session close to jump back to from a non-trading instant.
   * Returns `t` itself when `t` sits inside a session; callers only jump when the result is < t.
   */
  previousSessionClose(t: number): number {
    const day = this.dayIndex(t);
    if (this.isWeekendDay(day)) return this.previousTradingDayClose(day);

    const tod = this.timeOfDay(t);
    const h = this.hours;
    if (tod > h.morningClose && tod < h.afternoonOpen) return this.dayStart(day) + h.morningClose;
    // Before the open and after the close both land on the previous trading day's close.
    if (tod < h.morningOpen || tod > h.afternoonClose) return this.previousTradingDayClose(day);
    return t;
  }

  // First instant at or after `t` that is inside a session.
  nextSessionOpen(t: number): number {
    if (this.isTradingInstant(t)) return t;
    const day = this.dayIndex(t);
    const h = this.hours;
    if (!this.isWeekendDay(day)) {
      const tod = this.timeOfDay(t);
      if (tod < h.morningOpen) return this.dayStart(day) + h.morningOpen;
      if (tod < h.afternoonOpen) return this.dayStart(day) + h.afternoonOpen;
    }
    let next = day + 1;
    while (this.isWeekendDay(next)) next += 1;
    return this.dayStart(next) + h.morningOpen;
  }

  // That day's morning close.
  morningCloseOf(t: number): number {
    return this.dayStart(this.dayIndex(t)) + this.hours.morningClose;
  }

  sessionOf(t: number): SessionLabel {
    return this.timeOfDay(t) < this.hours.sessionSplit ? 'morning' : 'afternoon';
  }

  isWeekend(t: number): boolean {
    return this.isWeekendDay(this.dayIndex(t));
  }

  localDate(t: number): string {
    return this.formatLocal(t).slice(0, 10);
  }

  formatLocal(t: number): string {
    const iso = new Date(Math.floor(t + this.offsetSec) * 1000).toISOString();
    return `${iso.slice(0, 10)} ${iso.slice(11, 19)}`;
  }

  parseLocal(value: string): number {
    const m = LOCAL_RE.exec(value);
    if (!m) throw new Error(`invalid local datetime: ${value}`);
    const [, y, mo, d, hh, mi, ss] = m.map(Number);
    return Date.UTC(y, mo - 1, d, hh, mi, ss) / 1000 - this.offsetSec;
  }

  private previousTradingDayClose(day: number): number {
    let prev = day - 1;
    while (this.isWeekendDay(prev)) prev -= 1;
    return this.dayStart(prev) + this.hours.afternoonClose;
  }

  private dayIndex(t: number) {
    return Math.floor((t + this.offsetSec) / DAY);
  }

  private dayStart(day: number) {
    return day * DAY - this.offsetSec;
  }

  private timeOfDay(t: number) {
    return t + this.offsetSec - this.dayIndex(t) * DAY;
  }

  // 1970-01-01 was a Thursday; 0 = Sunday, 6 = Saturday.
  private isWeekendDay(day: number) {
    const wd = mod(day + 4, 7);
    return wd === 0 || wd === 6;
  }
}
