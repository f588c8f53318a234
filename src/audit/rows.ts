import type { TradingCalendar } from '../engine/calendar.js';
import type { WindowPoint } from '../engine/types.js';
import type { AuditRow, BoundaryTag } from './types.js';

function boundaryOf(crossDay: boolean, crossSession: boolean): BoundaryTag {
  if (crossDay && crossSession) return 'cross-day-and-session';
  if (crossDay) return 'cross-day';
  if (crossSession) return 'cross-session';
  return 'same-day-same-session';
}

export function buildAuditRows(params: {
  points: readonly WindowPoint[];
  sma: number;
  now: number;
  calendar: TradingCalendar;
}): AuditRow[] {
  const { points, sma, now, calendar } = params;
  const nowDate = calendar.localDate(now);

  const dates = new Set(points.map((p) => calendar.localDate(p.timestamp)));
  const labels = new Set(points.map((p) => calendar.sessionOf(p.timestamp)));
  const spansDays = dates.size > 1;
  const spansSessions = labels.size > 1;

  return points.map((p, i) => {
    const date = calendar.localDate(p.timestamp);
    return {
      index: i + 1,
      timestamp: p.timestamp,
      datetime: calendar.formatLocal(p.timestamp),
      gapSec: now - p.timestamp,
      session: calendar.sessionOf(p.timestamp),
      trading: calendar.isTradingInstant(p.timestamp),
      price: p.price,
      sma: p.price > 0 ? sma : 0,
      kind: p.original ? 'original' : 'filled',
      boundary: boundaryOf(spansDays && date !== nowDate, spansSessions)
    };
  });
}
