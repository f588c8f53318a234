import type { SessionLabel } from '../engine/calendar.js';

export type PointKind = 'original' | 'filled';

export type BoundaryTag = 'same-day-same-session' | 'cross-session' | 'cross-day' | 'cross-day-and-session';

// One visited trading instant of a single get() call.
export type AuditRow = {
  index: number; // 1-based, walk order
  timestamp: number;
  datetime: string; // local YYYY-MM-DD HH:MM:SS
  gapSec: number; // now - timestamp
  session: SessionLabel;
  trading: boolean;
  price: number;
  sma: number; // the window SMA, or 0 for rows priced before the data horizon
  kind: PointKind;
  boundary: BoundaryTag;
};

export interface AuditSink {
  write(rows: AuditRow[]): void;
  close(): void;
}
