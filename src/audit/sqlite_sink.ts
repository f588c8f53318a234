import Database from 'better-sqlite3';
import fs from 'node:fs';
import path from 'node:path';
import type { AuditRow, AuditSink, BoundaryTag, PointKind } from './types.js';
import type { SessionLabel } from '../engine/calendar.js';

export type Db = Database.Database;

type RowRecord = {
  batch: number;
  idx: number;
  ts: number;
  datetime: string;
  gapSec: number;
  session: string;
  trading: number;
  price: number;
  sma: number;
  pointKind: string;
  boundary: string;
};

export function createAuditDb(sqlitePath: string): Db {
  if (sqlitePath !== ':memory:') {
    const dir = path.dirname(sqlitePath);
    if (!fs.existsSync(dir)) fs.mkdirSync(dir, { recursive: true });
  }

  const db = new Database(sqlitePath);
  db.pragma('journal_mode = WAL');

  db.exec(`
    create table if not exists audit_rows (
      id integer primary key autoincrement,
      batch integer not null, -- one per get() call
      idx integer not null,
      ts real not null,
      datetime text not null,
      gapSec real not null,
      session text not null, -- morning|afternoon
      trading integer not null,
      price real not null,
      sma real not null,
      pointKind text not null, -- original|filled
      boundary text not null
    );
  `);

  return db;
}

function toSession(v: string): SessionLabel {
  return v === 'morning' ? 'morning' : 'afternoon';
}

function toKind(v: string): PointKind {
  return v === 'original' ? 'original' : 'filled';
}

function toBoundary(v: string): BoundaryTag {
  switch (v) {
    case 'cross-session':
    case 'cross-day':
    case 'cross-day-and-session':
      return v;
    default:
      return 'same-day-same-session';
  }
}

export class SqliteAuditSink implements AuditSink {
  private db: Db;
  private batch: number;
  private insert: Database.Statement<[RowRecord]>;

  constructor(sqlitePath: string) {
    this.db = createAuditDb(sqlitePath);
    const row = this.db.prepare<[], { b: number }>('select coalesce(max(batch), 0) as b from audit_rows').get();
    this.batch = row?.b ?? 0;
    this.insert = this.db.prepare<[RowRecord]>(`
      insert into audit_rows (batch, idx, ts, datetime, gapSec, session, trading, price, sma, pointKind, boundary)
      values (@batch, @idx, @ts, @datetime, @gapSec, @session, @trading, @price, @sma, @pointKind, @boundary)
    `);
  }

  write(rows: AuditRow[]) {
    if (!rows.length) return;
    const batch = ++this.batch;
    const tx = this.db.transaction((items: AuditRow[]) => {
      for (const r of items) {
        const rec: RowRecord = {
          batch,
          idx: r.index,
          ts: r.timestamp,
          datetime: r.datetime,
          gapSec: r.gapSec,
          session: r.session,
          trading: r.trading ? 1 : 0,
          price: r.price,
          sma: r.sma,
          pointKind: r.kind,
          boundary: r.boundary
        };
        this.insert.run(rec);
      }
    });
    tx(rows);
  }

  // Rows of the most recent batches, oldest first.
  recent(limit = 200): AuditRow[] {
    const recs = this.db
      .prepare<[number], RowRecord>('select * from (select * from audit_rows order by id desc limit ?) order by id asc')
      .all(limit);
    return recs.map((r) => ({
      index: r.idx,
      timestamp: r.ts,
      datetime: r.datetime,
      gapSec: r.gapSec,
      session: toSession(r.session),
      trading: r.trading === 1,
      price: r.price,
      sma: r.sma,
      kind: toKind(r.pointKind),
      boundary: toBoundary(r.boundary)
    }));
  }

  get batches() {
    return this.batch;
  }

  close() {
    if (this.db.open) this.db.close();
  }
}
