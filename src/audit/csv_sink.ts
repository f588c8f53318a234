import fs from 'node:fs';
import path from 'node:path';
import type { AuditRow, AuditSink } from './types.js';

export const CSV_HEADER = 'index,timestamp,datetime,gap_sec,session,trading,price,sma,point_kind,boundary';

export function formatCsvRow(r: AuditRow): string {
  return [
    r.index,
    r.timestamp,
    r.datetime,
    r.gapSec.toFixed(1),
    r.session,
    r.trading ? 'yes' : 'no',
    r.price.toFixed(2),
    r.sma.toFixed(2),
    r.kind,
    r.boundary
  ].join(',');
}

// Appends rows to a CSV file; the header is written once, when the file is created.
export class CsvAuditSink implements AuditSink {
  readonly filePath: string;

  constructor(filePath: string) {
    this.filePath = filePath;
    const dir = path.dirname(filePath);
    if (!fs.existsSync(dir)) fs.mkdirSync(dir, { recursive: true });
    if (!fs.existsSync(filePath)) fs.writeFileSync(filePath, CSV_HEADER + '\n');
  }

  write(rows: AuditRow[]) {
    if (!rows.length) return;
    fs.appendFileSync(this.filePath, rows.map(formatCsvRow).join('\n') + '\n');
  }

  close() {
    // appendFileSync leaves no handle open
  }
}
