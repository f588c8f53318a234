import fs from 'node:fs';
import path from 'node:path';
import type { AuditRow, AuditSink } from './types.js';

export class JsonlAuditSink implements AuditSink {
  readonly filePath: string;

  constructor(filePath: string) {
    this.filePath = filePath;
    const dir = path.dirname(filePath);
    if (!fs.existsSync(dir)) fs.mkdirSync(dir, { recursive: true });
  }

  write(rows: AuditRow[]) {
    if (!rows.length) return;
    fs.appendFileSync(this.filePath, rows.map((r) => JSON.stringify(r)).join('\n') + '\n');
  }

  close() {}
}
