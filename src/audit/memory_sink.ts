import type { AuditRow, AuditSink } from './types.js';

export class MemoryAuditSink implements AuditSink {
  private batches: AuditRow[][] = [];
  private closed = false;

  write(rows: AuditRow[]) {
    if (this.closed) throw new Error('audit sink is closed');
    this.batches.push(rows);
  }

  get writes() {
    return this.batches.length;
  }

  lastBatch(): AuditRow[] {
    return this.batches.length ? this.batches[this.batches.length - 1] : [];
  }

  recent(limit = 200): AuditRow[] {
    return this.batches.flat().slice(-limit);
  }

  close() {
    this.closed = true;
  }
}
