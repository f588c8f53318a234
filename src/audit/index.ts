import path from 'node:path';
import type { AuditConfig } from '../lib/config.js';
import { CsvAuditSink } from './csv_sink.js';
import { JsonlAuditSink } from './jsonl_sink.js';
import { SqliteAuditSink } from './sqlite_sink.js';
import type { AuditSink } from './types.js';

export * from './types.js';
export { buildAuditRows } from './rows.js';
export { CsvAuditSink, CSV_HEADER, formatCsvRow } from './csv_sink.js';
export { JsonlAuditSink } from './jsonl_sink.js';
export { SqliteAuditSink, createAuditDb } from './sqlite_sink.js';
export { MemoryAuditSink } from './memory_sink.js';

// Undefined when auditing is disabled.
export function createAuditSink(config: AuditConfig, cwd: string): AuditSink | undefined {
  if (!config.enabled) return undefined;
  const target = config.path === ':memory:' ? config.path : path.resolve(cwd, config.path);
  switch (config.kind) {
    case 'csv':
      return new CsvAuditSink(target);
    case 'jsonl':
      return new JsonlAuditSink(target);
    case 'sqlite':
      return new SqliteAuditSink(target);
  }
}
