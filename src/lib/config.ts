import fs from 'node:fs';
import path from 'node:path';
import { z } from 'zod';

const ClockTime = z.string().regex(/^\d{2}:\d{2}:\d{2}$/, 'expected HH:MM:SS');
const LocalDateTime = z.string().regex(/^\d{4}-\d{2}-\d{2} \d{2}:\d{2}:\d{2}$/, 'expected YYYY-MM-DD HH:MM:SS');

// Seconds since local midnight for an 'HH:MM:SS' string.
export function clockSeconds(value: string): number {
  const [h, m, s] = value.split(':').map(Number);
  return h * 3600 + m * 60 + s;
}

export const CalendarSchema = z.object({
  // Exchange wall clock as a fixed offset from UTC (+08:00 by default, no DST).
  utcOffsetMinutes: z.number().int().min(-720).max(840).default(480),
  morningOpen: ClockTime.default('09:30:00'),
  morningClose: ClockTime.default('11:30:00'),
  afternoonOpen: ClockTime.default('13:00:00'),
  afternoonClose: ClockTime.default('15:00:00'),
  // Instants before this time of day are labelled morning, the rest afternoon.
  sessionSplit: ClockTime.default('12:00:00')
}).superRefine((c, ctx) => {
  const order = [c.morningOpen, c.morningClose, c.afternoonOpen, c.afternoonClose].map(clockSeconds);
  for (let i = 1; i < order.length; i++) {
    if (order[i] <= order[i - 1]) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'session boundaries must be strictly increasing' });
      return;
    }
  }
  if (clockSeconds(c.sessionSplit) > 86399) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['sessionSplit'], message: 'out of range' });
  }
});

export const EngineSchema = z.object({
  capacity: z.number().int().min(1),
  window: z.number().positive(),
  // Price assumed when nothing has been stored yet.
  defaultPrice: z.number().positive().default(100)
});

export const AuditSchema = z.object({
  enabled: z.boolean().default(false),
  kind: z.enum(['csv', 'jsonl', 'sqlite']).default('csv'),
  path: z.string().default('./data/audit.csv')
});

export const ReplaySchema = z.object({
  start: LocalDateTime.default('2025-04-04 09:30:00'),
  points: z.number().int().positive().default(20),
  seed: z.number().int().default(42),
  minStepSec: z.number().int().positive().default(30),
  maxStepSec: z.number().int().positive().default(600),
  startPrice: z.number().positive().default(100),
  floorPrice: z.number().positive().default(90)
}).refine((r) => r.minStepSec <= r.maxStepSec, { message: 'minStepSec must not exceed maxStepSec' });

export const ConfigSchema = z.object({
  engine: EngineSchema,
  calendar: CalendarSchema.default({}),
  audit: AuditSchema.default({}),
  replay: ReplaySchema.default({})
});

export type CalendarConfig = z.infer<typeof CalendarSchema>;
export type CalendarInput = z.input<typeof CalendarSchema>;
export type EngineConfig = z.infer<typeof EngineSchema>;
export type EngineInput = z.input<typeof EngineSchema>;
export type AuditConfig = z.infer<typeof AuditSchema>;
export type ReplayConfig = z.infer<typeof ReplaySchema>;
export type AppConfig = z.infer<typeof ConfigSchema>;

export function parseConfig(raw: unknown): AppConfig {
  return ConfigSchema.parse(raw);
}

export function loadConfig(cwd: string): AppConfig {
  const configPath = process.env.SMA_CONFIG
    ? path.resolve(cwd, process.env.SMA_CONFIG)
    : path.join(cwd, 'config.json');
  const raw = fs.readFileSync(configPath, 'utf-8');
  const parsed: unknown = JSON.parse(raw);
  return parseConfig(parsed);
}
