export { SmaEngine, type EngineOptions } from './engine/engine.js';
export { TradingCalendar, type SessionLabel, type TradingHours } from './engine/calendar.js';
export { PriceSeries, downsample } from './engine/price_series.js';
export { PriceLookup, EXACT_TOLERANCE_SEC } from './engine/price_lookup.js';
export { backwardTradingInstants, computeWindow, type WalkBounds, type WindowInput } from './engine/window.js';
export type { Sample, WindowPoint, WindowResult } from './engine/types.js';
export * from './audit/index.js';
export * from './lib/config.js';
export { generateFeed, mulberry32, type FeedOptions } from './replay/feed.js';
export { runReplay, type ReplayResult, type ReplayStep, type ReplaySummary } from './replay/run.js';
