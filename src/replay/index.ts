import 'dotenv/config';
import { loadConfig } from '../lib/config.js';
import { runReplay } from './run.js';

function main() {
  const config = loadConfig(process.cwd());
  // eslint-disable-next-line no-console
  const { summary, outPath } = runReplay(config, { cwd: process.cwd(), print: (line) => console.log(line) });
  // eslint-disable-next-line no-console
  console.log(`[replay] ${summary.points} points, last sma ${summary.lastSma?.toFixed(2) ?? 'n/a'}`);
  // eslint-disable-next-line no-console
  console.log(JSON.stringify({ outPath, summary }, null, 2));
}

try {
  main();
} catch (e) {
  // eslint-disable-next-line no-console
  console.error(`[replay] ${e instanceof Error ? e.message : String(e)}`);
  process.exitCode = 1;
}
