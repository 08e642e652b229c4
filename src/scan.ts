#!/usr/bin/env tsx
/**
 * Scan for AirPods and Battery Service devices and report battery levels.
 *
 * Usage:
 *   npx tsx src/scan.ts                # Scan 5s every 15s
 *   npx tsx src/scan.ts --listen 10    # Listen 10s per scan
 *   npx tsx src/scan.ts --json         # JSON lines on stdout
 *
 * Runs until Ctrl+C.
 */

import { parseArgs, USAGE } from './config.js';
import { NobleScanner } from './noble-scanner.js';
import { createJsonPresenter } from './presenters/json.js';
import { createTerminalPresenter } from './presenters/terminal.js';
import { ScanLoop, type ScanLogger } from './scan-loop.js';

async function main() {
  const config = parseArgs(process.argv.slice(2));

  if (config.help) {
    console.log(USAGE);
    return;
  }

  // stdout belongs to the JSON stream, so logs move to stderr
  const logger: ScanLogger = {
    log: config.quiet ? () => {} : config.format === 'json' ? console.error : console.log,
    error: console.error,
  };

  const onUpdate = config.format === 'json' ? createJsonPresenter() : createTerminalPresenter();

  const loop = new ScanLoop({
    scanner: new NobleScanner({ logger }),
    onUpdate,
    listenWindowMs: config.listenWindowMs,
    intervalMs: config.intervalMs,
    logger,
  });

  const controller = new AbortController();
  const stop = () => {
    logger.log('\n[Scan] Stopping after the current scan...');
    controller.abort();
  };
  process.once('SIGINT', stop);
  process.once('SIGTERM', stop);

  logger.log(`[Scan] Listening ${config.listenWindowMs / 1000}s every ${config.intervalMs / 1000}s (Ctrl+C to stop)`);
  await loop.run(controller.signal);
}

main()
  .then(() => process.exit(0))
  .catch((err) => {
    console.error('Error:', err instanceof Error ? err.message : err);
    process.exit(1);
  });
