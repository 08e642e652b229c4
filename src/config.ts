/**
 * Command-line options for the scan script.
 */

import { LISTEN_WINDOW_MS, SCAN_INTERVAL_MS } from './constants.js';
import { ConfigError } from './errors.js';

export type OutputFormat = 'text' | 'json';

export interface ScanConfig {
  listenWindowMs: number;
  intervalMs: number;
  format: OutputFormat;
  quiet: boolean;
  help: boolean;
}

export const USAGE = `Usage:
  npx tsx src/scan.ts                  # Scan 5s every 15s, print gauges
  npx tsx src/scan.ts --listen 10      # Listen 10s per scan
  npx tsx src/scan.ts --interval 30    # Wait 30s between scans
  npx tsx src/scan.ts --json           # One JSON object per update on stdout
  npx tsx src/scan.ts --quiet          # No [Scan] progress logs`;

// setTimeout delays above 2^31-1 ms overflow to 1 ms
export const MAX_TIMER_SECONDS = Math.floor(0x7fffffff / 1000);

function secondsArg(args: string[], flag: string, fallbackMs: number): number {
  const idx = args.indexOf(flag);
  if (idx < 0) {
    return fallbackMs;
  }
  const raw = args[idx + 1];
  const seconds = raw === undefined ? NaN : Number(raw);
  if (!Number.isFinite(seconds) || seconds <= 0) {
    throw new ConfigError(`${flag} expects a positive number of seconds, got ${raw ?? 'nothing'}`);
  }
  if (seconds > MAX_TIMER_SECONDS) {
    throw new ConfigError(`${flag} must be at most ${MAX_TIMER_SECONDS} seconds, got ${raw}`);
  }
  return seconds * 1000;
}

export function parseArgs(args: string[]): ScanConfig {
  return {
    listenWindowMs: secondsArg(args, '--listen', LISTEN_WINDOW_MS),
    intervalMs: secondsArg(args, '--interval', SCAN_INTERVAL_MS),
    format: args.includes('--json') ? 'json' : 'text',
    quiet: args.includes('--quiet'),
    help: args.includes('--help') || args.includes('-h'),
  };
}
