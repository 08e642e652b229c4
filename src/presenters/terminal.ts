/**
 * Terminal presenter: status lines and per-device battery gauges.
 */

import type { DeviceSnapshot } from '../classify.js';
import { snapshotView, type DeviceView, type GaugeView, type LevelBand } from '../render.js';
import { formatStatus, type ScanUpdate, type ScanUpdateHandler } from '../status.js';

const GAUGE_WIDTH = 10;

const BAND_COLORS: Record<LevelBand, number> = {
  high: 32, // green
  medium: 33, // yellow
  low: 31, // red
  unknown: 90, // grey
};

export interface TerminalPresenterOptions {
  write?: (line: string) => void;
  /** ANSI colors; defaults to whether stdout is a TTY */
  color?: boolean;
}

export function gaugeBar(level: number | null): string {
  const filled = level === null ? 0 : Math.round(level / (100 / GAUGE_WIDTH));
  return '#'.repeat(filled) + '-'.repeat(GAUGE_WIDTH - filled);
}

function paint(text: string, band: LevelBand, color: boolean): string {
  return color ? `\x1b[${BAND_COLORS[band]}m${text}\x1b[0m` : text;
}

function gaugeLine(gauge: GaugeView, color: boolean): string {
  const bar = paint(`[${gaugeBar(gauge.level)}]`, gauge.band, color);
  return `  ${gauge.component.padEnd(5)} ${bar} ${gauge.label}`;
}

export function renderDevice(view: DeviceView, color = false): string[] {
  switch (view.kind) {
    case 'earbuds': {
      const lines = [view.name, ...view.gauges.map((g) => gaugeLine(g, color))];
      if (view.error) {
        lines.push(`  (${view.error})`);
      }
      return lines;
    }
    case 'standard':
      return [view.name, `  Standard battery device detected (${view.address}).`];
  }
}

export function renderSnapshot(snapshot: DeviceSnapshot, color = false): string[] {
  return snapshotView(snapshot).flatMap((view) => ['', ...renderDevice(view, color)]);
}

export function createTerminalPresenter(options: TerminalPresenterOptions = {}): ScanUpdateHandler {
  const write = options.write ?? ((line: string) => console.log(line));
  const color = options.color ?? process.stdout.isTTY === true;

  return (update: ScanUpdate) => {
    if (update.type === 'status') {
      write(formatStatus(update.status));
      return;
    }
    for (const line of renderSnapshot(update.snapshot, color)) {
      write(line);
    }
  };
}
