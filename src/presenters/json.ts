/**
 * JSON-lines presenter: one object per update, for piping into other tools.
 */

import { snapshotView } from '../render.js';
import { formatStatus, type ScanUpdate, type ScanUpdateHandler } from '../status.js';

export function toJsonLine(update: ScanUpdate): string {
  if (update.type === 'status') {
    return JSON.stringify({
      type: 'status',
      status: update.status.kind,
      message: formatStatus(update.status),
    });
  }
  return JSON.stringify({ type: 'snapshot', devices: snapshotView(update.snapshot) });
}

export function createJsonPresenter(write: (line: string) => void = (line) => process.stdout.write(`${line}\n`)): ScanUpdateHandler {
  return (update) => write(toJsonLine(update));
}
