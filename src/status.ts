/**
 * Scan status updates published to the presentation layer.
 */

import type { DeviceSnapshot } from './classify.js';

export type ScanStatus =
  | { kind: 'scanning' }
  | { kind: 'complete'; nextScanSeconds: number }
  | { kind: 'no-devices' }
  | { kind: 'unavailable'; reason: string; nextScanSeconds: number };

export type ScanUpdate =
  | { type: 'status'; status: ScanStatus }
  | { type: 'snapshot'; snapshot: DeviceSnapshot };

export type ScanUpdateHandler = (update: ScanUpdate) => void;

export function formatStatus(status: ScanStatus): string {
  switch (status.kind) {
    case 'scanning':
      return 'Scanning...';
    case 'complete':
      return `Scan complete. Next scan in ${status.nextScanSeconds}s.`;
    case 'no-devices':
      return 'No devices found. Retrying...';
    case 'unavailable':
      return `Bluetooth unavailable (${status.reason}). Retrying in ${status.nextScanSeconds}s.`;
  }
}
