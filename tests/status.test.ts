import { describe, it, expect } from 'vitest';
import { formatStatus } from '../src/status.js';

describe('formatStatus', () => {
  it('formats each status', () => {
    expect(formatStatus({ kind: 'scanning' })).toBe('Scanning...');
    expect(formatStatus({ kind: 'complete', nextScanSeconds: 15 })).toBe('Scan complete. Next scan in 15s.');
    expect(formatStatus({ kind: 'no-devices' })).toBe('No devices found. Retrying...');
    expect(formatStatus({ kind: 'unavailable', reason: 'poweredOff', nextScanSeconds: 15 })).toBe(
      'Bluetooth unavailable (poweredOff). Retrying in 15s.'
    );
  });
});
