/**
 * BleScanner backed by @abandonware/noble.
 */

import noble, { type Peripheral } from '@abandonware/noble';
import { toObservation, type AdvertisementObservation } from './advertisement.js';
import { POWER_ON_TIMEOUT_MS, SCAN_START_TIMEOUT_MS } from './constants.js';
import { ScanUnavailableError } from './errors.js';
import type { BleScanner, ScanLogger } from './scan-loop.js';

// States from which the adapter will not come up on its own
const TERMINAL_STATES = new Set(['unsupported', 'unauthorized']);

function adapterState(): string {
  return (noble as unknown as { state: string }).state;
}

export interface NobleScannerOptions {
  powerOnTimeoutMs?: number;
  /** Bound on waiting for noble's `scanStart`, which a failed HCI command never emits */
  startTimeoutMs?: number;
  logger?: ScanLogger;
}

export class NobleScanner implements BleScanner {
  private readonly powerOnTimeoutMs: number;
  private readonly startTimeoutMs: number;
  private readonly logger: ScanLogger;

  constructor(options: NobleScannerOptions = {}) {
    this.powerOnTimeoutMs = options.powerOnTimeoutMs ?? POWER_ON_TIMEOUT_MS;
    this.startTimeoutMs = options.startTimeoutMs ?? SCAN_START_TIMEOUT_MS;
    this.logger = options.logger ?? console;
  }

  async collect(windowMs: number): Promise<AdvertisementObservation[]> {
    await this.waitForPoweredOn();

    // Latest advertisement per peripheral; duplicates are allowed so levels stay fresh
    const latest = new Map<string, AdvertisementObservation>();
    const onDiscover = (peripheral: Peripheral) => {
      latest.set(peripheral.id, toObservation(peripheral));
    };

    noble.on('discover', onDiscover);
    try {
      await this.startScanning();
      await new Promise<void>((resolve) => setTimeout(resolve, windowMs));
    } finally {
      noble.removeListener('discover', onDiscover);
      // Not the async variant: its promise waits for `scanStop`, which may never come
      noble.stopScanning();
    }

    return [...latest.values()];
  }

  private startScanning(): Promise<void> {
    return new Promise((resolve, reject) => {
      const timeoutId = setTimeout(() => {
        reject(new ScanUnavailableError(`Scan did not start within ${this.startTimeoutMs}ms`, adapterState()));
      }, this.startTimeoutMs);

      noble.startScanningAsync([], true).then(
        () => {
          clearTimeout(timeoutId);
          resolve();
        },
        (err: unknown) => {
          clearTimeout(timeoutId);
          const message = err instanceof Error ? err.message : String(err);
          reject(new ScanUnavailableError(`Could not start scan: ${message}`, adapterState()));
        }
      );
    });
  }

  private waitForPoweredOn(): Promise<void> {
    const state = adapterState();
    if (state === 'poweredOn') {
      return Promise.resolve();
    }
    if (TERMINAL_STATES.has(state)) {
      return Promise.reject(new ScanUnavailableError(`Bluetooth adapter is ${state}`, state));
    }

    this.logger.log(`[Noble] Waiting for Bluetooth (state: ${state})...`);

    return new Promise((resolve, reject) => {
      const onStateChange = (next: string) => {
        if (next === 'poweredOn') {
          clearTimeout(timeoutId);
          noble.removeListener('stateChange', onStateChange);
          resolve();
        }
      };
      const timeoutId = setTimeout(() => {
        noble.removeListener('stateChange', onStateChange);
        const last = adapterState();
        reject(new ScanUnavailableError(`Bluetooth adapter not powered on within ${this.powerOnTimeoutMs}ms`, last));
      }, this.powerOnTimeoutMs);

      noble.on('stateChange', onStateChange);
    });
  }
}
