/**
 * Periodic scan loop: listen, classify, publish, idle, repeat.
 *
 * Every cycle publishes, in order, a `scanning` status, a freshly built
 * snapshot, and a closing status. Scan failures never end the loop; they are
 * reported as an `unavailable` status and retried after the same interval.
 */

import type { AdvertisementObservation } from './advertisement.js';
import { buildSnapshot, type DeviceSnapshot } from './classify.js';
import { LISTEN_WINDOW_MS, SCAN_INTERVAL_MS } from './constants.js';
import { ScanUnavailableError } from './errors.js';
import type { ScanStatus, ScanUpdate, ScanUpdateHandler } from './status.js';

/**
 * Source of advertisements for one listen window.
 */
export interface BleScanner {
  /**
   * Scan for `windowMs` and return the latest advertisement of every
   * peripheral seen.
   *
   * @throws {ScanUnavailableError} If the adapter cannot scan
   */
  collect(windowMs: number): Promise<AdvertisementObservation[]>;
}

export type ScanLogger = Pick<Console, 'log' | 'error'>;

export interface ScanLoopOptions {
  scanner: BleScanner;
  onUpdate: ScanUpdateHandler;
  listenWindowMs?: number;
  intervalMs?: number;
  logger?: ScanLogger;
}

export interface ScanCycleResult {
  snapshot: DeviceSnapshot;
  status: ScanStatus;
}

function errMsg(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Wait `ms`, returning early if `signal` aborts.
 */
function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal?.aborted) {
      resolve();
      return;
    }
    const onAbort = () => {
      clearTimeout(timeoutId);
      resolve();
    };
    const timeoutId = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

export class ScanLoop {
  private readonly scanner: BleScanner;
  private readonly onUpdate: ScanUpdateHandler;
  private readonly listenWindowMs: number;
  private readonly intervalMs: number;
  private readonly logger: ScanLogger;

  constructor(options: ScanLoopOptions) {
    this.scanner = options.scanner;
    this.onUpdate = options.onUpdate;
    this.listenWindowMs = options.listenWindowMs ?? LISTEN_WINDOW_MS;
    this.intervalMs = options.intervalMs ?? SCAN_INTERVAL_MS;
    this.logger = options.logger ?? console;
  }

  get nextScanSeconds(): number {
    return Math.round(this.intervalMs / 1000);
  }

  /**
   * Run one scan cycle and publish its updates. Never rejects on scan failure.
   */
  async runCycle(): Promise<ScanCycleResult> {
    this.publish({ type: 'status', status: { kind: 'scanning' } });

    let snapshot: DeviceSnapshot = new Map();
    let failure: string | null = null;

    try {
      const observations = await this.scanner.collect(this.listenWindowMs);
      snapshot = buildSnapshot(observations);
      this.logger.log(`[Scan] ${observations.length} advertisement(s), ${snapshot.size} device(s)`);
    } catch (err) {
      if (err instanceof ScanUnavailableError) {
        this.logger.log(`[Scan] ${err.message}`);
        failure = err.adapterState;
      } else {
        this.logger.error('[Scan] Scan failed:', err);
        failure = errMsg(err);
      }
    }

    this.publish({ type: 'snapshot', snapshot });

    let status: ScanStatus;
    if (failure !== null) {
      status = { kind: 'unavailable', reason: failure, nextScanSeconds: this.nextScanSeconds };
    } else if (snapshot.size === 0) {
      status = { kind: 'no-devices' };
    } else {
      status = { kind: 'complete', nextScanSeconds: this.nextScanSeconds };
    }
    this.publish({ type: 'status', status });

    return { snapshot, status };
  }

  /**
   * Scan until `signal` aborts. The listen window itself is not interrupted;
   * an abort during it ends the loop once the cycle has been published.
   */
  async run(signal?: AbortSignal): Promise<void> {
    while (!signal?.aborted) {
      await this.runCycle();
      if (signal?.aborted) {
        break;
      }
      await sleep(this.intervalMs, signal);
    }
    this.logger.log('[Scan] Stopped.');
  }

  private publish(update: ScanUpdate): void {
    try {
      this.onUpdate(update);
    } catch (err) {
      this.logger.error(`[Scan] Presenter failed on ${update.type} update:`, err);
    }
  }
}
