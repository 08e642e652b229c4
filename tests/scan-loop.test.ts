import { describe, it, expect, vi } from 'vitest';
import type { AdvertisementObservation } from '../src/advertisement.js';
import { ScanUnavailableError } from '../src/errors.js';
import { ScanLoop, type BleScanner } from '../src/scan-loop.js';
import type { ScanUpdate } from '../src/status.js';
import { batteryServiceObservation, earbudsObservation } from './helpers.js';

type ScanResult = AdvertisementObservation[] | Error;

class FakeScanner implements BleScanner {
  readonly windows: number[] = [];

  constructor(private readonly results: ScanResult[] = []) {}

  async collect(windowMs: number): Promise<AdvertisementObservation[]> {
    this.windows.push(windowMs);
    const next = this.results.shift() ?? [];
    if (next instanceof Error) {
      throw next;
    }
    return next;
  }
}

function createLoop(results: ScanResult[], intervalMs = 15_000) {
  const scanner = new FakeScanner(results);
  const updates: ScanUpdate[] = [];
  const logger = { log: vi.fn(), error: vi.fn() };
  const loop = new ScanLoop({
    scanner,
    onUpdate: (update) => updates.push(update),
    intervalMs,
    logger,
  });
  return { scanner, updates, logger, loop };
}

function snapshots(updates: ScanUpdate[]) {
  return updates.flatMap((u) => (u.type === 'snapshot' ? [u.snapshot] : []));
}

describe('ScanLoop.runCycle', () => {
  it('publishes status, snapshot, status in order', async () => {
    const { scanner, updates, loop } = createLoop([[earbudsObservation('p1', 'Pods')]]);

    const result = await loop.runCycle();

    expect(scanner.windows).toEqual([5000]);
    expect(updates.map((u) => u.type)).toEqual(['status', 'snapshot', 'status']);
    expect(updates[0]).toEqual({ type: 'status', status: { kind: 'scanning' } });
    expect(updates[2]).toEqual({ type: 'status', status: { kind: 'complete', nextScanSeconds: 15 } });
    expect([...snapshots(updates)[0].keys()]).toEqual(['Pods']);
    expect(result.status).toEqual({ kind: 'complete', nextScanSeconds: 15 });
  });

  it('publishes an empty snapshot and no-devices when nothing qualifies', async () => {
    const { updates, loop } = createLoop([[]]);

    const result = await loop.runCycle();

    expect(result.snapshot.size).toBe(0);
    expect(snapshots(updates)[0].size).toBe(0);
    expect(updates[2]).toEqual({ type: 'status', status: { kind: 'no-devices' } });
  });

  it('keeps one entry per name within a cycle', async () => {
    const { loop } = createLoop([[earbudsObservation('p1', undefined), earbudsObservation('p2', undefined)]]);

    const { snapshot } = await loop.runCycle();

    expect(snapshot.size).toBe(1);
    expect(snapshot.has('AirPods')).toBe(true);
  });

  it('replaces the snapshot in full each cycle', async () => {
    const { updates, loop } = createLoop([
      [earbudsObservation('p1', 'Pods'), batteryServiceObservation('p2', 'Mouse')],
      [batteryServiceObservation('p2', 'Mouse')],
    ]);

    await loop.runCycle();
    await loop.runCycle();

    const [first, second] = snapshots(updates);
    expect([...first.keys()]).toEqual(['Pods', 'Mouse']);
    expect([...second.keys()]).toEqual(['Mouse']);
    expect(second).not.toBe(first);
  });

  it('reports an unavailable adapter and keeps going', async () => {
    const { updates, logger, loop } = createLoop([
      new ScanUnavailableError('Bluetooth adapter is unsupported', 'unsupported'),
      [batteryServiceObservation('p1', 'Mouse')],
    ]);

    const failed = await loop.runCycle();
    expect(failed.status).toEqual({ kind: 'unavailable', reason: 'unsupported', nextScanSeconds: 15 });
    expect(failed.snapshot.size).toBe(0);
    expect(updates.map((u) => u.type)).toEqual(['status', 'snapshot', 'status']);
    expect(logger.log).toHaveBeenCalledWith('[Scan] Bluetooth adapter is unsupported');

    const recovered = await loop.runCycle();
    expect(recovered.status.kind).toBe('complete');
  });

  it('treats unexpected scanner errors as an unavailable scan', async () => {
    const error = new Error('HCI socket closed');
    const { logger, loop } = createLoop([error]);

    const result = await loop.runCycle();

    expect(result.status).toEqual({ kind: 'unavailable', reason: 'HCI socket closed', nextScanSeconds: 15 });
    expect(logger.error).toHaveBeenCalledWith('[Scan] Scan failed:', error);
  });

  it('keeps publishing when the presenter throws', async () => {
    const scanner = new FakeScanner([[batteryServiceObservation('p1', 'Mouse')]]);
    const logger = { log: vi.fn(), error: vi.fn() };
    const onUpdate = vi.fn((update: ScanUpdate) => {
      if (update.type === 'snapshot') {
        throw new Error('render failed');
      }
    });
    const loop = new ScanLoop({ scanner, onUpdate, logger });

    const result = await loop.runCycle();

    expect(onUpdate).toHaveBeenCalledTimes(3);
    expect(result.status.kind).toBe('complete');
    expect(logger.error).toHaveBeenCalledTimes(1);
  });

  it('rounds the next scan delay to whole seconds', () => {
    expect(createLoop([], 2_400).loop.nextScanSeconds).toBe(2);
  });
});

describe('ScanLoop.run', () => {
  it('repeats cycles after the interval until aborted', async () => {
    const { scanner, updates, loop } = createLoop([], 10);
    const controller = new AbortController();

    const done = loop.run(controller.signal);
    await vi.waitFor(() => expect(scanner.windows.length).toBeGreaterThanOrEqual(2));
    controller.abort();
    await done;

    const cycles = scanner.windows.length;
    expect(updates).toHaveLength(cycles * 3);
  });

  it('finishes the current cycle when aborted during the listen window', async () => {
    const controller = new AbortController();
    const updates: ScanUpdate[] = [];
    const scanner: BleScanner = {
      collect: vi.fn(async () => {
        controller.abort();
        return [batteryServiceObservation('p1', 'Mouse')];
      }),
    };
    const loop = new ScanLoop({
      scanner,
      onUpdate: (update) => updates.push(update),
      logger: { log: vi.fn(), error: vi.fn() },
    });

    await loop.run(controller.signal);

    expect(scanner.collect).toHaveBeenCalledTimes(1);
    expect(updates.map((u) => u.type)).toEqual(['status', 'snapshot', 'status']);
  });

  it('does not scan when already aborted', async () => {
    const { scanner, loop } = createLoop([]);
    const controller = new AbortController();
    controller.abort();

    await loop.run(controller.signal);

    expect(scanner.windows).toEqual([]);
  });
});
