/**
 * Display model shared by the presenters.
 */

import { batteryReadings, decodeAirPodsBattery, type BatteryComponent, type BatteryReading } from './airpods.js';
import type { ClassifiedDevice, DeviceSnapshot } from './classify.js';

export type LevelBand = 'high' | 'medium' | 'low' | 'unknown';

export interface GaugeView {
  component: BatteryComponent;
  level: number | null;
  band: LevelBand;
  /** "80%" or "N/A" */
  label: string;
}

export type DeviceView =
  | { kind: 'earbuds'; name: string; gauges: GaugeView[]; error?: string }
  | { kind: 'standard'; name: string; address: string };

const UNKNOWN_READINGS: BatteryReading[] = [
  { component: 'Left', level: null },
  { component: 'Right', level: null },
  { component: 'Case', level: null },
];

export function levelBand(level: number | null): LevelBand {
  if (level === null) return 'unknown';
  if (level > 50) return 'high';
  if (level > 20) return 'medium';
  return 'low';
}

export function formatLevel(level: number | null): string {
  return level === null ? 'N/A' : `${level}%`;
}

function gauge(reading: BatteryReading): GaugeView {
  return {
    component: reading.component,
    level: reading.level,
    band: levelBand(reading.level),
    label: formatLevel(reading.level),
  };
}

/**
 * Build the view of one device. A payload that fails to decode shows all
 * gauges as unknown with the error attached.
 */
export function deviceView(device: ClassifiedDevice): DeviceView {
  switch (device.kind) {
    case 'earbuds': {
      try {
        const readings = batteryReadings(decodeAirPodsBattery(device.data));
        return { kind: 'earbuds', name: device.name, gauges: readings.map(gauge) };
      } catch (err) {
        const error = err instanceof Error ? err.message : String(err);
        return { kind: 'earbuds', name: device.name, gauges: UNKNOWN_READINGS.map(gauge), error };
      }
    }
    case 'standard':
      return { kind: 'standard', name: device.name, address: device.address };
  }
}

export function snapshotView(snapshot: DeviceSnapshot): DeviceView[] {
  return [...snapshot.values()].map(deviceView);
}
