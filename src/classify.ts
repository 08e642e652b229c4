/**
 * Device classification and per-window snapshot aggregation.
 */

import type { AdvertisementObservation } from './advertisement.js';
import {
  AIRPODS_DATA_LENGTH,
  APPLE_MANUFACTURER_ID,
  BATTERY_SERVICE_UUID,
  DEFAULT_EARBUDS_NAME,
  DEFAULT_STANDARD_NAME,
} from './constants.js';

export interface EarbudsDevice {
  kind: 'earbuds';
  name: string;
  /** Apple proximity-pairing payload */
  data: Buffer;
}

export interface StandardBatteryDevice {
  kind: 'standard';
  name: string;
  address: string;
}

export type ClassifiedDevice = EarbudsDevice | StandardBatteryDevice;

/** Devices from one scan window, keyed by resolved name. */
export type DeviceSnapshot = ReadonlyMap<string, ClassifiedDevice>;

/**
 * Classify one observation, or return null if it is neither an AirPods
 * advertisement nor a Battery Service device.
 */
export function classifyObservation(observation: AdvertisementObservation): ClassifiedDevice | null {
  const appleData = observation.manufacturerData.get(APPLE_MANUFACTURER_ID);
  if (appleData && appleData.length === AIRPODS_DATA_LENGTH) {
    return {
      kind: 'earbuds',
      name: observation.name || DEFAULT_EARBUDS_NAME,
      data: appleData,
    };
  }

  if (observation.serviceUuids.has(BATTERY_SERVICE_UUID)) {
    return {
      kind: 'standard',
      name: observation.name || DEFAULT_STANDARD_NAME,
      address: observation.address,
    };
  }

  return null;
}

/**
 * Build a fresh snapshot from a window's observations.
 *
 * The first device classified under a name wins; later observations that
 * resolve to the same name are dropped. Two unnamed AirPods therefore
 * collapse into one "AirPods" entry.
 */
export function buildSnapshot(observations: Iterable<AdvertisementObservation>): DeviceSnapshot {
  const snapshot = new Map<string, ClassifiedDevice>();

  for (const observation of observations) {
    const device = classifyObservation(observation);
    if (device && !snapshot.has(device.name)) {
      snapshot.set(device.name, device);
    }
  }

  return snapshot;
}
