import type { AdvertisementObservation } from '../src/advertisement.js';
import { APPLE_MANUFACTURER_ID, BATTERY_SERVICE_UUID } from '../src/constants.js';

/**
 * 27-byte AirPods payload with the given level nibbles (0-15).
 * Hex index 12/13 are byte 6's high/low nibbles, index 15 is byte 7's low nibble.
 */
export function airpodsPayload(left: number, right: number, caseNibble: number, length = 27): Buffer {
  const data = Buffer.alloc(length);
  data[0] = 0x07;
  data[1] = 0x19;
  data[6] = (left << 4) | right;
  data[7] = caseNibble;
  return data;
}

export function earbudsObservation(
  id: string,
  name: string | undefined,
  data: Buffer = airpodsPayload(10, 5, 0)
): AdvertisementObservation {
  return {
    id,
    address: `addr-${id}`,
    name,
    manufacturerData: new Map([[APPLE_MANUFACTURER_ID, data]]),
    serviceUuids: new Set(),
  };
}

export function batteryServiceObservation(id: string, name: string | undefined): AdvertisementObservation {
  return {
    id,
    address: `addr-${id}`,
    name,
    manufacturerData: new Map(),
    serviceUuids: new Set([BATTERY_SERVICE_UUID]),
  };
}
