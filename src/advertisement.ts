/**
 * Advertisement observations collected during a scan window.
 */

import { BASE_UUID_SUFFIX } from './constants.js';

export interface AdvertisementObservation {
  id: string;
  address: string;
  name?: string;
  /** Payload per company identifier, identifier bytes stripped */
  manufacturerData: Map<number, Buffer>;
  /** Lowercase dashed 128-bit UUIDs */
  serviceUuids: Set<string>;
}

/**
 * The parts of a noble peripheral an observation is built from.
 */
export interface AdvertisingPeripheral {
  id: string;
  address?: string;
  advertisement: {
    localName?: string;
    manufacturerData?: Buffer;
    serviceUuids?: string[];
  };
}

/**
 * Normalize a service UUID to lowercase dashed 128-bit form.
 *
 * noble reports SIG-assigned UUIDs in short form ("180f") and custom ones
 * as 32 hex digits without dashes.
 */
export function normalizeUuid(uuid: string): string {
  const hex = uuid.toLowerCase().replace(/-/g, '');

  if (hex.length === 4) {
    return `0000${hex}${BASE_UUID_SUFFIX}`;
  }
  if (hex.length === 8) {
    return `${hex}${BASE_UUID_SUFFIX}`;
  }
  if (hex.length === 32) {
    return [
      hex.slice(0, 8),
      hex.slice(8, 12),
      hex.slice(12, 16),
      hex.slice(16, 20),
      hex.slice(20),
    ].join('-');
  }
  return hex;
}

/**
 * Split a raw manufacturer-specific AD structure into company ID and payload.
 *
 * The first two bytes are the company identifier (little-endian). Structures
 * too short to carry an identifier yield an empty map.
 */
export function splitManufacturerData(raw: Buffer | undefined): Map<number, Buffer> {
  const result = new Map<number, Buffer>();
  if (!raw || raw.length < 2) {
    return result;
  }
  result.set(raw.readUInt16LE(0), raw.subarray(2));
  return result;
}

export function toObservation(peripheral: AdvertisingPeripheral): AdvertisementObservation {
  const { localName, manufacturerData, serviceUuids } = peripheral.advertisement;

  return {
    id: peripheral.id,
    address: peripheral.address || peripheral.id,
    name: localName || undefined,
    manufacturerData: splitManufacturerData(manufacturerData),
    serviceUuids: new Set((serviceUuids ?? []).map(normalizeUuid)),
  };
}
