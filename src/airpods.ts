/**
 * AirPods battery levels from Apple proximity-pairing manufacturer data.
 *
 * Levels are packed as single hex nibbles. Reading the payload as a lowercase
 * hex string (company ID already stripped):
 *
 * - [12]: left earbud
 * - [13]: right earbud
 * - [15]: charging case
 *
 * A nibble of 0-10 is the level in tens of percent; 11-15 mean the level is
 * unknown (component missing, or not reported while charging).
 */

import { MalformedAdvertisementError } from './errors.js';

const LEFT_OFFSET = 12;
const RIGHT_OFFSET = 13;
const CASE_OFFSET = 15;

// Bytes needed for CASE_OFFSET to land inside the hex string
const MIN_DATA_LENGTH = Math.ceil((CASE_OFFSET + 1) / 2);

export type BatteryComponent = 'Left' | 'Right' | 'Case';

export interface BatteryReading {
  component: BatteryComponent;
  /** Percent in steps of 10, or null when unknown */
  level: number | null;
}

export interface AirPodsBattery {
  left: number | null;
  right: number | null;
  case: number | null;
}

function nibbleLevel(hexChar: string): number | null {
  const level = parseInt(hexChar, 16);
  return level <= 10 ? level * 10 : null;
}

/**
 * Decode the three battery levels from an AirPods advertisement.
 *
 * @param data - Manufacturer data for company 0x004C, without the ID prefix
 * @throws {MalformedAdvertisementError} If data is shorter than 8 bytes
 */
export function decodeAirPodsBattery(data: Uint8Array): AirPodsBattery {
  if (data.length < MIN_DATA_LENGTH) {
    throw new MalformedAdvertisementError(data.length, MIN_DATA_LENGTH);
  }

  const hex = Buffer.from(data.buffer, data.byteOffset, data.length).toString('hex');

  return {
    left: nibbleLevel(hex[LEFT_OFFSET]),
    right: nibbleLevel(hex[RIGHT_OFFSET]),
    case: nibbleLevel(hex[CASE_OFFSET]),
  };
}

/**
 * Battery readings in display order: Left, Right, Case.
 */
export function batteryReadings(battery: AirPodsBattery): BatteryReading[] {
  return [
    { component: 'Left', level: battery.left },
    { component: 'Right', level: battery.right },
    { component: 'Case', level: battery.case },
  ];
}
