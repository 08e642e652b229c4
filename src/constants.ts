/**
 * Advertisement constants and scan timings.
 */

/** Bluetooth SIG company identifier for Apple, Inc. (0x004C). */
export const APPLE_MANUFACTURER_ID = 0x004c;

/** Length of an AirPods proximity-pairing payload, company ID excluded. */
export const AIRPODS_DATA_LENGTH = 27;

export const BATTERY_SERVICE_UUID = '0000180f-0000-1000-8000-00805f9b34fb';

// Bluetooth base UUID suffix, used to expand 16/32-bit short UUIDs
export const BASE_UUID_SUFFIX = '-0000-1000-8000-00805f9b34fb';

export const DEFAULT_EARBUDS_NAME = 'AirPods';
export const DEFAULT_STANDARD_NAME = 'Unknown Device';

export const LISTEN_WINDOW_MS = 5_000;
export const SCAN_INTERVAL_MS = 15_000;
export const POWER_ON_TIMEOUT_MS = 5_000;
export const SCAN_START_TIMEOUT_MS = 5_000;
