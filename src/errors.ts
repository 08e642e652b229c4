/**
 * Error classes for the battery monitor.
 */

export class BatteryMonitorError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'BatteryMonitorError';
  }
}

/**
 * The Bluetooth adapter cannot scan: powered off, unsupported, unauthorized,
 * or it never reported `poweredOn`.
 */
export class ScanUnavailableError extends BatteryMonitorError {
  constructor(
    message: string,
    public readonly adapterState: string
  ) {
    super(message);
    this.name = 'ScanUnavailableError';
  }
}

/**
 * Manufacturer data too short for the battery offsets the decoder reads.
 */
export class MalformedAdvertisementError extends BatteryMonitorError {
  constructor(
    public readonly length: number,
    public readonly required: number
  ) {
    super(`Advertisement data too short: ${length} bytes (need ${required})`);
    this.name = 'MalformedAdvertisementError';
  }
}

export class ConfigError extends BatteryMonitorError {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}
