// errors.ts

/**
 * Thrown when the engine is called for a device id that was never registered.
 */
export class UnknownDeviceError extends Error {
  constructor(public readonly deviceId: string) {
    super(`Device "${deviceId}" is not registered with the reconciliation engine`);
    this.name = 'UnknownDeviceError';
  }
}

export class DuplicateDeviceError extends Error {
  constructor(public readonly deviceId: string) {
    super(`Device "${deviceId}" is already registered with the reconciliation engine`);
    this.name = 'DuplicateDeviceError';
  }
}
