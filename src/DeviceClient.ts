// DeviceClient.ts

import { RawDeviceSettings } from './normalize.js';

/**
 * Transport to one air conditioner. Implementations own the firmware-specific encoding;
 * both calls speak the controller's key-value settings form.
 */
export interface DeviceClient {
  /** Reads the current settings; null when the device gave no usable answer. */
  fetchSettings(): Promise<RawDeviceSettings | null>;

  /**
   * Writes the given settings. Controllers that re-read their status after a write
   * return it here, which enables command-time detection.
   */
  applySettings(settings: RawDeviceSettings): Promise<RawDeviceSettings | null | void>;

  cleanup?(): void;
}
