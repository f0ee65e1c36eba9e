// utils.ts

import { v5 as uuidv5 } from 'uuid';

/**
 * Parses a temperature reading.
 * @returns The value in degrees, or NaN when the reading is not numeric (e.g. "--").
 */
export function parseTemperature(value: number | string | null | undefined): number {
  if (value == null) {
    return NaN;
  }
  if (typeof value === 'number') {
    return value;
  }
  const trimmed = value.trim();
  if (!/^-?\d+(\.\d+)?$/.test(trimmed)) {
    return NaN;
  }
  return parseFloat(trimmed);
}

/**
 * Rounds a temperature to the nearest multiple of `step`.
 * A non-positive step leaves the value untouched.
 */
export function roundTemperature(value: number, step: number): number {
  if (!Number.isFinite(value)) {
    return NaN;
  }
  if (!(step > 0)) {
    return value;
  }
  const rounded = Math.round(value / step) * step;
  // Strip binary noise such as 23.499999999 from the division
  return Number(rounded.toFixed(3));
}

/** Render a temperature the way the controller does: no trailing zeros. */
export function formatTemperature(value: number): string {
  return String(Number(value.toFixed(3)));
}

/** Generate deterministic UUID from name and namespace */
export function generateUUID(name: string, namespace: string): string {
  return uuidv5(`${namespace}:${name}`, uuidv5.URL);
}

/** Turn any thrown value into an Error. */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
