import { BYTES_PER_KB } from '../constants.js';

/**
 * Round to two decimal places
 */
export function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

export function bytesToKb(bytes: number): number {
  return bytes / BYTES_PER_KB;
}
