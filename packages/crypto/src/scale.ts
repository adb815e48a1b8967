/**
 * Scale Transform
 * ===============
 *
 * Prices travel as micros: an unsigned 64-bit big-endian integer holding
 * price × scaleFactor.
 *
 * Rounding:
 *   - encode rounds half up to the nearest integer (Math.round on a
 *     non-negative value), so 0.57 × 100 = 56.99999… becomes 57, not 56
 *   - decode is the plain division micros / scaleFactor
 *
 * Round-trip error is therefore bounded by half a micro plus float error.
 */

import { Buffer } from "node:buffer";
import { PriceRangeError, ScaleFactorError } from "./errors.js";
import { assertByteLength } from "./utils.js";

export const MICROS_BYTES = 8;

/** Largest value the 8-byte micros field holds (2^64 − 1) */
export const MAX_MICROS = 0xffff_ffff_ffff_ffffn;

/**
 * @throws ScaleFactorError unless scaleFactor is finite and greater than 0
 */
export function assertScaleFactor(scaleFactor: number): void {
  if (!Number.isFinite(scaleFactor) || scaleFactor <= 0) {
    throw new ScaleFactorError(scaleFactor);
  }
}

/**
 * Convert a price to micros.
 *
 * @throws ScaleFactorError for an invalid scale factor
 * @throws PriceRangeError for a negative or non-finite price, or one whose
 *         micros would not fit in 64 unsigned bits
 */
export function toMicros(price: number, scaleFactor: number): bigint {
  assertScaleFactor(scaleFactor);

  if (!Number.isFinite(price) || price < 0) {
    throw new PriceRangeError(`price must be a finite number >= 0, got ${price}`);
  }

  const scaled = Math.round(price * scaleFactor);
  if (!Number.isFinite(scaled)) {
    throw new PriceRangeError(`price ${price} overflows at scale factor ${scaleFactor}`);
  }

  const micros = BigInt(scaled);
  if (micros > MAX_MICROS) {
    throw new PriceRangeError(
      `price ${price} at scale factor ${scaleFactor} exceeds the 64-bit micros range`
    );
  }
  return micros;
}

/**
 * Convert micros back to a price.
 * @throws ScaleFactorError for an invalid scale factor
 */
export function fromMicros(micros: bigint, scaleFactor: number): number {
  assertScaleFactor(scaleFactor);
  return Number(micros) / scaleFactor;
}

/**
 * Serialize micros as 8 big-endian bytes.
 * @throws PriceRangeError if micros is outside [0, 2^64 − 1]
 */
export function microsToBytes(micros: bigint): Buffer {
  if (micros < 0n || micros > MAX_MICROS) {
    throw new PriceRangeError(`micros ${micros} is outside the unsigned 64-bit range`);
  }
  const buf = Buffer.alloc(MICROS_BYTES);
  buf.writeBigUInt64BE(micros);
  return buf;
}

export function microsFromBytes(bytes: Uint8Array): bigint {
  assertByteLength(bytes, MICROS_BYTES, "micros");
  return Buffer.from(bytes).readBigUInt64BE();
}
