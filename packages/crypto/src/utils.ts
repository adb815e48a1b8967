/**
 * Byte helpers shared by key decoding, the primitives and the framer.
 * Every fixed-width field passes through assertByteLength at its boundary.
 */
import { Buffer } from "node:buffer";
import { KeyDecodeError } from "./errors.js";

const HEX_PATTERN = /^[0-9a-f]*$/i;
const BASE64_PATTERN = /^[A-Za-z0-9+/]*={0,2}$/;

/**
 * Validates that a string is valid hexadecimal and decodes it.
 * @throws KeyDecodeError if the string is not valid hex.
 */
export function validateHex(value: string, label: string): Buffer {
  // Hex strings must have even length and contain only hex characters
  if (!HEX_PATTERN.test(value) || value.length % 2 !== 0) {
    throw new KeyDecodeError(`${label}: invalid hex encoding`);
  }
  return Buffer.from(value, "hex");
}

/**
 * Validates that a string is padded, standard-alphabet base64 and decodes it.
 * Buffer.from silently skips characters it does not know, so the text is
 * checked up front and the decoded length is cross-checked.
 * @throws KeyDecodeError if the string is not canonical base64.
 */
export function validateBase64(value: string, label: string): Buffer {
  if (!BASE64_PATTERN.test(value) || value.length % 4 !== 0) {
    throw new KeyDecodeError(`${label}: invalid base64 encoding`);
  }

  const buf = Buffer.from(value, "base64");
  const padding = value.endsWith("==") ? 2 : value.endsWith("=") ? 1 : 0;

  if (buf.length !== (value.length / 4) * 3 - padding) {
    throw new KeyDecodeError(`${label}: invalid base64 encoding`);
  }
  return buf;
}

/**
 * Throws a RangeError unless `buf` is exactly `expected` bytes long.
 */
export function assertByteLength(buf: Uint8Array, expected: number, label: string): void {
  if (buf.length !== expected) {
    throw new RangeError(`${label}: expected ${expected} bytes, got ${buf.length} bytes`);
  }
}

export function toHex(bytes: Uint8Array): string {
  return Buffer.from(bytes).toString("hex");
}
