/**
 * Key Material
 * ============
 *
 * Turns the raw key strings handed to a codec into key bytes.
 *
 * Supported modes:
 *   hex:    even-length hexadecimal, e.g. "6b65792d31"
 *   base64: standard alphabet with "=" padding, e.g. "a2V5LTE="
 *   plain:  the UTF-8 bytes of the string itself
 *
 * Key length is not checked here: HMAC accepts keys of any length.
 */

import { Buffer } from "node:buffer";
import { KeyDecodeError } from "./errors.js";
import type { KeyDecodingMode } from "./types.js";
import { validateBase64, validateHex } from "./utils.js";

export const KEY_DECODING_MODES: readonly KeyDecodingMode[] = ["hex", "base64", "plain"];

const MODE_ALIASES: ReadonlyMap<string, KeyDecodingMode> = new Map<string, KeyDecodingMode>([
  ["hex", "hex"],
  ["base64", "base64"],
  ["plain", "plain"],
  ["utf8", "plain"],
  ["utf-8", "plain"],
]);

/**
 * Decode a raw key string under the given mode.
 *
 * @param raw   - key text as configured
 * @param mode  - how the text encodes the key bytes
 * @param label - name used in error messages, e.g. "encryption key"
 * @throws KeyDecodeError if the key is empty or not valid for the mode
 */
export function decodeKey(raw: string, mode: KeyDecodingMode, label: string): Buffer {
  if (raw.length === 0) {
    throw new KeyDecodeError(`${label}: key is empty`);
  }

  switch (mode) {
    case "hex":
      return validateHex(raw, label);
    case "base64":
      return validateBase64(raw, label);
    case "plain":
      return Buffer.from(raw, "utf-8");
    default:
      throw new KeyDecodeError(`${label}: unknown key decoding mode "${String(mode)}"`);
  }
}

/**
 * Map user-facing text ("HEX", "utf8", ...) to a key decoding mode.
 * @throws KeyDecodeError for an unknown mode
 */
export function parseKeyDecodingMode(value: string): KeyDecodingMode {
  const mode = MODE_ALIASES.get(value.trim().toLowerCase());
  if (!mode) {
    throw new KeyDecodeError(
      `Unknown key decoding mode "${value}". Expected one of: ${KEY_DECODING_MODES.join(", ")}`
    );
  }
  return mode;
}
