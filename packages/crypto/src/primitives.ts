/**
 * Price Encryption Primitives
 * ===========================
 *
 * The building blocks of the RTB winning-price scheme:
 *
 *   iv        = MD5(seed)                                  16 bytes
 *   pad       = HMAC-SHA1(encryption_key, iv)[0:8]          8 bytes
 *   enc_price = pad XOR micros                              8 bytes
 *   signature = HMAC-SHA1(integrity_key, micros || iv)[0:4] 4 bytes
 *
 * The signature covers the plaintext micros, so a decoder has to unmask the
 * price before it can verify it.
 */

import { createHash, createHmac, timingSafeEqual } from "node:crypto";
import { Buffer } from "node:buffer";
import { MICROS_BYTES } from "./scale.js";
import { assertByteLength } from "./utils.js";

// ----- Constants -----

const IV_HASH = "md5" as const;
const HMAC_ALGORITHM = "sha1" as const;
const HMAC_DIGEST_BYTES = 20;  // SHA-1 output

export const IV_BYTES = 16;
export const PAD_BYTES = MICROS_BYTES;
export const SIGNATURE_BYTES = 4;

// ----- Primitives -----

/**
 * Derive the initialization vector from a seed.
 * String seeds are hashed as UTF-8.
 */
export function deriveIv(seed: string | Uint8Array): Buffer {
  const iv = createHash(IV_HASH)
    .update(typeof seed === "string" ? Buffer.from(seed, "utf-8") : seed)
    .digest();
  assertByteLength(iv, IV_BYTES, "iv");
  return iv;
}

function hmacSha1(key: Uint8Array, ...parts: Uint8Array[]): Buffer {
  const mac = createHmac(HMAC_ALGORITHM, key);
  for (const part of parts) {
    mac.update(part);
  }
  const digest = mac.digest();
  assertByteLength(digest, HMAC_DIGEST_BYTES, "hmac digest");
  return digest;
}

/**
 * pad = hmac(e_key, iv), first 8 bytes
 */
export function keystreamPad(encryptionKey: Uint8Array, iv: Uint8Array): Buffer {
  assertByteLength(iv, IV_BYTES, "iv");
  return hmacSha1(encryptionKey, iv).subarray(0, PAD_BYTES);
}

/**
 * XOR an 8-byte value with the pad. Applying it twice with the same pad
 * returns the original bytes.
 */
export function xorPad(pad: Uint8Array, data: Uint8Array): Buffer {
  assertByteLength(pad, PAD_BYTES, "pad");
  assertByteLength(data, PAD_BYTES, "price bytes");

  const out = Buffer.alloc(PAD_BYTES);
  for (let i = 0; i < PAD_BYTES; i++) {
    out[i] = pad[i] ^ data[i];
  }
  return out;
}

/**
 * signature = hmac(i_key, micros || iv), first 4 bytes
 */
export function integrityTag(integrityKey: Uint8Array, micros: Uint8Array, iv: Uint8Array): Buffer {
  assertByteLength(micros, MICROS_BYTES, "micros");
  assertByteLength(iv, IV_BYTES, "iv");
  return hmacSha1(integrityKey, micros, iv).subarray(0, SIGNATURE_BYTES);
}

/**
 * Compare two signatures in constant time. Every byte is inspected
 * regardless of where the first difference is.
 */
export function tagsEqual(expected: Uint8Array, received: Uint8Array): boolean {
  if (expected.length !== received.length) {
    return false;
  }
  return timingSafeEqual(expected, received);
}
