/**
 * Token framing: iv || enc_price || signature, as URL-safe base64.
 *
 * Encoded tokens keep their "=" padding. Decoding accepts tokens with the
 * padding stripped, which is how they usually arrive in a URL.
 */
import { Buffer } from "node:buffer";
import { MalformedTokenError } from "./errors.js";
import { IV_BYTES, PAD_BYTES, SIGNATURE_BYTES } from "./primitives.js";
import type { TokenParts } from "./types.js";
import { assertByteLength } from "./utils.js";

export const TOKEN_BYTES = IV_BYTES + PAD_BYTES + SIGNATURE_BYTES;

const PRICE_OFFSET = IV_BYTES;
const SIGNATURE_OFFSET = IV_BYTES + PAD_BYTES;

const URL_SAFE_BASE64 = /^[A-Za-z0-9_-]*={0,2}$/;

export function addBase64Padding(text: string): string {
  const remainder = text.length % 4;
  return remainder === 0 ? text : text + "=".repeat(4 - remainder);
}

function toUrlSafe(base64: string): string {
  return base64.replace(/\+/g, "-").replace(/\//g, "_");
}

function fromUrlSafe(text: string): string {
  return text.replace(/-/g, "+").replace(/_/g, "/");
}

/**
 * final_message = WebSafeBase64Encode(iv || enc_price || signature)
 */
export function encodeToken(parts: TokenParts): string {
  assertByteLength(parts.iv, IV_BYTES, "iv");
  assertByteLength(parts.encryptedPrice, PAD_BYTES, "encrypted price");
  assertByteLength(parts.signature, SIGNATURE_BYTES, "signature");

  return toUrlSafe(
    Buffer.concat([parts.iv, parts.encryptedPrice, parts.signature]).toString("base64")
  );
}

/**
 * Decode token text into its three fields.
 * @throws MalformedTokenError on bad URL-safe base64 or a length other than 28 bytes
 */
export function decodeToken(text: string): TokenParts {
  const padded = addBase64Padding(text.trim());
  const raw = Buffer.from(fromUrlSafe(padded), "base64");

  // Buffer.from skips unknown characters and ignores trailing bits, so the
  // text must re-encode to itself for every character to count.
  if (!URL_SAFE_BASE64.test(padded) || toUrlSafe(raw.toString("base64")) !== padded) {
    throw new MalformedTokenError("price token is not valid URL-safe base64");
  }

  if (raw.length !== TOKEN_BYTES) {
    throw new MalformedTokenError(
      `price token must decode to ${TOKEN_BYTES} bytes, got ${raw.length} bytes`
    );
  }

  return {
    iv: raw.subarray(0, PRICE_OFFSET),
    encryptedPrice: raw.subarray(PRICE_OFFSET, SIGNATURE_OFFSET),
    signature: raw.subarray(SIGNATURE_OFFSET, TOKEN_BYTES),
  };
}
