/**
 * Price Codec
 * ===========
 *
 * Encrypts a winning price into a 28-byte URL-safe token and back.
 *
 * Encrypt:
 *   1. micros    = round(price × scaleFactor), 8 bytes big-endian
 *   2. iv        = MD5(seed)
 *   3. pad       = HMAC-SHA1(e_key, iv)[0:8]
 *   4. enc_price = pad XOR micros
 *   5. signature = HMAC-SHA1(i_key, micros || iv)[0:4]
 *   6. token     = WebSafeBase64(iv || enc_price || signature)
 *
 * Decrypt reverses the framing, unmasks the micros with the recomputed pad,
 * recomputes the signature over the recovered micros and compares it in
 * constant time. A mismatch is reported as IntegrityError and nothing else.
 *
 * The seed only randomizes the IV. Equal seeds give equal tokens for the
 * same price and keys.
 */

import { IntegrityError } from "./errors.js";
import { decodeKey } from "./keys.js";
import { deriveIv, integrityTag, keystreamPad, tagsEqual, xorPad } from "./primitives.js";
import { assertScaleFactor, fromMicros, microsFromBytes, microsToBytes, toMicros } from "./scale.js";
import { decodeToken, encodeToken } from "./token.js";
import { emitTrace } from "./trace.js";
import type { CallOptions, PriceCodec, PriceCodecConfig, Pricer } from "./types.js";
import { toHex } from "./utils.js";

// ----- Construction -----

/**
 * Decode both keys and validate the scale factor.
 *
 * @throws KeyDecodeError if either key cannot be decoded (the message names which)
 * @throws ScaleFactorError for an invalid scale factor
 */
export function createPriceCodec(config: PriceCodecConfig): PriceCodec {
  const encryptionKey = decodeKey(config.encryptionKey, config.keyDecodingMode, "encryption key");
  const integrityKey = decodeKey(config.integrityKey, config.keyDecodingMode, "integrity key");
  assertScaleFactor(config.scaleFactor);

  return Object.freeze({
    encryptionKey,
    integrityKey,
    keyDecodingMode: config.keyDecodingMode,
    scaleFactor: config.scaleFactor,
    debug: config.debug ?? false,
    trace: config.trace,
  });
}

function isTracing(codec: PriceCodec, options?: CallOptions): boolean {
  return options?.debug ?? codec.debug;
}

function traceKeys(codec: PriceCodec, tracing: boolean): void {
  emitTrace(
    codec.trace,
    tracing,
    () => ({
      keyDecodingMode: codec.keyDecodingMode,
      encryptionKey: toHex(codec.encryptionKey),
      integrityKey: toHex(codec.integrityKey),
    }),
    "key material"
  );
}

// ----- Encrypt -----

/**
 * Encrypt an already-scaled micros value.
 *
 * @param codec  - codec built by createPriceCodec
 * @param seed   - any string; determines the IV
 * @param micros - unsigned 64-bit price in 1/scaleFactor units
 * @returns URL-safe base64 token
 * @throws PriceRangeError if micros is outside the unsigned 64-bit range
 */
export function encryptMicros(
  codec: PriceCodec,
  seed: string,
  micros: bigint,
  options?: CallOptions
): string {
  const tracing = isTracing(codec, options);
  traceKeys(codec, tracing);

  const data = microsToBytes(micros);

  const iv = deriveIv(seed);
  emitTrace(codec.trace, tracing, () => ({ seed, iv: toHex(iv) }), "initialization vector");

  // enc_price = pad <xor> data
  const pad = keystreamPad(codec.encryptionKey, iv);
  const encryptedPrice = xorPad(pad, data);
  emitTrace(
    codec.trace,
    tracing,
    () => ({ micros: micros.toString(), pad: toHex(pad), encryptedPrice: toHex(encryptedPrice) }),
    "price obfuscated"
  );

  const signature = integrityTag(codec.integrityKey, data, iv);
  emitTrace(codec.trace, tracing, () => ({ signature: toHex(signature) }), "signature computed");

  return encodeToken({ iv, encryptedPrice, signature });
}

/**
 * Encrypt a price.
 *
 * @throws PriceRangeError for a negative or out-of-range price
 */
export function encryptPrice(
  codec: PriceCodec,
  seed: string,
  price: number,
  options?: CallOptions
): string {
  return encryptMicros(codec, seed, toMicros(price, codec.scaleFactor), options);
}

// ----- Decrypt -----

/**
 * Decrypt a token to its micros value, verifying the signature.
 *
 * @throws MalformedTokenError if the token is not 28 bytes of URL-safe base64
 * @throws IntegrityError if the signature does not match
 */
export function decryptMicros(codec: PriceCodec, token: string, options?: CallOptions): bigint {
  const tracing = isTracing(codec, options);
  traceKeys(codec, tracing);

  const { iv, encryptedPrice, signature } = decodeToken(token);

  // data = enc_price <xor> pad
  const pad = keystreamPad(codec.encryptionKey, iv);
  const data = xorPad(pad, encryptedPrice);

  const expected = integrityTag(codec.integrityKey, data, iv);
  emitTrace(
    codec.trace,
    tracing,
    () => ({
      token,
      iv: toHex(iv),
      encryptedPrice: toHex(encryptedPrice),
      signature: toHex(signature),
      pad: toHex(pad),
      expectedSignature: toHex(expected),
    }),
    "token decoded"
  );

  if (!tagsEqual(expected, signature)) {
    throw new IntegrityError();
  }

  return microsFromBytes(data);
}

/**
 * Decrypt a token to a price.
 *
 * @throws MalformedTokenError | IntegrityError
 */
export function decryptPrice(codec: PriceCodec, token: string, options?: CallOptions): number {
  return fromMicros(decryptMicros(codec, token, options), codec.scaleFactor);
}

// ----- Pricer -----

/**
 * Build a codec once and bind encrypt/decrypt to it.
 */
export function createPricer(config: PriceCodecConfig): Pricer {
  const codec = createPriceCodec(config);

  return Object.freeze({
    encrypt: (seed: string, price: number, debug?: boolean): string =>
      encryptPrice(codec, seed, price, { debug }),
    decrypt: (token: string, debug?: boolean): number =>
      decryptPrice(codec, token, { debug }),
  });
}
