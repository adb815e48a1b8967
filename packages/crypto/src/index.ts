/**
 * @rtb-pricer/crypto: RTB winning-price encryption
 *
 * Re-exports all public types and functions for consumers.
 */
export {
  createPriceCodec,
  createPricer,
  encryptPrice,
  decryptPrice,
  encryptMicros,
  decryptMicros,
} from "./codec.js";
export type {
  KeyDecodingMode,
  PriceCodec,
  PriceCodecConfig,
  CallOptions,
  TokenParts,
  Pricer,
} from "./types.js";
export {
  PricerError,
  KeyDecodeError,
  ScaleFactorError,
  PriceRangeError,
  MalformedTokenError,
  IntegrityError,
  type PricerErrorCode,
} from "./errors.js";
export { decodeKey, parseKeyDecodingMode, KEY_DECODING_MODES } from "./keys.js";
export {
  toMicros,
  fromMicros,
  microsToBytes,
  microsFromBytes,
  assertScaleFactor,
  MAX_MICROS,
} from "./scale.js";
export {
  deriveIv,
  keystreamPad,
  xorPad,
  integrityTag,
  tagsEqual,
  IV_BYTES,
  PAD_BYTES,
  SIGNATURE_BYTES,
} from "./primitives.js";
export { encodeToken, decodeToken, addBase64Padding, TOKEN_BYTES } from "./token.js";
export { emitTrace, TRACE_WARNING_TYPE, type TraceSink, type TraceFields } from "./trace.js";
