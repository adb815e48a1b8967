/**
 * Shared types for price encryption.
 *
 * Binary values are Node Buffers inside the library; trace events carry
 * them as lowercase hex strings.
 */
import type { Buffer } from "node:buffer";
import type { TraceSink } from "./trace.js";

/** How a raw key string encodes its bytes */
export type KeyDecodingMode = "hex" | "base64" | "plain";

/** Input for createPriceCodec / createPricer */
export interface PriceCodecConfig {
  /** Raw encryption key text, decoded with keyDecodingMode */
  encryptionKey: string;

  /** Raw integrity key text, decoded with keyDecodingMode */
  integrityKey: string;

  keyDecodingMode: KeyDecodingMode;

  /** Micros per currency unit, e.g. 1_000_000 */
  scaleFactor: number;

  /** Default for the per-call debug flag */
  debug?: boolean;

  /** Receives diagnostic events while debug is on */
  trace?: TraceSink;
}

/**
 * PriceCodec: decoded keys plus settings, frozen at construction.
 * Safe to share between any number of encrypt/decrypt calls.
 */
export type PriceCodec = Readonly<{
  encryptionKey: Buffer;
  integrityKey: Buffer;
  keyDecodingMode: KeyDecodingMode;
  scaleFactor: number;
  debug: boolean;
  trace: TraceSink | undefined;
}>;

/** Per-call options for encrypt/decrypt */
export interface CallOptions {
  /** Overrides the codec's debug default for this call */
  debug?: boolean;
}

/**
 * TokenParts: the three fields of a decoded 28-byte token.
 */
export interface TokenParts {
  /** 16-byte initialization vector, sent in the clear */
  iv: Buffer;

  /** 8-byte price micros XORed with the pad */
  encryptedPrice: Buffer;

  /** 4-byte integrity signature */
  signature: Buffer;
}

/** Encrypt/decrypt bound to one codec */
export interface Pricer {
  encrypt(seed: string, price: number, debug?: boolean): string;
  decrypt(token: string, debug?: boolean): number;
}
