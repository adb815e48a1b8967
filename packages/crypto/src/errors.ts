/**
 * Error taxonomy for price encryption.
 *
 * Every failure the library raises is a PricerError subclass with a stable
 * `code`, so callers can branch without matching on message text.
 */

export type PricerErrorCode =
  | "KEY_DECODE"
  | "SCALE_FACTOR"
  | "PRICE_RANGE"
  | "MALFORMED_TOKEN"
  | "INTEGRITY";

export abstract class PricerError extends Error {
  abstract readonly code: PricerErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** A raw key string could not be decoded under the configured mode. */
export class KeyDecodeError extends PricerError {
  readonly code = "KEY_DECODE" as const;
}

/** Scale factor is zero, negative, or not a finite number. */
export class ScaleFactorError extends PricerError {
  readonly code = "SCALE_FACTOR" as const;

  constructor(readonly scaleFactor: number) {
    super(`scale factor must be a finite number greater than 0, got ${scaleFactor}`);
  }
}

/** Price cannot be represented as an unsigned 64-bit micros value. */
export class PriceRangeError extends PricerError {
  readonly code = "PRICE_RANGE" as const;
}

/** Token text is not URL-safe base64, or does not decode to 28 bytes. */
export class MalformedTokenError extends PricerError {
  readonly code = "MALFORMED_TOKEN" as const;
}

/**
 * The recomputed signature did not match the one carried by the token.
 * The message is fixed and never names the differing byte.
 */
export class IntegrityError extends PricerError {
  readonly code = "INTEGRITY" as const;

  constructor() {
    super("failed to verify price integrity");
  }
}
