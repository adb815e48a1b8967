/**
 * Tests for the Price Codec
 * =========================
 *
 * Tests cover:
 *   1. Encrypt → decrypt round-trip
 *   2. Known-answer tokens for fixed keys
 *   3. Determinism and seed sensitivity
 *   4. Tampered encrypted price / signature → IntegrityError
 *   5. Malformed tokens → MalformedTokenError
 *   6. Construction errors (keys, scale factor)
 *   7. Debug tracing through an injected sink
 *
 * Uses Node's built-in test runner (node:test).
 */

import { describe, it } from "node:test";
import assert from "node:assert/strict";
import { Buffer } from "node:buffer";
import {
  createPriceCodec,
  createPricer,
  encryptPrice,
  decryptPrice,
  encryptMicros,
  decryptMicros,
  IntegrityError,
  KeyDecodeError,
  MalformedTokenError,
  PriceRangeError,
  ScaleFactorError,
  MAX_MICROS,
  TRACE_WARNING_TYPE,
  emitTrace,
  type PriceCodec,
  type PriceCodecConfig,
  type TraceFields,
  type TraceSink,
} from "./index.js";

// ----- Test data -----

const ENCRYPTION_KEY = "test-encryption-key";
const INTEGRITY_KEY = "test-integrity-key";
const SCALE = 1_000_000;

// Same keys, other encodings
const ENCRYPTION_KEY_HEX = "746573742d656e6372797074696f6e2d6b6579";
const INTEGRITY_KEY_HEX = "746573742d696e746567726974792d6b6579";
const ENCRYPTION_KEY_B64 = "dGVzdC1lbmNyeXB0aW9uLWtleQ==";
const INTEGRITY_KEY_B64 = "dGVzdC1pbnRlZ3JpdHkta2V5";

// seed "auction-123", price 1.50
const TOKEN_1_50 = "VEUxwCOK59_zuVpX9qWBm-Mq5EHZpaqPbrwu5Q==";

// ----- Test helpers -----

function config(overrides: Partial<PriceCodecConfig> = {}): PriceCodecConfig {
  return {
    encryptionKey: ENCRYPTION_KEY,
    integrityKey: INTEGRITY_KEY,
    keyDecodingMode: "plain",
    scaleFactor: SCALE,
    ...overrides,
  };
}

function plainCodec(overrides: Partial<PriceCodecConfig> = {}): PriceCodec {
  return createPriceCodec(config(overrides));
}

/** Re-encode a token after flipping one bit of its raw bytes */
function flipBit(token: string, byteIndex: number, bit: number): string {
  const raw = Buffer.from(token, "base64url");
  raw[byteIndex] ^= 1 << bit;
  return raw.toString("base64url");
}

interface RecordedEvent {
  message: string;
  fields: TraceFields;
}

function recordingSink(): TraceSink & { events: RecordedEvent[] } {
  const events: RecordedEvent[] = [];
  return {
    events,
    debug(fields, message) {
      events.push({ message, fields });
    },
  };
}

// ----- Tests -----

describe("Price Codec", () => {
  it("should encrypt and decrypt a price successfully (round-trip)", () => {
    const codec = plainCodec();

    const token = encryptPrice(codec, "auction-123", 1.5);

    assert.equal(Buffer.from(token, "base64url").length, 28);
    assert.equal(decryptPrice(codec, token), 1.5);
  });

  it("should produce the known token for fixed keys, seed and price", () => {
    const codec = plainCodec();

    assert.equal(encryptPrice(codec, "auction-123", 1.5), TOKEN_1_50);
    assert.equal(encryptPrice(codec, "auction-123", 0), "VEUxwCOK59_zuVpX9qWBm-Mq5EHZs0nvhL_tZA==");
    assert.equal(encryptPrice(codec, "auction-456", 1.5), "D08Fqac_zzErk-mh4dN43e76SUt5iCQKVE61ig==");
  });

  it("should round-trip a spread of prices, seeds and scale factors within resolution", () => {
    const cases: Array<[string, number, number]> = [
      ["imp-1", 0.01, 1_000_000],
      ["imp-2", 2.75, 1_000_000],
      ["imp-3", 1234.567891, 1_000_000],
      ["imp-4", 0.57, 100],
      ["imp-5", 19.999, 1000],
      ["", 42, 1],
      ["seed with spaces ✓", 3.14159, 1e9],
    ];

    for (const [seed, price, scaleFactor] of cases) {
      const codec = plainCodec({ scaleFactor });
      const decrypted = decryptPrice(codec, encryptPrice(codec, seed, price));
      assert.ok(
        Math.abs(decrypted - price) <= 1 / scaleFactor,
        `${price} at scale ${scaleFactor} came back as ${decrypted}`
      );
    }
  });

  it("should round-trip a zero price to zero", () => {
    const codec = plainCodec();
    assert.equal(decryptPrice(codec, encryptPrice(codec, "auction-0", 0)), 0);
  });

  it("should fit the maximum micros value in the 8-byte field", () => {
    const codec = plainCodec();

    const token = encryptMicros(codec, "auction-123", MAX_MICROS);

    assert.equal(token, "VEUxwCOK59_zuVpX9qWBmxzVG74mTLYQ6DfCaA==");
    assert.equal(decryptMicros(codec, token), 0xffff_ffff_ffff_ffffn);
  });

  it("should reject micros outside the unsigned 64-bit range", () => {
    const codec = plainCodec();
    assert.throws(() => encryptMicros(codec, "s", MAX_MICROS + 1n), PriceRangeError);
    assert.throws(() => encryptMicros(codec, "s", -1n), PriceRangeError);
  });

  it("should reject a negative price", () => {
    assert.throws(() => encryptPrice(plainCodec(), "s", -0.01), PriceRangeError);
  });

  it("should be deterministic for identical inputs", () => {
    const codec = plainCodec();
    assert.equal(encryptPrice(codec, "auction-9", 7.25), encryptPrice(codec, "auction-9", 7.25));
  });

  it("should produce different tokens for different seeds", () => {
    const codec = plainCodec();

    const a = Buffer.from(encryptPrice(codec, "auction-1", 7.25), "base64url");
    const b = Buffer.from(encryptPrice(codec, "auction-2", 7.25), "base64url");

    assert.notDeepEqual(a.subarray(0, 16), b.subarray(0, 16));
    assert.notDeepEqual(a.subarray(16, 24), b.subarray(16, 24));
  });

  it("should decode tokens the same whatever the key encoding", () => {
    const hex = plainCodec({
      encryptionKey: ENCRYPTION_KEY_HEX,
      integrityKey: INTEGRITY_KEY_HEX,
      keyDecodingMode: "hex",
    });
    const base64 = plainCodec({
      encryptionKey: ENCRYPTION_KEY_B64,
      integrityKey: INTEGRITY_KEY_B64,
      keyDecodingMode: "base64",
    });

    assert.equal(encryptPrice(hex, "auction-123", 1.5), TOKEN_1_50);
    assert.equal(encryptPrice(base64, "auction-123", 1.5), TOKEN_1_50);
    assert.equal(decryptPrice(hex, TOKEN_1_50), 1.5);
  });

  it("should accept tokens without base64 padding", () => {
    assert.equal(decryptPrice(plainCodec(), TOKEN_1_50.replace(/=+$/, "")), 1.5);
  });

  it("should fail when any bit of the encrypted price or signature is flipped", () => {
    const codec = plainCodec();

    for (let byteIndex = 16; byteIndex < 28; byteIndex++) {
      for (let bit = 0; bit < 8; bit++) {
        assert.throws(
          () => decryptPrice(codec, flipBit(TOKEN_1_50, byteIndex, bit)),
          IntegrityError,
          `byte ${byteIndex} bit ${bit}`
        );
      }
    }
  });

  it("should fail when the token is checked with the wrong integrity key", () => {
    const other = plainCodec({ integrityKey: "other-integrity-key" });
    assert.throws(() => decryptPrice(other, TOKEN_1_50), {
      name: "IntegrityError",
      code: "INTEGRITY",
      message: "failed to verify price integrity",
    });
  });

  it("should fail with MalformedTokenError or IntegrityError when any character changes", () => {
    const codec = plainCodec();

    for (let i = 0; i < TOKEN_1_50.length; i++) {
      const replacement = TOKEN_1_50[i] === "A" ? "B" : "A";
      const altered = TOKEN_1_50.slice(0, i) + replacement + TOKEN_1_50.slice(i + 1);

      assert.throws(
        () => decryptPrice(codec, altered),
        (err: unknown) => err instanceof MalformedTokenError || err instanceof IntegrityError,
        `position ${i}`
      );
    }
  });

  it("should fail when the token does not decode to 28 bytes", () => {
    const codec = plainCodec();
    const raw = Buffer.from(TOKEN_1_50, "base64url");

    assert.throws(
      () => decryptPrice(codec, raw.subarray(0, 27).toString("base64url")),
      /must decode to 28 bytes, got 27 bytes/
    );
    assert.throws(
      () => decryptPrice(codec, Buffer.concat([raw, Buffer.from([0])]).toString("base64url")),
      /must decode to 28 bytes, got 29 bytes/
    );
    assert.throws(() => decryptPrice(codec, ""), MalformedTokenError);
  });

  it("should fail when the token is not URL-safe base64", () => {
    const codec = plainCodec();
    assert.throws(() => decryptPrice(codec, TOKEN_1_50.replace("-", "+")), MalformedTokenError);
    assert.throws(() => decryptPrice(codec, `${TOKEN_1_50.slice(0, 20)}!${TOKEN_1_50.slice(21)}`), MalformedTokenError);
  });
});

describe("Price Codec construction", () => {
  it("should fail when the encryption key cannot be decoded", () => {
    assert.throws(
      () => createPriceCodec(config({ encryptionKey: "zz", keyDecodingMode: "hex", integrityKey: "00" })),
      { name: "KeyDecodeError", message: "encryption key: invalid hex encoding" }
    );
  });

  it("should fail when the integrity key cannot be decoded", () => {
    assert.throws(
      () => createPriceCodec(config({ encryptionKey: "00", keyDecodingMode: "hex", integrityKey: "abc" })),
      { name: "KeyDecodeError", message: "integrity key: invalid hex encoding" }
    );
  });

  it("should fail when a key is empty", () => {
    assert.throws(() => createPriceCodec(config({ integrityKey: "" })), KeyDecodeError);
  });

  it("should fail when the scale factor is not positive", () => {
    for (const scaleFactor of [0, -1, Number.NaN, Number.POSITIVE_INFINITY]) {
      assert.throws(() => createPriceCodec(config({ scaleFactor })), ScaleFactorError);
    }
  });

  it("should freeze the codec", () => {
    assert.ok(Object.isFrozen(plainCodec()));
  });

  it("should bind encrypt and decrypt in a pricer", () => {
    const pricer = createPricer(config());

    assert.equal(pricer.encrypt("auction-123", 1.5), TOKEN_1_50);
    assert.equal(pricer.decrypt(TOKEN_1_50), 1.5);
  });
});

describe("Price Codec tracing", () => {
  it("should not trace when debug is off", () => {
    const sink = recordingSink();
    const codec = plainCodec({ trace: sink });

    decryptPrice(codec, encryptPrice(codec, "auction-123", 1.5));

    assert.equal(sink.events.length, 0);
  });

  it("should trace every encryption step when the codec is in debug mode", () => {
    const sink = recordingSink();
    const codec = plainCodec({ trace: sink, debug: true });

    encryptPrice(codec, "auction-123", 1.5);

    assert.deepEqual(
      sink.events.map((event) => event.message),
      ["key material", "initialization vector", "price obfuscated", "signature computed"]
    );
    assert.deepEqual(sink.events[0]?.fields, {
      keyDecodingMode: "plain",
      encryptionKey: ENCRYPTION_KEY_HEX,
      integrityKey: INTEGRITY_KEY_HEX,
    });
    assert.deepEqual(sink.events[1]?.fields, {
      seed: "auction-123",
      iv: "544531c0238ae7dff3b95a57f6a5819b",
    });
    assert.deepEqual(sink.events[2]?.fields, {
      micros: "1500000",
      pad: "e32ae441d9b349ef",
      encryptedPrice: "e32ae441d9a5aa8f",
    });
    assert.deepEqual(sink.events[3]?.fields, { signature: "6ebc2ee5" });
  });

  it("should let the per-call flag override the codec default", () => {
    const sink = recordingSink();
    const codec = plainCodec({ trace: sink, debug: true });

    decryptPrice(codec, TOKEN_1_50, { debug: false });
    assert.equal(sink.events.length, 0);

    const quiet = plainCodec({ trace: sink });
    decryptPrice(quiet, TOKEN_1_50, { debug: true });
    assert.deepEqual(
      sink.events.map((event) => event.message),
      ["key material", "token decoded"]
    );
    assert.equal(sink.events[1]?.fields["expectedSignature"], "6ebc2ee5");
  });

  it("should still return the price when the trace sink throws", (t) => {
    const warn = t.mock.method(process, "emitWarning", (..._args: unknown[]) => undefined);
    const codec = plainCodec({
      debug: true,
      trace: {
        debug() {
          throw new Error("sink offline");
        },
      },
    });

    assert.equal(encryptPrice(codec, "auction-123", 1.5), TOKEN_1_50);
    assert.equal(decryptPrice(codec, TOKEN_1_50), 1.5);

    assert.equal(warn.mock.callCount(), 6);
    assert.deepEqual(warn.mock.calls[0]?.arguments, [
      'trace sink failed on "key material": sink offline',
      TRACE_WARNING_TYPE,
    ]);
  });

  it("should only build trace fields for events that are sent", () => {
    const sink = recordingSink();
    let built = 0;
    const fields = (): TraceFields => {
      built++;
      return { encryptionKey: "00" };
    };

    emitTrace(sink, false, fields, "key material");
    emitTrace(undefined, true, fields, "key material");
    assert.equal(built, 0);
    assert.equal(sink.events.length, 0);

    emitTrace(sink, true, fields, "key material");
    assert.equal(built, 1);
    assert.deepEqual(sink.events, [{ message: "key material", fields: { encryptionKey: "00" } }]);
  });
});
