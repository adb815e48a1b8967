/**
 * CLI commands. Each returns the line to print so it can be tested without
 * spawning a process; index.ts does the printing and exit codes.
 */

import { decodeToken, PriceRangeError, type Pricer } from "@rtb-pricer/crypto";
import type { Logger } from "pino";

/**
 * Parse a price argument. Rejects anything Number() would quietly accept
 * ("", "0x10", "1e3 ") that is not a plain decimal.
 * @throws PriceRangeError
 */
export function parsePrice(text: string): number {
  if (!/^\d+(\.\d+)?$/.test(text)) {
    throw new PriceRangeError(`price must be a non-negative decimal number, got "${text}"`);
  }
  return Number(text);
}

export function runEncrypt(pricer: Pricer, log: Logger, seed: string, priceText: string): string {
  const price = parsePrice(priceText);
  const token = pricer.encrypt(seed, price);
  log.info({ seed, price }, "price encrypted");
  return token;
}

export function runDecrypt(pricer: Pricer, log: Logger, token: string): string {
  const price = pricer.decrypt(token);
  log.info({ price }, "price decrypted");
  return String(price);
}

/**
 * Show the three token fields without verifying them. Needs no keys.
 */
export function runInspect(token: string): string {
  const { iv, encryptedPrice, signature } = decodeToken(token);
  return [
    `iv:              ${iv.toString("hex")}`,
    `encrypted price: ${encryptedPrice.toString("hex")}`,
    `signature:       ${signature.toString("hex")}`,
  ].join("\n");
}
