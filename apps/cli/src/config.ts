/**
 * CLI configuration from environment variables.
 *
 *   PRICE_ENCRYPTION_KEY=<raw key>      (required)
 *   PRICE_INTEGRITY_KEY=<raw key>       (required)
 *   PRICE_KEY_ENCODING=hex|base64|plain (default: hex)
 *   PRICE_SCALE_FACTOR=<number>         (default: 1000000)
 *   PRICE_DEBUG=true|false              (default: false)
 *   LOG_LEVEL=<pino level>              (default: info)
 *
 * Command-line flags override the environment.
 */

import {
  assertScaleFactor,
  parseKeyDecodingMode,
  PricerError,
  type KeyDecodingMode,
} from "@rtb-pricer/crypto";

export const DEFAULT_SCALE_FACTOR = 1_000_000;

const LOG_LEVELS = ["trace", "debug", "info", "warn", "error", "fatal", "silent"] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

export interface CliConfig {
  encryptionKey: string;
  integrityKey: string;
  keyDecodingMode: KeyDecodingMode;
  scaleFactor: number;
  debug: boolean;
  logLevel: LogLevel;
}

/** Flags that take precedence over the environment */
export type CliOverrides = {
  keyEncoding?: string;
  scaleFactor?: string;
  debug?: boolean;
};

export class ConfigError extends Error {
  constructor(readonly variable: string, message: string) {
    super(`${variable}: ${message}`);
    this.name = "ConfigError";
  }
}

function required(env: Record<string, string | undefined>, name: string): string {
  const value = env[name];
  if (!value) {
    throw new ConfigError(name, "environment variable is required");
  }
  return value;
}

function parseScaleFactor(value: string, source: string): number {
  const scaleFactor = Number(value);
  try {
    assertScaleFactor(scaleFactor);
  } catch (err) {
    throw new ConfigError(source, err instanceof Error ? err.message : String(err));
  }
  return scaleFactor;
}

function parseBoolean(value: string | undefined, source: string): boolean {
  if (value === undefined || value === "") {
    return false;
  }
  switch (value.trim().toLowerCase()) {
    case "1":
    case "true":
    case "yes":
      return true;
    case "0":
    case "false":
    case "no":
      return false;
    default:
      throw new ConfigError(source, `expected true or false, got "${value}"`);
  }
}

function parseLogLevel(value: string | undefined): LogLevel {
  if (value === undefined || value === "") {
    return "info";
  }
  const level = LOG_LEVELS.find((candidate) => candidate === value.trim().toLowerCase());
  if (!level) {
    throw new ConfigError("LOG_LEVEL", `expected one of ${LOG_LEVELS.join(", ")}, got "${value}"`);
  }
  return level;
}

/**
 * Build the CLI configuration.
 *
 * @param env       - process.env or equivalent key-value map
 * @param overrides - parsed command-line flags
 * @throws ConfigError naming the offending variable or flag
 */
export function loadConfig(
  env: Record<string, string | undefined>,
  overrides: CliOverrides = {}
): CliConfig {
  const encodingSource = overrides.keyEncoding !== undefined ? "--key-encoding" : "PRICE_KEY_ENCODING";
  let keyDecodingMode: KeyDecodingMode;
  try {
    keyDecodingMode = parseKeyDecodingMode(overrides.keyEncoding ?? env.PRICE_KEY_ENCODING ?? "hex");
  } catch (err) {
    if (err instanceof PricerError) {
      throw new ConfigError(encodingSource, err.message);
    }
    throw err;
  }

  const scaleFactor =
    overrides.scaleFactor !== undefined
      ? parseScaleFactor(overrides.scaleFactor, "--scale-factor")
      : env.PRICE_SCALE_FACTOR
        ? parseScaleFactor(env.PRICE_SCALE_FACTOR, "PRICE_SCALE_FACTOR")
        : DEFAULT_SCALE_FACTOR;

  const debug = overrides.debug ?? parseBoolean(env.PRICE_DEBUG, "PRICE_DEBUG");
  const logLevel = parseLogLevel(env.LOG_LEVEL);

  return {
    encryptionKey: required(env, "PRICE_ENCRYPTION_KEY"),
    integrityKey: required(env, "PRICE_INTEGRITY_KEY"),
    keyDecodingMode,
    scaleFactor,
    debug,
    // Traces are written at debug level
    logLevel: debug && LOG_LEVELS.indexOf(logLevel) > LOG_LEVELS.indexOf("debug") ? "debug" : logLevel,
  };
}
