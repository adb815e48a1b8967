/**
 * pino logger for the CLI.
 *
 * Logs go to stderr as JSON; stdout carries only command output so tokens
 * and prices can be piped. Key material in trace events is redacted.
 */
import pino from "pino";
import type { DestinationStream, Logger } from "pino";
import type { LogLevel } from "./config.js";

const REDACTED_FIELDS = ["encryptionKey", "integrityKey"];

export function createLogger(level: LogLevel, destination?: DestinationStream): Logger {
  return pino(
    {
      name: "rtb-pricer",
      level,
      redact: { paths: REDACTED_FIELDS, censor: "[redacted]" },
      timestamp: pino.stdTimeFunctions.isoTime,
      serializers: {
        err: pino.stdSerializers.err,
      },
    },
    destination ?? pino.destination({ dest: 2, sync: true })
  );
}
