/**
 * Diagnostic tracing for encrypt/decrypt.
 *
 * The codec is handed a TraceSink at construction; nothing here touches a
 * process-wide logger. A pino Logger satisfies TraceSink as-is.
 *
 * A sink that throws must not change the outcome of a price operation, so
 * emitTrace reports the failure as a process warning and carries on.
 */

export type TraceFields = Record<string, unknown>;

export interface TraceSink {
  debug(fields: TraceFields, message: string): void;
}

export const TRACE_WARNING_TYPE = "PriceTraceWarning";

/**
 * Send one trace event to the sink, if tracing is on for this call.
 * Fields are built only when the event is actually sent.
 */
export function emitTrace(
  sink: TraceSink | undefined,
  enabled: boolean,
  fields: () => TraceFields,
  message: string
): void {
  if (!enabled || !sink) {
    return;
  }

  try {
    sink.debug(fields(), message);
  } catch (err) {
    process.emitWarning(
      `trace sink failed on "${message}": ${err instanceof Error ? err.message : String(err)}`,
      TRACE_WARNING_TYPE
    );
  }
}
