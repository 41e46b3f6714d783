/**
 * Severity of a log entry, most severe first
 */
export enum LogLevel {
  error = "error",
  warn = "warn",
  info = "info",
  verbose = "verbose",
  debug = "debug",
}

export const LogLevels: readonly LogLevel[] = Object.values(LogLevel);

/** A single context value, rendered as is. Nested objects are rendered as a marker */
export type LogValue = string | number | bigint | boolean | null | undefined;
export type LogData = Record<string, LogValue> | LogValue[];

export type LogHandler = (message: string, context?: LogData, error?: Error) => void;

/**
 * Sink for the diagnostics of seqkit containers. `@seqkit/logger` provides the winston and no-op implementations
 */
export type Logger = {[L in LogLevel]: LogHandler};
