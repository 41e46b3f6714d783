import {Logger, LogLevel, LogLevels} from "@seqkit/utils";
import {getEmptyLogger} from "./empty.js";
import {LogFormat, logFormats, LoggerOptions, TimestampFormat, timestampFormats} from "./interface.js";
import {WinstonLogger} from "./winston.js";

function oneOf<T extends string>(values: readonly T[], value: string | undefined): T | undefined {
  return values.find((candidate) => candidate === value);
}

/**
 * `LOG_LEVEL` if it names a level, else `debug` if `DEBUG` is set, else `verbose` if `VERBOSE` is set
 */
export function getEnvLogLevel(): LogLevel | null {
  const level = oneOf(LogLevels, process.env.LOG_LEVEL);
  if (level !== undefined) return level;
  if (process.env.DEBUG) return LogLevel.debug;
  if (process.env.VERBOSE) return LogLevel.verbose;
  return null;
}

export function getEnvLogFormat(): LogFormat | undefined {
  return oneOf(logFormats, process.env.LOG_FORMAT);
}

export function getEnvTimestampFormat(): TimestampFormat | undefined {
  return oneOf(timestampFormats, process.env.LOG_TIMESTAMP_FORMAT);
}

/**
 * Console logger configured from `LOG_LEVEL`, `DEBUG`, `VERBOSE`, `LOG_FORMAT` and `LOG_TIMESTAMP_FORMAT`,
 * `opts` take precedence. Without any level the returned logger drops everything.
 */
export function getEnvLogger(opts: Partial<LoggerOptions> = {}): Logger {
  const level = opts.level ?? getEnvLogLevel();
  if (level === null) {
    return getEmptyLogger();
  }
  return WinstonLogger.create({
    ...opts,
    level,
    format: opts.format ?? getEnvLogFormat(),
    timestampFormat: opts.timestampFormat ?? getEnvTimestampFormat(),
  });
}
