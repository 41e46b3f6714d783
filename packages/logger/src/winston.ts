import winston from "winston";
import type {Logger as Winston} from "winston";
import {LogData, Logger, LogLevel} from "@seqkit/utils";
import {getFormat} from "./format.js";
import {LoggerOptions, logLevelColors, logLevelPriority} from "./interface.js";

winston.addColors(logLevelColors);

/**
 * Logger backed by a winston instance with a single level. Entries less severe than the level are
 * dropped before they are formatted.
 */
export class WinstonLogger implements Logger {
  private constructor(
    private readonly instance: Winston,
    readonly options: Readonly<LoggerOptions>
  ) {}

  /**
   * Logger writing to `transports`, the process console if none are given
   */
  static create(options: LoggerOptions, transports?: winston.transport[]): WinstonLogger {
    const instance = winston.createLogger({
      level: options.level,
      levels: logLevelPriority,
      defaultMeta: {module: options.module ?? ""},
      format: getFormat(options),
      transports: transports ?? [new winston.transports.Console()],
      exitOnError: false,
    });
    return new WinstonLogger(instance, options);
  }

  error(message: string, context?: LogData, error?: Error): void {
    this.write(LogLevel.error, message, context, error);
  }

  warn(message: string, context?: LogData, error?: Error): void {
    this.write(LogLevel.warn, message, context, error);
  }

  info(message: string, context?: LogData, error?: Error): void {
    this.write(LogLevel.info, message, context, error);
  }

  verbose(message: string, context?: LogData, error?: Error): void {
    this.write(LogLevel.verbose, message, context, error);
  }

  debug(message: string, context?: LogData, error?: Error): void {
    this.write(LogLevel.debug, message, context, error);
  }

  private write(level: LogLevel, message: string, context?: LogData, error?: Error): void {
    // A single object argument bypasses winston's splat handling, formats read context and error from it
    this.instance.log(level, {message, context, error});
  }
}
