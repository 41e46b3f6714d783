import {LogLevel} from "@seqkit/utils";

/** Winston priority of each level, lower is more severe */
export const logLevelPriority: Record<LogLevel, number> = {
  [LogLevel.error]: 0,
  [LogLevel.warn]: 1,
  [LogLevel.info]: 2,
  [LogLevel.verbose]: 3,
  [LogLevel.debug]: 4,
};

export const logLevelColors: Record<LogLevel, string> = {
  [LogLevel.error]: "red",
  [LogLevel.warn]: "yellow",
  [LogLevel.info]: "green",
  [LogLevel.verbose]: "cyan",
  [LogLevel.debug]: "blue",
};

export type LogFormat = "human" | "json";
export const logFormats: readonly LogFormat[] = ["human", "json"];

/** `hidden` drops the timestamp, e.g. when the output is already timestamped by a collector */
export type TimestampFormat = "regular" | "hidden";
export const timestampFormats: readonly TimestampFormat[] = ["regular", "hidden"];

export type LoggerOptions = {
  /** Entries less severe than this level are dropped */
  level: LogLevel;
  /** Printed as `[module]` in human format, `module` field in json */
  module?: string;
  /** Defaults to "human" */
  format?: LogFormat;
  /** Defaults to "regular" */
  timestampFormat?: TimestampFormat;
};
