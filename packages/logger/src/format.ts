import winston, {format} from "winston";
import {SeqkitError, logCtxToJson, logCtxToString} from "@seqkit/utils";
import {LoggerOptions} from "./interface.js";

type Format = ReturnType<typeof winston.format.combine>;

type LogInfo = Record<string, unknown> & {level: string};

export function getFormat(opts: LoggerOptions): Format {
  const timestamp = opts.timestampFormat === "hidden" ? [] : [format.timestamp({format: "MMM-DD HH:mm:ss.SSS"})];

  if (opts.format === "json") {
    return format.combine(
      ...timestamp,
      format((info) => {
        info.context = logCtxToJson(info.context);
        info.error = logCtxToJson(info.error);
        return info;
      })(),
      format.json()
    );
  }

  return format.combine(...timestamp, format.colorize(), format.printf(formatHumanLine));
}

/**
 * `<timestamp> [module] level: message key=value, ...` followed by the error, if any
 */
export function formatHumanLine(info: LogInfo): string {
  const timestamp = typeof info.timestamp === "string" ? `${info.timestamp} ` : "";
  const module = typeof info.module === "string" && info.module !== "" ? `[${info.module}] ` : "";
  let line = `${timestamp}${module}${info.level}: ${String(info.message)}`;

  const context = info.context === undefined ? "" : logCtxToString(info.context);
  if (context !== "") line += ` ${context}`;

  if (info.error !== undefined) {
    // SeqkitError metadata reads as more context, other errors are set apart from the message
    const separator = info.error instanceof SeqkitError ? (context !== "" ? ", " : " ") : " - ";
    line += separator + logCtxToString(info.error);
  }

  return line;
}
