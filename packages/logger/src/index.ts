export {LogLevel} from "@seqkit/utils";
export type {Logger, LogData, LogHandler} from "@seqkit/utils";
export * from "./interface.js";
export * from "./winston.js";
export * from "./env.js";
export * from "./empty.js";
export {getFormat, formatHumanLine} from "./format.js";
