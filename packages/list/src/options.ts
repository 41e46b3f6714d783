import {Logger, randBetween} from "@seqkit/utils";
import {getEnvLogger} from "@seqkit/logger";
import {Destructor} from "@seqkit/sorted-set";

/**
 * Uniform integer in `[min, max)`, upper bound excluded
 */
export type RandomIntFn = (min: number, max: number) => number;

export type ListOptions<T> = {
  /** Invoked once per non-null element on `destroy()` */
  destructor?: Destructor<T> | null;
  logger?: Logger;
  /** Random source for `shuffle()` */
  random?: RandomIntFn;
};

export const defaultListOptions = {
  random: randBetween,
  loggerModule: "list",
};

let defaultLogger: Logger | null = null;

/**
 * Logger shared by lists created without one, configured from the environment (`LOG_LEVEL`, `LOG_FORMAT`, ...)
 */
export function getDefaultListLogger(): Logger {
  if (defaultLogger === null) {
    defaultLogger = getEnvLogger({module: defaultListOptions.loggerModule});
  }
  return defaultLogger;
}
