import {Logger} from "@seqkit/utils";

const discard = (): void => {};

/**
 * Logger dropping every entry, used where no log level is configured
 */
export function getEmptyLogger(): Logger {
  return {error: discard, warn: discard, info: discard, verbose: discard, debug: discard};
}
