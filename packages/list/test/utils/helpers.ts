import {vi} from "vitest";
import {Logger} from "@seqkit/utils";
import {ListError} from "../../src/index.js";

/**
 * Run `fn` and return the ListError it throws, rethrow anything else
 */
export function catchListError(fn: () => unknown): ListError {
  try {
    fn();
  } catch (e) {
    if (e instanceof ListError) return e;
    throw e;
  }
  throw Error("Expected a ListError to be thrown");
}

export type StubLogger = {[K in keyof Logger]: ReturnType<typeof vi.fn>};

export function getStubLogger(): StubLogger {
  return {
    error: vi.fn(),
    warn: vi.fn(),
    info: vi.fn(),
    verbose: vi.fn(),
    debug: vi.fn(),
  };
}
