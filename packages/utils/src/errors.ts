export type SeqkitErrorMetaData = Record<string, string | number | boolean | null>;
export type SeqkitErrorObject = SeqkitErrorMetaData & {stack: string};

/**
 * Generic seqkit error with attached metadata
 */
export class SeqkitError<T extends {code: string}> extends Error {
  type: T;
  constructor(type: T, message?: string) {
    super(message || type.code);
    this.type = type;
  }

  getMetadata(): Record<string, string | number | boolean | null> {
    return this.type;
  }

  /**
   * Get the metadata and the stacktrace for the error.
   */
  toObject(): SeqkitErrorObject {
    return {
      // Ignore message since it's just type.code
      ...this.getMetadata(),
      stack: this.stack || "",
    };
  }
}

/**
 * Returns true if arg `e` is a SeqkitError carrying `code`
 */
export function isSeqkitErrorWithCode(e: unknown, code: string): e is SeqkitError<{code: string}> {
  return e instanceof SeqkitError && e.type.code === code;
}
