import {SeqkitError} from "@seqkit/utils";

export enum ListErrorCode {
  /** Index outside of `[0, length)` */
  INDEX_OUT_OF_RANGE = "LIST_ERROR_INDEX_OUT_OF_RANGE",
  NEGATIVE_LENGTH = "LIST_ERROR_NEGATIVE_LENGTH",
  /** Initial length is not an integer */
  INVALID_LENGTH = "LIST_ERROR_INVALID_LENGTH",
  /** peek() or pop() on a list without elements */
  EMPTY = "LIST_ERROR_EMPTY",
  SELF_APPEND = "LIST_ERROR_SELF_APPEND",
  /** Any operation on a list after destroy() */
  DESTROYED = "LIST_ERROR_DESTROYED",
}

export type ListErrorType =
  | {code: ListErrorCode.INDEX_OUT_OF_RANGE; index: number; length: number}
  | {code: ListErrorCode.NEGATIVE_LENGTH; length: number}
  | {code: ListErrorCode.INVALID_LENGTH; length: number}
  | {code: ListErrorCode.EMPTY; operation: string}
  | {code: ListErrorCode.SELF_APPEND}
  | {code: ListErrorCode.DESTROYED; operation: string};

/**
 * Contract violation by the caller of a List. Not meant to be caught in regular control flow.
 */
export class ListError extends SeqkitError<ListErrorType> {}
