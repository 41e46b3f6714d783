import {SeqkitError} from "./errors.js";

export type Json = string | number | boolean | null | undefined | Json[] | {[key: string]: Json};

// Log context is rendered one level deep, anything nested below is replaced by this marker
const NESTED_MARKER = "[object]";

function isNested(value: unknown): value is object {
  return typeof value === "object" && value !== null;
}

function leafToJson(value: unknown): Json {
  switch (typeof value) {
    case "string":
    case "number":
    case "boolean":
      return value;
    case "undefined":
      return undefined;
    case "object":
      return value === null ? "null" : NESTED_MARKER;
    default:
      // bigint, symbol, function
      return String(value);
  }
}

function leafToString(value: unknown): string {
  return isNested(value) ? NESTED_MARKER : String(value);
}

function errorToJson(error: Error): {[key: string]: Json} {
  const output: {[key: string]: Json} = {};
  if (error instanceof SeqkitError) {
    for (const [key, value] of Object.entries(error.getMetadata())) {
      output[key] = leafToJson(value);
    }
  } else {
    output.message = error.message;
  }
  if (error.stack) output.stack = error.stack;
  return output;
}

function entriesToString(value: object): string {
  return Object.entries(value)
    .map(([key, item]) => `${key}=${leafToString(item)}`)
    .join(", ");
}

/**
 * JSON rendering of a log context or error, for the json log format.
 * A SeqkitError renders as its metadata plus stack.
 */
export function logCtxToJson(value: unknown): Json {
  if (value instanceof Error) {
    return errorToJson(value);
  }
  if (Array.isArray(value)) {
    return value.map((item: unknown) => leafToJson(item));
  }
  if (isNested(value)) {
    const output: {[key: string]: Json} = {};
    for (const [key, item] of Object.entries(value)) {
      output[key] = leafToJson(item);
    }
    return output;
  }
  return leafToJson(value);
}

/**
 * `key=value, ...` rendering of a log context or error, for the human log format
 */
export function logCtxToString(value: unknown): string {
  if (value instanceof Error) {
    const head = value instanceof SeqkitError ? entriesToString(value.getMetadata()) : value.message;
    return `${head} ${value.stack ?? ""}`;
  }
  if (Array.isArray(value)) {
    return value.map((item: unknown) => leafToString(item)).join(", ");
  }
  if (isNested(value)) {
    return entriesToString(value);
  }
  return String(value);
}
