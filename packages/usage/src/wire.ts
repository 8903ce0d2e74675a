import { formatError } from "@amie-usage/core";
import type { JsonValue } from "./types.js";
import { InvalidFieldError, MissingFieldError, ParseError } from "./errors.js";

export type WireObject = Record<string, unknown>;

export function joinPath(prefix: string, key: string): string {
  return prefix ? `${prefix}.${key}` : key;
}

export function isWireObject(value: unknown): value is WireObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Narrow `value` to a JSON object, naming `path` (or "input") if it is not one. */
export function expectObject(value: unknown, path: string): WireObject {
  if (!isWireObject(value)) {
    throw new InvalidFieldError(path || "input", "an object");
  }
  return value;
}

/**
 * Read a required key. Only an absent key is missing; any value present,
 * `null` included, is returned as received.
 */
export function readRequired(obj: WireObject, key: string, prefix: string): JsonValue {
  if (!(key in obj) || obj[key] === undefined) {
    throw new MissingFieldError(joinPath(prefix, key));
  }
  return expectJsonValue(obj[key], joinPath(prefix, key));
}

/** Read an optional key. `null` and absent both give `undefined`. */
export function readOptional(
  obj: WireObject,
  key: string,
  prefix: string,
): JsonValue | undefined {
  const value = obj[key];
  if (value === undefined || value === null) return undefined;
  return expectJsonValue(value, joinPath(prefix, key));
}

export function isJsonValue(value: unknown): value is JsonValue {
  switch (typeof value) {
    case "string":
    case "number":
    case "boolean":
      return true;
    case "object":
      if (value === null) return true;
      return Array.isArray(value)
        ? value.every(isJsonValue)
        : Object.values(value).every(isJsonValue);
    default:
      return false;
  }
}

// Anything JSON.parse produces passes; only values built in code
// (functions, bigints, undefined inside arrays) can fail here.
function expectJsonValue(value: unknown, path: string): JsonValue {
  if (!isJsonValue(value)) {
    throw new InvalidFieldError(path, "a JSON value");
  }
  return value;
}

export function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch (err) {
    throw new ParseError(formatError(err), { cause: err });
  }
}
