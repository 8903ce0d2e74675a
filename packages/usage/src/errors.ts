export type UsageErrorCode =
  | "missing_field"
  | "invalid_field"
  | "parse_error"
  | "invalid_usage_type"
  | "payload_too_large";

/** Base class for every error raised while mapping or batching usage data. */
export class UsageError extends Error {
  public readonly code: UsageErrorCode;

  constructor(message: string, code: UsageErrorCode, options?: ErrorOptions) {
    super(message, options);
    this.name = "UsageError";
    this.code = code;
  }
}

/** A required wire key is absent. `field` is the dotted path, e.g. `Records[2].Attributes.NodeCount`. */
export class MissingFieldError extends UsageError {
  public readonly field: string;

  constructor(field: string) {
    super(`Missing required field: ${field}`, "missing_field");
    this.name = "MissingFieldError";
    this.field = field;
  }
}

export class InvalidFieldError extends UsageError {
  public readonly field: string;

  constructor(field: string, expected: string) {
    super(`Invalid field ${field}: expected ${expected}`, "invalid_field");
    this.name = "InvalidFieldError";
    this.field = field;
  }
}

export class ParseError extends UsageError {
  constructor(message: string, options?: ErrorOptions) {
    super(`Invalid JSON: ${message}`, "parse_error", options);
    this.name = "ParseError";
  }
}

export class InvalidUsageTypeError extends UsageError {
  public readonly value: string;

  constructor(value: string) {
    super(`Invalid usage type: ${value}`, "invalid_usage_type");
    this.name = "InvalidUsageTypeError";
    this.value = value;
  }
}

/** A single record serializes larger than the payload ceiling on its own. */
export class PayloadTooLargeError extends UsageError {
  public readonly size: number;
  public readonly limit: number;

  constructor(size: number, limit: number) {
    super(`Payload of ${size} bytes exceeds limit of ${limit} bytes`, "payload_too_large");
    this.name = "PayloadTooLargeError";
    this.size = size;
    this.limit = limit;
  }
}
