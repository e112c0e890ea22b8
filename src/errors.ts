/**
 * Errors raised by the store. Integrity failures and truncated reads are not
 * errors: lookups report them as `null`.
 */

export class LogStoreError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "LogStoreError";
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * A value outside {text, signed 64-bit integer, float64} was given to the
 * encoder, or a record carries a type tag this format does not define.
 */
export class UnsupportedTypeError extends LogStoreError {
  readonly type: string;

  constructor(type: string) {
    super(`Unsupported type: ${type}`);
    this.name = "UnsupportedTypeError";
    this.type = type;
  }
}

export class InvalidOptionsError extends LogStoreError {
  constructor(issues: string[]) {
    super(`Invalid options: ${issues.join("; ")}`);
    this.name = "InvalidOptionsError";
  }
}

export class StoreClosedError extends LogStoreError {
  constructor(path: string) {
    super(`Store is closed: ${path}`);
    this.name = "StoreClosedError";
  }
}

/** Name of a runtime value's type, as reported by `UnsupportedTypeError`. */
export function describeType(value: unknown): string {
  if (value === null) {
    return "null";
  }
  if (typeof value === "object") {
    return value.constructor?.name ?? "Object";
  }
  return typeof value;
}

/** Bad command-line arguments. */
export class UsageError extends LogStoreError {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}
