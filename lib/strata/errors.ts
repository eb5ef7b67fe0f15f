// errors.ts
//
// Error taxonomy. Lookups that miss are an expected outcome, so the core
// returns `undefined` or an empty list; the `try*` accessors surface the
// same outcome as a `NotFoundError` value, and only the `must*` accessors
// throw.

export type StrataErrorCode =
  | "NOT_FOUND"
  | "CONVERSION"
  | "MISSING_KEY"
  | "LOAD";

export class StrataError extends Error {
  readonly code: StrataErrorCode;

  constructor(
    code: StrataErrorCode,
    message: string,
    options?: { readonly cause?: unknown },
  ) {
    super(message, options);
    this.name = "StrataError";
    this.code = code;
  }
}

export class NotFoundError extends StrataError {
  readonly keys: readonly string[];

  constructor(keys: readonly string[]) {
    super("NOT_FOUND", "node not found");
    this.name = "NotFoundError";
    this.keys = keys;
  }
}

export class ConversionError extends StrataError {
  readonly value: unknown;
  readonly target: string;

  constructor(target: string, value: unknown, detail?: string) {
    super(
      "CONVERSION",
      detail ?? `cannot convert ${JSON.stringify(String(value))} to ${target}`,
    );
    this.name = "ConversionError";
    this.value = value;
    this.target = target;
  }
}

/** Raised by the `must*` accessors when a required key cannot be read. */
export class MissingKeyError extends StrataError {
  readonly keys: readonly string[];

  constructor(keys: readonly string[], cause: Error) {
    super("MISSING_KEY", `Required conf key ${keys.join(".")}: ${cause.message}`, {
      cause,
    });
    this.name = "MissingKeyError";
    this.keys = keys;
  }
}

export class LoadError extends StrataError {
  readonly file?: string;
  readonly line?: number;

  constructor(
    message: string,
    where?: { readonly file?: string; readonly line?: number },
    cause?: unknown,
  ) {
    super("LOAD", message, { cause });
    this.name = "LoadError";
    this.file = where?.file;
    this.line = where?.line;
  }
}

export function isStrataError(value: unknown): value is StrataError {
  return value instanceof StrataError;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
