/**
 * Raised when a value's runtime type does not match the type recorded for
 * its field.
 */
export class FieldTypeError extends TypeError {
  readonly key: string;
  readonly expected: string;
  readonly received: string;

  constructor(key: string, expected: string, received: string) {
    super(
      `Field "${key}" expects a value of type ${expected}, received ${received}`,
    );
    this.name = "FieldTypeError";
    this.key = key;
    this.expected = expected;
    this.received = received;
  }
}

/** Raised when an operation addresses a field that is not registered. */
export class UnknownFieldError extends Error {
  readonly key: string;

  constructor(key: string) {
    super(`Field "${key}" is not registered`);
    this.name = "UnknownFieldError";
    this.key = key;
  }
}

export type FormConfigurationError = FieldTypeError | UnknownFieldError;

export function isFormConfigurationError(
  error: unknown,
): error is FormConfigurationError {
  return error instanceof FieldTypeError || error instanceof UnknownFieldError;
}

/** Throws when `condition` is falsy. Guards internal states. */
export function invariant(
  condition: unknown,
  message: string,
): asserts condition {
  if (!condition) {
    throw new Error(message);
  }
}

/** `Error` message, or the stringified value for anything else thrown. */
export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
