/**
 * Outcome of validating one field.
 *
 * - valid: `isValid` true, `errorMessage` null
 * - invalid: `isValid` false, `errorMessage` set
 * - validating: an async validator is in flight; `isValid` reflects the
 *   last sync result
 */
export type ValidationResult = {
  readonly isValid: boolean;
  readonly errorMessage: string | null;
  readonly isValidating: boolean;
};

export const VALID: ValidationResult = Object.freeze({
  isValid: true,
  errorMessage: null,
  isValidating: false,
});

export const VALIDATING: ValidationResult = Object.freeze({
  isValid: true,
  errorMessage: null,
  isValidating: true,
});

export function invalid(errorMessage: string): ValidationResult {
  return Object.freeze({ isValid: false, errorMessage, isValidating: false });
}

/** `null`/`undefined`/empty string from a validator mean "valid". */
export function fromMessage(
  message: string | null | undefined,
): ValidationResult {
  return message ? invalid(message) : VALID;
}

export function withValidating(
  result: ValidationResult,
  isValidating: boolean,
): ValidationResult {
  if (result.isValidating === isValidating) {
    return result;
  }
  if (result.isValid) {
    return isValidating ? VALIDATING : VALID;
  }
  return Object.freeze({ ...result, isValidating });
}

export function sameValidation(
  a: ValidationResult,
  b: ValidationResult,
): boolean {
  return (
    a === b ||
    (a.isValid === b.isValid &&
      a.errorMessage === b.errorMessage &&
      a.isValidating === b.isValidating)
  );
}
