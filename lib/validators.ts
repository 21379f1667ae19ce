import type { StandardSchemaV1 } from "@standard-schema/spec";
import type {
  AsyncValidator,
  SyncValidator,
  ValidatorResult,
} from "@lib/field-definition";
import { ValidationKeys, withParam } from "@lib/messages";
import { firstIssueMessage, standardValidate } from "@lib/standard-validate";

/**
 * @module validators
 *
 * Fluent, immutable validator chains. Each rule returns a new chain; `build()`
 * folds the sync rules into one validator (first error wins) and
 * `buildAsync()` runs the async rules only when the sync chain passes.
 *
 * Built-in rules emit validation keys rather than text. The controller turns
 * them into display strings through its current `FormMessages`, so passing a
 * `message` to a rule is only needed for one-off wording.
 *
 * @example
 * const username = validators
 *   .string()
 *   .required()
 *   .minLength(3)
 *   .async(checkAvailable);
 * defineField({ id, validator: username.build(), asyncValidator: username.buildAsync() });
 */

type AsyncRule<T> = AsyncValidator<T>;

type Rules<T> = {
  readonly sync: readonly SyncValidator<T>[];
  readonly async: readonly AsyncRule<T>[];
};

export type ValidatorChain<T, Self> = {
  /** `null`, `undefined` and blank strings fail. */
  required(message?: string): Self;
  oneOf(values: readonly T[], message?: string): Self;
  /** Runs a Standard Schema (zod, valibot…); the first issue is the error. */
  schema(schema: StandardSchemaV1, message?: string): Self;
  custom(validator: SyncValidator<T>): Self;
  async(validator: AsyncRule<T>): Self;
  build(): SyncValidator<T>;
  buildAsync(): AsyncValidator<T>;
};

export interface StringValidatorChain
  extends ValidatorChain<string, StringValidatorChain> {
  email(message?: string): StringValidatorChain;
  minLength(length: number, message?: string): StringValidatorChain;
  maxLength(length: number, message?: string): StringValidatorChain;
  pattern(regex: RegExp, message?: string): StringValidatorChain;
}

export interface NumberValidatorChain
  extends ValidatorChain<number, NumberValidatorChain> {
  min(min: number, message?: string): NumberValidatorChain;
  max(max: number, message?: string): NumberValidatorChain;
  /** Zero or greater. */
  positive(message?: string): NumberValidatorChain;
}

export interface AnyValidatorChain<T>
  extends ValidatorChain<T, AnyValidatorChain<T>> {}

const EMAIL_PATTERN = /^[\w.-]+@([\w-]+\.)+[\w-]{2,4}$/;

const NO_RULES = Object.freeze({ sync: [], async: [] });

function runSync<T>(
  rules: readonly SyncValidator<T>[],
  value: T | undefined,
): ValidatorResult {
  for (const rule of rules) {
    const error = rule(value);
    if (error) {
      return error;
    }
  }
  return null;
}

function chainMethods<T, Self>(
  rules: Rules<T>,
  next: (rules: Rules<T>) => Self,
): ValidatorChain<T, Self> {
  const add = (rule: SyncValidator<T>) =>
    next({ ...rules, sync: [...rules.sync, rule] });

  return {
    required: (message) =>
      add((value) => {
        if (value === null || value === undefined) {
          return message ?? ValidationKeys.required;
        }
        if (typeof value === "string" && value.trim().length === 0) {
          return message ?? ValidationKeys.required;
        }
        return null;
      }),
    oneOf: (values, message) =>
      add((value) => {
        if (value === null || value === undefined) {
          return null;
        }
        return values.includes(value)
          ? null
          : (message ?? ValidationKeys.invalidSelection);
      }),
    schema: (schema, message) =>
      add((value) => {
        const error = firstIssueMessage(standardValidate(schema, value));
        return error === null ? null : (message ?? error);
      }),
    custom: (validator) => add(validator),
    async: (validator) => next({ ...rules, async: [...rules.async, validator] }),
    build: () => (value) => runSync(rules.sync, value),
    buildAsync: () => async (value, context) => {
      if (runSync(rules.sync, value)) {
        return null;
      }
      for (const rule of rules.async) {
        const error = await rule(value, context);
        if (error) {
          return error;
        }
      }
      return null;
    },
  };
}

function stringChain(rules: Rules<string>): StringValidatorChain {
  const add = (rule: SyncValidator<string>) =>
    stringChain({ ...rules, sync: [...rules.sync, rule] });

  return {
    ...chainMethods(rules, stringChain),
    email: (message) =>
      add((value) => {
        if (!value) {
          return null;
        }
        return EMAIL_PATTERN.test(value)
          ? null
          : (message ?? ValidationKeys.invalidEmail);
      }),
    minLength: (length, message) =>
      add((value) => {
        if (!value || value.length >= length) {
          return null;
        }
        return message ?? withParam(ValidationKeys.minLength, length);
      }),
    maxLength: (length, message) =>
      add((value) => {
        if (!value || value.length <= length) {
          return null;
        }
        return message ?? withParam(ValidationKeys.maxLength, length);
      }),
    pattern: (regex, message) =>
      add((value) => {
        if (!value) {
          return null;
        }
        // reset lastIndex on global/sticky patterns
        regex.lastIndex = 0;
        return regex.test(value)
          ? null
          : (message ?? ValidationKeys.invalidFormat);
      }),
  };
}

function numberChain(rules: Rules<number>): NumberValidatorChain {
  const add = (rule: SyncValidator<number>) =>
    numberChain({ ...rules, sync: [...rules.sync, rule] });

  const min = (bound: number, message?: string) =>
    add((value) => {
      if (value === null || value === undefined || value >= bound) {
        return null;
      }
      return message ?? withParam(ValidationKeys.min, bound);
    });

  return {
    ...chainMethods(rules, numberChain),
    min,
    max: (bound, message) =>
      add((value) => {
        if (value === null || value === undefined || value <= bound) {
          return null;
        }
        return message ?? withParam(ValidationKeys.max, bound);
      }),
    positive: (message) => min(0, message),
  };
}

function anyChain<T>(rules: Rules<T>): AnyValidatorChain<T> {
  return chainMethods<T, AnyValidatorChain<T>>(rules, anyChain);
}

export const validators = {
  string: (): StringValidatorChain => stringChain(NO_RULES),
  number: (): NumberValidatorChain => numberChain(NO_RULES),
  any: <T>(): AnyValidatorChain<T> => anyChain<T>(NO_RULES),
};
