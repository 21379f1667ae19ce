import type { StandardSchemaV1 } from "@standard-schema/spec";
import { deepEqual } from "@lib/equality";
import type { AnyFieldId, FieldId } from "@lib/field-id";
import type { FieldType } from "@lib/field-type";
import type { ValidationResult } from "@lib/validation-result";

export type ValidationMode =
  | "always"
  | "onBlur"
  | "onUserInteraction"
  | "disabled";

/**
 * How a field reacts to a new initial value arriving after registration.
 *
 * - `preferLocal`: record the new baseline; adopt it as the live value while
 *   the field is pristine.
 * - `preferGlobal`: keep whatever the field started with.
 */
export type InitialValueStrategy = "preferLocal" | "preferGlobal";

/**
 * Read access to form state from inside validators and derivations. Sees the
 * state of the operation in progress, not only the last published snapshot.
 */
export type FormView = {
  readonly values: ReadonlyMap<string, unknown>;
  readonly validations: ReadonlyMap<string, ValidationResult>;
  readonly dirty: ReadonlyMap<string, boolean>;
  readonly touched: ReadonlyMap<string, boolean>;
  getValue<U>(id: FieldId<U>): U | undefined;
  getValidation(id: AnyFieldId): ValidationResult;
  isDirty(id: AnyFieldId): boolean;
  isTouched(id: AnyFieldId): boolean;
};

/** `null`, `undefined` or `""` mean valid; anything else is the error. */
export type ValidatorResult = string | null | undefined;

export type SyncValidator<T> = (value: T | undefined) => ValidatorResult;

export type AsyncValidator<T> = (
  value: T | undefined,
  context: { signal: AbortSignal },
) => Promise<ValidatorResult>;

export type CrossFieldValidator<T> = (
  value: T | undefined,
  form: FormView,
) => ValidatorResult;

/**
 * Static configuration of one field.
 *
 * @example
 * const email = fieldId<string>("email");
 * const emailField = defineField({
 *   id: email,
 *   initialValue: "",
 *   validator: validators.string().required().email().build(),
 *   asyncValidator: checkEmailAvailable,
 * });
 */
export type FieldDefinition<T> = {
  readonly id: FieldId<T>;
  readonly initialValue?: T;
  /** Runtime type tag; inferred from `initialValue` when absent. */
  readonly type?: FieldType;
  readonly validator?: SyncValidator<T>;
  /** Standard Schema run synchronously after `validator`. */
  readonly schema?: StandardSchemaV1;
  readonly asyncValidator?: AsyncValidator<T>;
  readonly debounceMs?: number;
  /** Fields whose changes re-validate (or re-derive) this one. */
  readonly dependsOn?: readonly AnyFieldId[];
  readonly crossFieldValidator?: CrossFieldValidator<T>;
  /** Applied to every incoming value before it is stored. */
  readonly transformer?: (value: T) => T;
  /** Recomputes the value when a `dependsOn` field changes. */
  readonly derive?: (form: FormView) => T | undefined;
  readonly validationMode?: ValidationMode;
  readonly initialValueStrategy?: InitialValueStrategy;
  /** Substituted for `{label}` in messages; defaults to the key. */
  readonly label?: string;
  /** Value the `clear` reset strategy writes. */
  readonly emptyValue?: T;
};

/**
 * Type-erased definition the controller stores. Method signatures keep every
 * `FieldDefinition<T>` assignable here.
 */
export type AnyFieldDefinition = {
  readonly id: AnyFieldId;
  readonly initialValue?: unknown;
  readonly type?: FieldType;
  validator?(value: unknown): ValidatorResult;
  readonly schema?: StandardSchemaV1;
  asyncValidator?(
    value: unknown,
    context: { signal: AbortSignal },
  ): Promise<ValidatorResult>;
  readonly debounceMs?: number;
  readonly dependsOn?: readonly AnyFieldId[];
  crossFieldValidator?(value: unknown, form: FormView): ValidatorResult;
  transformer?(value: unknown): unknown;
  derive?(form: FormView): unknown;
  readonly validationMode?: ValidationMode;
  readonly initialValueStrategy?: InitialValueStrategy;
  readonly label?: string;
  readonly emptyValue?: unknown;
};

export function defineField<T>(
  definition: FieldDefinition<T>,
): FieldDefinition<T> {
  return Object.freeze({ ...definition });
}

function sameKeys(
  a: readonly AnyFieldId[] | undefined,
  b: readonly AnyFieldId[] | undefined,
) {
  const aKeys = (a ?? []).map((id) => id.key);
  const bKeys = (b ?? []).map((id) => id.key);
  return deepEqual(aKeys, bKeys);
}

/**
 * Equal configuration: same key, same dependency keys, deep-equal values and
 * identical function references. Re-registering an equal definition is a
 * no-op.
 */
export function sameDefinition(
  a: AnyFieldDefinition,
  b: AnyFieldDefinition,
): boolean {
  if (a === b) {
    return true;
  }
  return (
    a.id.key === b.id.key &&
    deepEqual(a.initialValue, b.initialValue) &&
    deepEqual(a.emptyValue, b.emptyValue) &&
    a.type === b.type &&
    a.validator === b.validator &&
    a.schema === b.schema &&
    a.asyncValidator === b.asyncValidator &&
    a.debounceMs === b.debounceMs &&
    sameKeys(a.dependsOn, b.dependsOn) &&
    a.crossFieldValidator === b.crossFieldValidator &&
    a.transformer === b.transformer &&
    a.derive === b.derive &&
    a.validationMode === b.validationMode &&
    a.initialValueStrategy === b.initialValueStrategy &&
    a.label === b.label
  );
}
