export {
  createFormController,
  DEFAULT_DEBOUNCE_MS,
  DEFAULT_HISTORY_LIMIT,
  DEFAULT_PERSIST_DEBOUNCE_MS,
} from "@lib/form-controller";
export type {
  BindFieldOptions,
  BulkUpdateOptions,
  FormController,
  FormControllerOptions,
  OptimisticUpdateOptions,
  ResetOptions,
  ResetStrategy,
  SetValueOptions,
  SubmitOptions,
  UnregisterOptions,
} from "@lib/form-controller";

export {
  arrayFieldId,
  fieldId,
  isSameField,
  itemId,
  localName,
  parentKey,
  withPrefix,
} from "@lib/field-id";
export type {
  AnyFieldId,
  ArrayFieldId,
  FieldId,
  FieldValue,
} from "@lib/field-id";

export { defineField, sameDefinition } from "@lib/field-definition";
export type {
  AnyFieldDefinition,
  AsyncValidator,
  CrossFieldValidator,
  FieldDefinition,
  FormView,
  InitialValueStrategy,
  SyncValidator,
  ValidationMode,
  ValidatorResult,
} from "@lib/field-definition";

export { ANY_TYPE, oneOfType } from "@lib/field-type";
export type {
  FieldType,
  FieldTypeClass,
  FieldTypeGuard,
  PrimitiveFieldType,
} from "@lib/field-type";

export {
  VALID,
  VALIDATING,
  fromMessage,
  invalid,
} from "@lib/validation-result";
export type { ValidationResult } from "@lib/validation-result";

export {
  EMPTY_SNAPSHOT,
  isGroupDirty,
  isGroupValid,
  readDirty,
  readPending,
  readTouched,
  readValidation,
  readValue,
  toNestedValues,
} from "@lib/form-snapshot";
export type { FormSnapshot } from "@lib/form-snapshot";

export {
  ValidationKeys,
  defaultMessages,
  formatMessage,
  resolveMessage,
  withParam,
} from "@lib/messages";
export type { FormMessages, ValidationKey } from "@lib/messages";

export { validators } from "@lib/validators";
export type {
  AnyValidatorChain,
  NumberValidatorChain,
  StringValidatorChain,
  ValidatorChain,
} from "@lib/validators";

export {
  FieldTypeError,
  UnknownFieldError,
  isFormConfigurationError,
} from "@lib/errors";
export type { FormConfigurationError } from "@lib/errors";

export { FIELD_NOT_REGISTERED, createBatch } from "@lib/batch";
export type { BulkUpdateResult, FormBatch } from "@lib/batch";

export { InMemoryFormPersistence } from "@lib/persistence";
export type { FormPersistence } from "@lib/persistence";

export { createConsoleAnalytics } from "@lib/analytics";
export type { ConsoleAnalyticsOptions, FormAnalytics } from "@lib/analytics";

export { createAsyncField } from "@lib/async-field";
export type {
  AsyncField,
  AsyncFieldFetcher,
  AsyncFieldOptions,
  AsyncFieldState,
  AsyncFieldStatus,
} from "@lib/async-field";

export { deepEqual, shallow } from "@lib/equality";
export type { SnapshotStream } from "@lib/store/snapshot-stream";
export type {
  DerivedSignal,
  ReadonlySignal,
  Unsubscribe,
} from "@lib/store/signals";

export {
  FormProvider,
  useAsyncField,
  useField,
  useFormContext,
  useFormController,
  useFormSelector,
  useFormSnapshot,
} from "@lib/react/form-hooks";
export type {
  FormSelectorOptions,
  UseAsyncFieldReturn,
  UseFieldReturn,
} from "@lib/react/form-hooks";
