import type { FormAnalytics } from "@lib/analytics";
import {
  createBulkUpdateResult,
  type BulkUpdateResult,
  type FormBatch,
} from "@lib/batch";
import { deepEqual } from "@lib/equality";
import {
  FieldTypeError,
  UnknownFieldError,
  describeError,
  invariant,
} from "@lib/errors";
import {
  sameDefinition,
  type AnyFieldDefinition,
  type FieldDefinition,
  type FormView,
  type ValidationMode,
} from "@lib/field-definition";
import type { AnyFieldId, ArrayFieldId, FieldId } from "@lib/field-id";
import {
  acceptsValue,
  describeFieldType,
  describeValueType,
  inferFieldType,
  type FieldType,
} from "@lib/field-type";
import {
  EMPTY_SNAPSHOT,
  createSnapshot,
  isGroupDirty,
  isGroupValid,
  readDirty,
  readFieldValue,
  readPending,
  readTouched,
  readValidation,
  readValue,
  toNestedValues,
  validationsToRecord,
  valuesToRecord,
  type FormSnapshot,
  type SnapshotParts,
} from "@lib/form-snapshot";
import { defaultMessages, resolveMessage, type FormMessages } from "@lib/messages";
import {
  normalizeDelayMs,
  normalizeLimit,
  normalizeStep,
} from "@lib/normalize-number";
import type { FormPersistence } from "@lib/persistence";
import { firstIssueMessage, standardValidate } from "@lib/standard-validate";
import {
  createSnapshotStream,
  type SnapshotStream,
} from "@lib/store/snapshot-stream";
import {
  derived,
  signal,
  type DerivedSignal,
  type Unsubscribe,
} from "@lib/store/signals";
import {
  VALID,
  VALIDATING,
  invalid,
  sameValidation,
  withValidating,
  type ValidationResult,
} from "@lib/validation-result";
import { createValueHistory } from "@lib/value-history";

export const DEFAULT_DEBOUNCE_MS = 300;
export const DEFAULT_HISTORY_LIMIT = 50;
export const DEFAULT_PERSIST_DEBOUNCE_MS = 300;

// =====================================
// Public types
// =====================================

export type FormControllerOptions = {
  fields?: readonly AnyFieldDefinition[];
  /** Key → initial value; overrides the definitions' `initialValue`. */
  initialValues?: Readonly<Record<string, unknown>>;
  /** Default for fields without their own `validationMode`. */
  validationMode?: ValidationMode;
  /** Async validation debounce for fields without their own `debounceMs`. */
  debounceMs?: number;
  historyLimit?: number;
  messages?: FormMessages;
  persistence?: FormPersistence;
  /** Storage key for `persistence`; nothing is persisted without it. */
  formId?: string;
  persistDebounceMs?: number;
  analytics?: FormAnalytics;
  /** Called with the first invalid key when a submit fails validation. */
  onFocusInvalid?: (key: string) => void;
};

export type SetValueOptions = { markTouched?: boolean };

export type BulkUpdateOptions = {
  /** Throw on the first unknown key or type mismatch and apply nothing. */
  strict?: boolean;
};

export type ResetStrategy = "initialValues" | "clear";

export type ResetOptions = {
  strategy?: ResetStrategy;
  /** Mark every field valid and cancel in-flight async validation. */
  clearErrors?: boolean;
};

export type UnregisterOptions = {
  /** Keep value, dirty and touched so a later registration resumes them. */
  preserveState?: boolean;
};

export type OptimisticUpdateOptions<T, R> = {
  id: FieldId<T>;
  value: T;
  action: () => Promise<R>;
  /** Restore the previous value when `action` rejects. Defaults to `true`. */
  revertOnError?: boolean;
};

export type SubmitOptions = {
  onValid: (values: Record<string, unknown>) => unknown;
  onError?: (validations: Record<string, ValidationResult>) => void;
  /** Defaults to `true`. */
  autoFocusOnInvalid?: boolean;
  /** Ignore calls that start within this window of the last accepted one. */
  throttleMs?: number;
  /** Collapse calls within this window; the last one runs. */
  debounceMs?: number;
  /** Treat the current values as saved before waiting on validation. */
  optimistic?: boolean;
  /** Restore the pre-submit baseline when `onValid` fails. */
  revertOnError?: boolean;
  /** Wait for pending fields and async validation. Defaults to `true`. */
  waitForPending?: boolean;
};

export type BindFieldOptions = {
  /** Also write target changes back to the source. */
  twoWay?: boolean;
};

export type FormController = {
  /** Resolves once persisted values have been loaded. */
  readonly ready: Promise<void>;
  readonly stream: SnapshotStream<FormSnapshot>;
  readonly messages: FormMessages;
  readonly canUndo: boolean;
  readonly canRedo: boolean;
  readonly isDisposed: boolean;

  // -- reading
  getSnapshot(): FormSnapshot;
  subscribe(listener: () => void): Unsubscribe;
  addListener(listener: (snapshot: FormSnapshot) => void): Unsubscribe;
  select<S>(
    selector: (snapshot: FormSnapshot) => S,
    equals?: (a: S, b: S) => boolean,
  ): DerivedSignal<S>;
  getValue<T>(id: FieldId<T>): T | undefined;
  getInitialValue<T>(id: FieldId<T>): T | undefined;
  getValues(): Record<string, unknown>;
  getNestedValues(): Record<string, unknown>;
  getValidation(id: AnyFieldId): ValidationResult;
  isFieldRegistered(id: AnyFieldId): boolean;
  isFieldDirty(id: AnyFieldId): boolean;
  isFieldTouched(id: AnyFieldId): boolean;
  isFieldPending(id: AnyFieldId): boolean;
  isGroupValid(prefix: string): boolean;
  isGroupDirty(prefix: string): boolean;
  getDefinition(id: AnyFieldId): AnyFieldDefinition | undefined;

  // -- registry
  register<T>(definition: FieldDefinition<T>): void;
  registerAll(definitions: readonly AnyFieldDefinition[]): void;
  unregister(id: AnyFieldId, options?: UnregisterOptions): void;

  // -- mutation
  setValue<T>(id: FieldId<T>, value: T | undefined, options?: SetValueOptions): void;
  setValues(
    values: Readonly<Record<string, unknown>>,
    options?: BulkUpdateOptions,
  ): BulkUpdateResult;
  applyBatch(batch: FormBatch, options?: BulkUpdateOptions): BulkUpdateResult;
  optimisticUpdate<T, R>(options: OptimisticUpdateOptions<T, R>): Promise<R>;
  updateInitialValue<T>(id: FieldId<T>, value: T | undefined): void;
  addArrayItem<T>(id: ArrayFieldId<T>, item: T): void;
  removeArrayItemAt<T>(id: ArrayFieldId<T>, index: number): void;
  replaceArrayItem<T>(id: ArrayFieldId<T>, index: number, item: T): void;
  moveArrayItem<T>(id: ArrayFieldId<T>, from: number, to: number): void;
  clearArray<T>(id: ArrayFieldId<T>): void;
  setPending(id: AnyFieldId, isPending: boolean): void;
  setFieldError(id: AnyFieldId, message: string | null): void;
  setFieldValidating(id: AnyFieldId, isValidating: boolean): void;
  markAsTouched(id: AnyFieldId): void;

  // -- validation and steps
  validate(ids?: readonly AnyFieldId[]): boolean;
  validateStep(ids: readonly AnyFieldId[]): boolean;
  goToStep(step: number): void;
  nextStep(ids?: readonly AnyFieldId[]): boolean;
  previousStep(): void;

  // -- reset
  reset(options?: ResetOptions): void;
  resetFields(
    ids: readonly AnyFieldId[],
    options?: Pick<ResetOptions, "strategy">,
  ): void;
  resetToValues(values: Readonly<Record<string, unknown>>): void;

  // -- history
  undo(): void;
  redo(): void;
  clearHistory(): void;

  // -- submission
  submit(options: SubmitOptions): Promise<void>;
  /** Calls `onFocusInvalid` for the first invalid field and returns its key. */
  focusFirstError(): string | null;

  setMessages(messages: FormMessages): void;
  bindField<T>(
    target: FieldId<T>,
    source: FormController,
    sourceField: FieldId<T>,
    options?: BindFieldOptions,
  ): Unsubscribe;
  dispose(): void;
};

// =====================================
// Internal types and helpers
// =====================================

type Draft = {
  values: Map<string, unknown>;
  validations: Map<string, ValidationResult>;
  dirty: Map<string, boolean>;
  touched: Map<string, boolean>;
  pending: Map<string, boolean>;
  isSubmitting: boolean;
  changedFields: Set<string>;
  historyCursor: number;
  currentStep: number;
  resetCount: number;
  submitCount: number;
};

type FlagName = "dirty" | "touched" | "pending";

type Counter = "historyCursor" | "currentStep" | "resetCount" | "submitCount";

/** How a root transaction's value changes reach the undo history. */
type HistoryMode = "record" | "rebase" | "skip";

type Trigger = "register" | "change" | "dependency" | "touch";

type AsyncStart = "none" | "debounced" | "immediate";

type AsyncRun = {
  value: unknown;
  generation: number;
  timeoutId?: ReturnType<typeof setTimeout>;
  abortController?: AbortController;
};

type DebouncedSubmit = {
  timeoutId: ReturnType<typeof setTimeout>;
  options: SubmitOptions;
  waiters: { resolve: () => void; reject: (error: unknown) => void }[];
};

function toDraft(parts: SnapshotParts): Draft {
  return {
    values: new Map(parts.values),
    validations: new Map(parts.validations),
    dirty: new Map(parts.dirty),
    touched: new Map(parts.touched),
    pending: new Map(parts.pending),
    isSubmitting: parts.isSubmitting,
    changedFields: new Set(parts.changedFields),
    historyCursor: parts.historyCursor,
    currentStep: parts.currentStep,
    resetCount: parts.resetCount,
    submitCount: parts.submitCount,
  };
}

function defaultEmptyValue(type: FieldType): unknown {
  switch (type) {
    case "string": {
      return "";
    }
    case "number": {
      return 0;
    }
    case "boolean": {
      return false;
    }
    case "array": {
      return [];
    }
    default: {
      return undefined;
    }
  }
}

// =====================================
// Controller
// =====================================

export function createFormController(
  options: FormControllerOptions = {},
): FormController {
  const {
    persistence,
    formId,
    analytics,
    onFocusInvalid,
    validationMode: defaultMode = "always",
  } = options;
  const defaultDebounceMs = normalizeDelayMs(
    options.debounceMs,
    DEFAULT_DEBOUNCE_MS,
  );
  const persistDebounceMs = normalizeDelayMs(
    options.persistDebounceMs,
    DEFAULT_PERSIST_DEBOUNCE_MS,
  );
  const globalInitialValues = new Map(
    Object.entries(options.initialValues ?? {}),
  );
  let messages = options.messages ?? defaultMessages;

  // -- Registry and per-field bookkeeping
  const definitions = new Map<string, AnyFieldDefinition>();
  const fieldTypes = new Map<string, FieldType>();
  const initialValues = new Map<string, unknown>();
  const dependents = new Map<string, Set<string>>();
  const asyncRuns = new Map<string, AsyncRun>();
  const validationIds = new Map<string, number>();
  const settledAsync = new Map<
    string,
    { value: unknown; result: ValidationResult }
  >();
  // persisted values for keys that are not registered yet
  const restoredValues = new Map<string, unknown>();
  const bindings = new Set<Unsubscribe>();

  const history = createValueHistory(
    new Map(),
    normalizeLimit(options.historyLimit, DEFAULT_HISTORY_LIMIT),
  );

  const state = signal<FormSnapshot>(EMPTY_SNAPSHOT);
  const stream = createSnapshotStream(state, reportListenerError);

  let draft: Draft | null = null;
  let notifying = false;
  let disposed = false;
  let submittedSuccessfully = false;
  let lastSubmitStartedAt: number | null = null;
  let debouncedSubmit: DebouncedSubmit | null = null;
  let persistTimeoutId: ReturnType<typeof setTimeout> | undefined;
  const startedAt = Date.now();
  // analytics events wait here until the snapshot they describe is published
  const analyticsQueue: ((hooks: FormAnalytics) => void)[] = [];
  let markDisposed = () => {};
  const disposal = new Promise<void>((resolve) => {
    markDisposed = resolve;
  });

  const tx = {
    depth: 0,
    history: "record" as HistoryMode,
    valueKeys: new Set<string>(),
  };

  function reportListenerError(error: unknown) {
    console.error("Form listener threw during notification", error);
  }

  function track(event: (hooks: FormAnalytics) => void) {
    if (analytics) {
      analyticsQueue.push(event);
    }
  }

  function report(event: (hooks: FormAnalytics) => void) {
    track(event);
    flushAnalytics();
  }

  function flushAnalytics() {
    if (!analytics || tx.depth > 0 || notifying) {
      return;
    }
    for (const event of analyticsQueue.splice(0)) {
      try {
        event(analytics);
      } catch (error) {
        console.error("Form analytics hook threw", error);
      }
    }
  }

  // -- Draft access
  function read(): SnapshotParts {
    return draft ?? state.peekValue();
  }

  function write(): Draft {
    draft ??= toDraft({ ...state.peekValue(), changedFields: new Set() });
    return draft;
  }

  function writeValue(key: string, value: unknown) {
    const parts = write();
    parts.values.set(key, value);
    parts.changedFields.add(key);
    tx.valueKeys.add(key);
    writeFlag("dirty", key, !deepEqual(value, initialValues.get(key)));
  }

  function writeValidation(key: string, result: ValidationResult) {
    const current = read().validations.get(key);
    if (current && sameValidation(current, result)) {
      return;
    }
    write().validations.set(key, result);
  }

  function writeFlag(name: FlagName, key: string, flag: boolean) {
    if (read()[name].get(key) === flag) {
      return;
    }
    write()[name].set(key, flag);
  }

  function writeCounter(name: Counter, value: number) {
    if (read()[name] === value) {
      return;
    }
    write()[name] = value;
  }

  function writeSubmitting(isSubmitting: boolean) {
    if (read().isSubmitting === isSubmitting) {
      return;
    }
    write().isSubmitting = isSubmitting;
  }

  function removeKey(key: string, keepValue: boolean) {
    const parts = read();
    const present =
      parts.validations.has(key) ||
      parts.pending.has(key) ||
      (!keepValue &&
        (parts.values.has(key) ||
          parts.dirty.has(key) ||
          parts.touched.has(key)));
    if (!present) {
      return;
    }
    const next = write();
    next.validations.delete(key);
    next.pending.delete(key);
    if (!keepValue) {
      next.values.delete(key);
      next.dirty.delete(key);
      next.touched.delete(key);
    }
  }

  function createView(parts: SnapshotParts): FormView {
    const { values, validations, dirty, touched } = parts;
    return {
      values,
      validations,
      dirty,
      touched,
      getValue: (id) => readFieldValue(values, id),
      getValidation: (id) => validations.get(id.key) ?? VALID,
      isDirty: (id) => dirty.get(id.key) ?? false,
      isTouched: (id) => touched.get(id.key) ?? false,
    };
  }

  // -- Transactions
  function transaction(fn: () => void, historyMode: HistoryMode = "record") {
    if (disposed) {
      return;
    }
    const isRoot = tx.depth === 0;
    // a draft left by a mutation queued during notification is the base
    const base = isRoot ? draft : null;
    const queued = analyticsQueue.length;
    if (isRoot) {
      tx.history = historyMode;
      tx.valueKeys = new Set();
      if (base) {
        draft = toDraft(base);
      }
    }
    tx.depth += 1;
    let completed = false;
    try {
      fn();
      completed = true;
    } finally {
      tx.depth -= 1;
      if (tx.depth === 0) {
        if (completed) {
          commit();
          flushAnalytics();
        } else {
          draft = base;
          analyticsQueue.length = queued;
        }
      }
    }
  }

  function commit() {
    if (!draft) {
      return;
    }
    if (tx.valueKeys.size > 0) {
      const values: ReadonlyMap<string, unknown> = new Map(draft.values);
      switch (tx.history) {
        case "record": {
          history.record(values);
          schedulePersist();
          for (const key of tx.valueKeys) {
            const value = values.get(key);
            track((hooks) => hooks.onFieldChanged?.(formId, key, value));
          }
          break;
        }
        case "rebase": {
          history.replaceCurrent(values);
          break;
        }
        case "skip": {
          break;
        }
      }
    }
    draft.historyCursor = history.cursor;
    if (notifying) {
      // published by the notification pass in progress
      return;
    }
    publish();
  }

  function publish() {
    while (draft) {
      const next = createSnapshot(draft);
      draft = null;
      notifying = true;
      try {
        state.setValue(next);
      } finally {
        notifying = false;
      }
    }
  }

  // -- Registry helpers
  function requireDefinition(id: AnyFieldId): AnyFieldDefinition {
    const definition = definitions.get(id.key);
    if (!definition) {
      throw new UnknownFieldError(id.key);
    }
    return definition;
  }

  function typeOf(key: string): FieldType {
    return fieldTypes.get(key) ?? "any";
  }

  function checkType(key: string, value: unknown) {
    const type = typeOf(key);
    if (!acceptsValue(type, value)) {
      throw new FieldTypeError(
        key,
        describeFieldType(type),
        describeValueType(value),
      );
    }
  }

  function modeOf(key: string): ValidationMode {
    return definitions.get(key)?.validationMode ?? defaultMode;
  }

  function debounceOf(definition: AnyFieldDefinition): number {
    return normalizeDelayMs(definition.debounceMs, defaultDebounceMs);
  }

  function transform(definition: AnyFieldDefinition, value: unknown) {
    return definition.transformer && value !== undefined
      ? definition.transformer(value)
      : value;
  }

  function linkDependencies(definition: AnyFieldDefinition) {
    for (const source of definition.dependsOn ?? []) {
      let targets = dependents.get(source.key);
      if (!targets) {
        targets = new Set();
        dependents.set(source.key, targets);
      }
      targets.add(definition.id.key);
    }
  }

  function unlinkDependencies(definition: AnyFieldDefinition) {
    for (const source of definition.dependsOn ?? []) {
      const targets = dependents.get(source.key);
      targets?.delete(definition.id.key);
      if (targets?.size === 0) {
        dependents.delete(source.key);
      }
    }
  }

  // =====================================
  // Validation engine
  // =====================================

  function shouldValidate(key: string, trigger: Trigger): boolean {
    const mode = modeOf(key);
    switch (mode) {
      case "disabled": {
        return false;
      }
      case "always": {
        return true;
      }
      case "onBlur": {
        return trigger === "touch" || read().touched.get(key) === true;
      }
      case "onUserInteraction": {
        // silent only at registration and reset of an untouched, pristine field
        return (
          trigger !== "register" ||
          read().touched.get(key) === true ||
          read().dirty.get(key) === true
        );
      }
    }
  }

  function computeSyncValidation(key: string): ValidationResult {
    const definition = definitions.get(key);
    if (!definition) {
      return VALID;
    }
    const parts = read();
    const value = parts.values.get(key);
    const params = { label: definition.label ?? key, value };
    const resolve = (error: string) =>
      invalid(resolveMessage(messages, error, params));

    try {
      const error = definition.validator?.(value);
      if (error) {
        return resolve(error);
      }
      if (definition.schema) {
        const issue = firstIssueMessage(
          standardValidate(definition.schema, value),
        );
        if (issue) {
          return resolve(issue);
        }
      }
      const crossError = definition.crossFieldValidator?.(
        value,
        createView(parts),
      );
      if (crossError) {
        return resolve(crossError);
      }
    } catch (error) {
      return invalid(`Validation error: ${describeError(error)}`);
    }
    return VALID;
  }

  /**
   * Runs sync validation and stores the result. A sync-valid result keeps an
   * in-flight async run for the same value, reuses an async result already
   * settled for it, or starts a new run as `asyncStart` allows.
   */
  function validateField(key: string, asyncStart: AsyncStart) {
    const definition = definitions.get(key);
    if (!definition) {
      return VALID;
    }
    const result = computeSyncValidation(key);
    if (!result.isValid || !definition.asyncValidator) {
      cancelAsync(key);
      writeValidation(key, result);
      return result;
    }

    const value = read().values.get(key);
    const settled = settledAsync.get(key);
    if (settled && deepEqual(settled.value, value)) {
      cancelAsync(key);
      writeValidation(key, settled.result);
      return settled.result;
    }

    const running = asyncRuns.get(key);
    if (running && deepEqual(running.value, value)) {
      if (asyncStart === "immediate" && running.timeoutId !== undefined) {
        clearTimeout(running.timeoutId);
        running.timeoutId = undefined;
        startAsync(key, running);
      }
      writeValidation(key, VALIDATING);
      return VALIDATING;
    }

    if (asyncStart === "none") {
      cancelAsync(key);
      writeValidation(key, VALID);
      return VALID;
    }

    writeValidation(key, VALIDATING);
    scheduleAsync(key, definition, value, asyncStart === "immediate");
    return VALIDATING;
  }

  function autoValidate(key: string, trigger: Trigger) {
    if (shouldValidate(key, trigger)) {
      validateField(key, trigger === "register" ? "none" : "debounced");
      return;
    }
    if (trigger === "register") {
      writeValidation(key, VALID);
    }
  }

  // -- Async validation lifecycle
  function nextGeneration(key: string) {
    const next = (validationIds.get(key) ?? 0) + 1;
    validationIds.set(key, next);
    return next;
  }

  function cancelAsync(key: string) {
    const run = asyncRuns.get(key);
    if (!run) {
      return;
    }
    if (run.timeoutId !== undefined) {
      clearTimeout(run.timeoutId);
    }
    run.abortController?.abort();
    asyncRuns.delete(key);
    nextGeneration(key);
  }

  function scheduleAsync(
    key: string,
    definition: AnyFieldDefinition,
    value: unknown,
    immediate: boolean,
  ) {
    cancelAsync(key);
    const run: AsyncRun = { value, generation: nextGeneration(key) };
    asyncRuns.set(key, run);
    const debounceMs = immediate ? 0 : debounceOf(definition);
    if (debounceMs === 0) {
      startAsync(key, run);
      return;
    }
    run.timeoutId = setTimeout(() => {
      run.timeoutId = undefined;
      startAsync(key, run);
    }, debounceMs);
  }

  function isCurrentRun(key: string, run: AsyncRun) {
    return (
      asyncRuns.get(key) === run && validationIds.get(key) === run.generation
    );
  }

  function startAsync(key: string, run: AsyncRun) {
    const definition = definitions.get(key);
    if (!definition?.asyncValidator) {
      return;
    }
    const abortController = new AbortController();
    run.abortController = abortController;
    const params = { label: definition.label ?? key, value: run.value };

    let pendingResult: Promise<string | null | undefined>;
    try {
      pendingResult = definition.asyncValidator(run.value, {
        signal: abortController.signal,
      });
    } catch (error) {
      pendingResult = Promise.reject(error);
    }

    pendingResult
      .then((error) => {
        if (abortController.signal.aborted || !isCurrentRun(key, run)) {
          return;
        }
        const result = error
          ? invalid(resolveMessage(messages, error, params))
          : VALID;
        asyncRuns.delete(key);
        settledAsync.set(key, { value: run.value, result });
        transaction(() => {
          writeValidation(key, result);
        }, "skip");
      })
      .catch((error: unknown) => {
        if (abortController.signal.aborted || !isCurrentRun(key, run)) {
          return;
        }
        asyncRuns.delete(key);
        transaction(() => {
          writeValidation(
            key,
            invalid(messages.validationFailed(describeError(error))),
          );
        }, "skip");
      });
  }

  // =====================================
  // Value propagation
  // =====================================

  /**
   * Writes `entries`, validates each changed field, then walks one level of
   * dependents per changed field. A dependent with `derive` gets a new value,
   * which repeats the walk from it; `visited` cuts cycles.
   */
  function applyValues(
    entries: Iterable<readonly [string, unknown]>,
    propagate = true,
  ): readonly string[] {
    const changed: string[] = [];
    for (const [key, value] of entries) {
      if (deepEqual(read().values.get(key), value)) {
        continue;
      }
      writeValue(key, value);
      changed.push(key);
    }
    const visited = new Set(changed);
    for (const key of changed) {
      autoValidate(key, "change");
    }
    for (const key of changed) {
      cascade(key, visited, propagate);
    }
    return changed;
  }

  function cascade(key: string, visited: Set<string>, derive: boolean) {
    for (const target of dependents.get(key) ?? []) {
      if (visited.has(target)) {
        continue;
      }
      visited.add(target);
      const definition = definitions.get(target);
      if (!definition) {
        continue;
      }
      write().changedFields.add(target);
      if (derive && definition.derive) {
        const next = definition.derive(createView(read()));
        checkType(target, next);
        if (!deepEqual(read().values.get(target), next)) {
          writeValue(target, next);
          autoValidate(target, "change");
          cascade(target, visited, derive);
          continue;
        }
      }
      autoValidate(target, "dependency");
    }
  }

  // =====================================
  // Registration
  // =====================================

  function registerOne(definition: AnyFieldDefinition) {
    const key = definition.id.key;
    const existing = definitions.get(key);
    if (existing && sameDefinition(existing, definition)) {
      return;
    }

    if (existing) {
      const previousType = typeOf(key);
      const nextType =
        definition.type ??
        (definition.initialValue === undefined
          ? previousType
          : inferFieldType(definition.initialValue));
      if (
        process.env.NODE_ENV !== "production" &&
        describeFieldType(previousType) !== describeFieldType(nextType)
      ) {
        console.warn(
          `Field "${key}" re-registered with type ${describeFieldType(
            nextType,
          )} (was ${describeFieldType(previousType)}).`,
        );
      }
      unlinkDependencies(existing);
      definitions.set(key, definition);
      fieldTypes.set(key, nextType);
      linkDependencies(definition);
      if (
        definition.initialValue !== undefined &&
        !deepEqual(existing.initialValue, definition.initialValue) &&
        !globalInitialValues.has(key)
      ) {
        adoptInitialValue(key, definition.initialValue);
      }
      autoValidate(key, "register");
      return;
    }

    const baseline = globalInitialValues.has(key)
      ? globalInitialValues.get(key)
      : definition.initialValue;
    const type = definition.type ?? inferFieldType(baseline);
    definitions.set(key, definition);
    fieldTypes.set(key, type);
    linkDependencies(definition);

    let value = baseline;
    let initial = baseline;
    const parts = read();
    if (definition.derive) {
      value = definition.derive(createView(parts));
      initial = value;
    } else if (parts.values.has(key) && acceptsValue(type, parts.values.get(key))) {
      // state kept by `unregister({ preserveState: true })`
      value = parts.values.get(key);
    } else if (restoredValues.has(key)) {
      const restored = restoredValues.get(key);
      restoredValues.delete(key);
      if (acceptsValue(type, restored)) {
        value = restored;
      }
    }
    checkType(key, value);
    initialValues.set(key, initial);

    const next = write();
    next.values.set(key, value);
    next.changedFields.add(key);
    tx.valueKeys.add(key);
    next.dirty.set(key, !deepEqual(value, initial));
    if (!next.touched.has(key)) {
      next.touched.set(key, false);
    }
    next.pending.set(key, false);
    autoValidate(key, "register");
  }

  function register<T>(definition: FieldDefinition<T>) {
    registerAll([definition]);
  }

  function registerAll(list: readonly AnyFieldDefinition[]) {
    transaction(() => {
      for (const definition of list) {
        registerOne(definition);
      }
    }, "rebase");
  }

  function unregister(id: AnyFieldId, { preserveState = false }: UnregisterOptions = {}) {
    const definition = definitions.get(id.key);
    if (!definition) {
      return;
    }
    const key = id.key;
    transaction(() => {
      cancelAsync(key);
      settledAsync.delete(key);
      unlinkDependencies(definition);
      definitions.delete(key);
      fieldTypes.delete(key);
      if (!preserveState) {
        initialValues.delete(key);
      }
      removeKey(key, preserveState);
    }, "rebase");
  }

  // =====================================
  // Initial value adoption
  // =====================================

  function adoptInitialValue(key: string, value: unknown) {
    const definition = definitions.get(key);
    if (!definition) {
      return;
    }
    if ((definition.initialValueStrategy ?? "preferLocal") === "preferGlobal") {
      return;
    }
    checkType(key, value);
    const wasDirty = read().dirty.get(key) === true;
    initialValues.set(key, value);
    if (wasDirty) {
      writeFlag("dirty", key, !deepEqual(read().values.get(key), value));
      return;
    }
    applyValues([[key, value]]);
  }

  function updateInitialValue<T>(id: FieldId<T>, value: T | undefined) {
    requireDefinition(id);
    transaction(() => {
      adoptInitialValue(id.key, value);
    }, "rebase");
  }

  // =====================================
  // Mutations
  // =====================================

  function touchField(key: string) {
    if (read().touched.get(key) === true) {
      return;
    }
    track((hooks) => hooks.onFieldTouched?.(formId, key));
    writeFlag("touched", key, true);
    if (modeOf(key) === "onBlur" || modeOf(key) === "onUserInteraction") {
      validateField(key, "debounced");
    }
  }

  function setValue<T>(
    id: FieldId<T>,
    value: T | undefined,
    { markTouched = false }: SetValueOptions = {},
  ) {
    const definition = requireDefinition(id);
    checkType(id.key, value);
    const next = transform(definition, value);
    transaction(() => {
      const isNoOp = deepEqual(read().values.get(id.key), next);
      if (markTouched) {
        if (isNoOp) {
          touchField(id.key);
        } else if (read().touched.get(id.key) !== true) {
          track((hooks) => hooks.onFieldTouched?.(formId, id.key));
          writeFlag("touched", id.key, true);
        }
      }
      if (!isNoOp) {
        applyValues([[id.key, next]]);
      }
    });
  }

  function setValues(
    values: Readonly<Record<string, unknown>>,
    { strict = false }: BulkUpdateOptions = {},
  ): BulkUpdateResult {
    const accepted: [string, unknown][] = [];
    const missingFields = new Set<string>();
    const typeMismatches = new Map<string, string>();

    for (const [key, value] of Object.entries(values)) {
      const definition = definitions.get(key);
      if (!definition) {
        if (strict) {
          throw new UnknownFieldError(key);
        }
        missingFields.add(key);
        continue;
      }
      const type = typeOf(key);
      if (!acceptsValue(type, value)) {
        const error = new FieldTypeError(
          key,
          describeFieldType(type),
          describeValueType(value),
        );
        if (strict) {
          throw error;
        }
        typeMismatches.set(key, error.message);
        continue;
      }
      accepted.push([key, transform(definition, value)]);
    }

    let updated: readonly string[] = [];
    transaction(() => {
      updated = applyValues(accepted);
    });

    return createBulkUpdateResult({
      updatedFields: new Set(updated),
      typeMismatches,
      missingFields,
    });
  }

  function applyBatch(batch: FormBatch, bulkOptions?: BulkUpdateOptions) {
    return setValues(Object.fromEntries(batch.updates), bulkOptions);
  }

  async function optimisticUpdate<T, R>({
    id,
    value,
    action,
    revertOnError = true,
  }: OptimisticUpdateOptions<T, R>): Promise<R> {
    const previous = getValue(id);
    transaction(() => {
      setValue(id, value);
      setPending(id, true);
    });
    try {
      return await action();
    } catch (error) {
      if (revertOnError && definitions.has(id.key)) {
        setValue(id, previous);
      }
      throw error;
    } finally {
      if (definitions.has(id.key)) {
        setPending(id, false);
      }
    }
  }

  // -- Array fields
  function updateArray<T>(id: ArrayFieldId<T>, update: (items: T[]) => T[] | null) {
    const current = getValue(id) ?? [];
    const next = update([...current]);
    if (next) {
      setValue(id, next);
    }
  }

  function inRange(items: readonly unknown[], index: number) {
    return Number.isInteger(index) && index >= 0 && index < items.length;
  }

  function addArrayItem<T>(id: ArrayFieldId<T>, item: T) {
    updateArray(id, (items) => [...items, item]);
  }

  function removeArrayItemAt<T>(id: ArrayFieldId<T>, index: number) {
    updateArray(id, (items) => {
      if (!inRange(items, index)) {
        return null;
      }
      items.splice(index, 1);
      return items;
    });
  }

  function replaceArrayItem<T>(id: ArrayFieldId<T>, index: number, item: T) {
    updateArray(id, (items) => {
      if (!inRange(items, index)) {
        return null;
      }
      items[index] = item;
      return items;
    });
  }

  function moveArrayItem<T>(id: ArrayFieldId<T>, from: number, to: number) {
    updateArray(id, (items) => {
      if (!inRange(items, from) || !inRange(items, to) || from === to) {
        return null;
      }
      const moved = items.splice(from, 1);
      items.splice(to, 0, ...moved);
      return items;
    });
  }

  function clearArray<T>(id: ArrayFieldId<T>) {
    setValue(id, []);
  }

  // -- Field flags
  function setPending(id: AnyFieldId, isPending: boolean) {
    requireDefinition(id);
    transaction(() => {
      writeFlag("pending", id.key, isPending);
    }, "skip");
  }

  function setFieldError(id: AnyFieldId, message: string | null) {
    requireDefinition(id);
    transaction(() => {
      cancelAsync(id.key);
      writeValidation(id.key, message ? invalid(message) : VALID);
    }, "skip");
  }

  function setFieldValidating(id: AnyFieldId, isValidating: boolean) {
    requireDefinition(id);
    transaction(() => {
      writeValidation(
        id.key,
        withValidating(read().validations.get(id.key) ?? VALID, isValidating),
      );
    }, "skip");
  }

  function markAsTouched(id: AnyFieldId) {
    if (!definitions.has(id.key)) {
      return;
    }
    transaction(() => {
      touchField(id.key);
    }, "skip");
  }

  // =====================================
  // Manual validation and steps
  // =====================================

  function validate(ids?: readonly AnyFieldId[]): boolean {
    const keys = ids
      ? ids.map((id) => id.key).filter((key) => definitions.has(key))
      : [...definitions.keys()];
    let isValid = true;
    transaction(() => {
      for (const key of keys) {
        if (!validateField(key, "immediate").isValid) {
          isValid = false;
        }
      }
    }, "skip");
    return isValid;
  }

  function goToStep(step: number) {
    transaction(() => {
      writeCounter("currentStep", normalizeStep(step));
    }, "skip");
  }

  function nextStep(ids?: readonly AnyFieldId[]): boolean {
    if (ids && !validate(ids)) {
      return false;
    }
    goToStep(read().currentStep + 1);
    return true;
  }

  function previousStep() {
    goToStep(Math.max(0, read().currentStep - 1));
  }

  // =====================================
  // Reset
  // =====================================

  function resetValue(key: string, strategy: ResetStrategy): unknown {
    if (strategy === "initialValues") {
      return initialValues.get(key);
    }
    const definition = definitions.get(key);
    return definition?.emptyValue ?? defaultEmptyValue(typeOf(key));
  }

  function resetKeys(
    keys: readonly string[],
    strategy: ResetStrategy,
    clearErrors: boolean,
  ) {
    const entries: [string, unknown][] = [];
    for (const key of keys) {
      cancelAsync(key);
      if (clearErrors) {
        settledAsync.delete(key);
      }
      const value = resetValue(key, strategy);
      writeFlag("touched", key, false);
      writeFlag("pending", key, false);
      if (!deepEqual(read().values.get(key), value)) {
        writeValue(key, value);
      }
      entries.push([key, value]);
    }
    for (const [key] of entries) {
      // the clear strategy can leave values that differ from the baseline
      writeFlag("dirty", key, false);
      if (clearErrors) {
        writeValidation(key, VALID);
      } else {
        autoValidate(key, "register");
      }
    }
  }

  function reset({
    strategy = "initialValues",
    clearErrors = false,
  }: ResetOptions = {}) {
    transaction(() => {
      resetKeys([...definitions.keys()], strategy, clearErrors);
      writeSubmitting(false);
      writeCounter("resetCount", read().resetCount + 1);
    });
  }

  function resetFields(
    ids: readonly AnyFieldId[],
    { strategy = "initialValues" }: Pick<ResetOptions, "strategy"> = {},
  ) {
    const keys = ids.map((id) => id.key).filter((key) => definitions.has(key));
    transaction(() => {
      resetKeys(keys, strategy, false);
    });
  }

  function resetToValues(values: Readonly<Record<string, unknown>>) {
    for (const [key, value] of Object.entries(values)) {
      if (definitions.has(key)) {
        checkType(key, value);
      }
    }
    transaction(() => {
      for (const [key, value] of Object.entries(values)) {
        if (definitions.has(key)) {
          initialValues.set(key, value);
        }
      }
      resetKeys([...definitions.keys()], "initialValues", false);
      writeSubmitting(false);
      writeCounter("resetCount", read().resetCount + 1);
    });
  }

  // =====================================
  // History
  // =====================================

  function restoreValues(values: ReadonlyMap<string, unknown> | null) {
    if (!values) {
      return;
    }
    transaction(() => {
      const entries: [string, unknown][] = [];
      for (const key of definitions.keys()) {
        if (values.has(key)) {
          entries.push([key, values.get(key)]);
        }
      }
      applyValues(entries, false);
    }, "skip");
  }

  function undo() {
    restoreValues(history.undo());
  }

  function redo() {
    restoreValues(history.redo());
  }

  function clearHistory() {
    history.clear(new Map(read().values));
    transaction(() => {
      writeCounter("historyCursor", history.cursor);
    }, "skip");
  }

  // =====================================
  // Submission
  // =====================================

  function isBusy() {
    const snapshot = state.peekValue();
    return snapshot.isPending || snapshot.isValidating;
  }

  async function waitUntilSettled() {
    while (isBusy() && !disposed) {
      await Promise.race([stream.next(), disposal]);
    }
  }

  function errorsRecord(snapshot: FormSnapshot) {
    const errors: Record<string, string | null> = {};
    for (const [key, result] of snapshot.validations) {
      if (!result.isValid) {
        errors[key] = result.errorMessage;
      }
    }
    return errors;
  }

  function restoreBaseline(baseline: ReadonlyMap<string, unknown>) {
    transaction(() => {
      for (const [key, value] of baseline) {
        if (!definitions.has(key)) {
          continue;
        }
        initialValues.set(key, value);
        writeFlag("dirty", key, !deepEqual(read().values.get(key), value));
      }
    }, "skip");
  }

  async function runSubmit({
    onValid,
    onError,
    autoFocusOnInvalid = true,
    optimistic = false,
    revertOnError = false,
    waitForPending = true,
  }: SubmitOptions): Promise<void> {
    const baseline = optimistic ? new Map(initialValues) : null;
    transaction(() => {
      writeSubmitting(true);
      writeCounter("submitCount", read().submitCount + 1);
      if (optimistic) {
        for (const key of definitions.keys()) {
          initialValues.set(key, read().values.get(key));
          writeFlag("dirty", key, false);
        }
      }
    }, "skip");
    const attempted = getValues();
    report((hooks) => hooks.onSubmitAttempt?.(formId, attempted));

    try {
      if (waitForPending) {
        await waitUntilSettled();
      }
      if (disposed) {
        return;
      }
      validate();
      if (waitForPending) {
        await waitUntilSettled();
      }
      if (disposed) {
        return;
      }

      const snapshot = state.peekValue();
      if (!snapshot.isValid) {
        onError?.(validationsToRecord(snapshot.validations));
        if (autoFocusOnInvalid) {
          focusFirstError();
        }
        const errors = errorsRecord(snapshot);
        report((hooks) => hooks.onSubmitFailure?.(formId, errors));
        return;
      }

      try {
        await onValid(valuesToRecord(snapshot.values));
        submittedSuccessfully = true;
        report((hooks) => hooks.onSubmitSuccess?.(formId));
      } catch (error) {
        if (baseline && revertOnError) {
          restoreBaseline(baseline);
        }
        const errors = { submit: describeError(error) };
        report((hooks) => hooks.onSubmitFailure?.(formId, errors));
        throw error;
      }
    } finally {
      transaction(() => {
        writeSubmitting(false);
      }, "skip");
    }
  }

  function submit(submitOptions: SubmitOptions): Promise<void> {
    if (disposed) {
      return Promise.resolve();
    }
    const throttleMs = normalizeDelayMs(submitOptions.throttleMs);
    const debounceMs = normalizeDelayMs(submitOptions.debounceMs);

    const now = Date.now();
    if (
      throttleMs > 0 &&
      lastSubmitStartedAt !== null &&
      now - lastSubmitStartedAt < throttleMs
    ) {
      return Promise.resolve();
    }
    lastSubmitStartedAt = now;

    if (debounceMs === 0) {
      return runSubmit(submitOptions);
    }

    return new Promise<void>((resolve, reject) => {
      const waiters = debouncedSubmit?.waiters ?? [];
      if (debouncedSubmit) {
        clearTimeout(debouncedSubmit.timeoutId);
      }
      waiters.push({ resolve, reject });
      const timeoutId = setTimeout(() => {
        const pending = debouncedSubmit;
        debouncedSubmit = null;
        invariant(pending, "debounced submit fired without a pending call");
        runSubmit(pending.options).then(
          () => {
            for (const waiter of pending.waiters) {
              waiter.resolve();
            }
          },
          (error: unknown) => {
            for (const waiter of pending.waiters) {
              waiter.reject(error);
            }
          },
        );
      }, debounceMs);
      debouncedSubmit = { timeoutId, options: submitOptions, waiters };
    });
  }

  function focusFirstError(): string | null {
    const { validations } = state.peekValue();
    for (const key of definitions.keys()) {
      if (validations.get(key)?.isValid === false) {
        onFocusInvalid?.(key);
        return key;
      }
    }
    return null;
  }

  // =====================================
  // Persistence
  // =====================================

  function persistNow(values: ReadonlyMap<string, unknown>) {
    if (!persistence || formId === undefined) {
      return;
    }
    persistence.save(formId, valuesToRecord(values)).catch((error: unknown) => {
      console.warn(`Failed to persist form "${formId}"`, error);
    });
  }

  function schedulePersist() {
    if (!persistence || formId === undefined) {
      return;
    }
    clearTimeout(persistTimeoutId);
    if (persistDebounceMs === 0) {
      persistNow(read().values);
      return;
    }
    persistTimeoutId = setTimeout(() => {
      persistTimeoutId = undefined;
      persistNow(read().values);
    }, persistDebounceMs);
  }

  async function loadPersisted(): Promise<void> {
    if (!persistence || formId === undefined) {
      return;
    }
    let saved: Record<string, unknown> | null;
    try {
      saved = await persistence.load(formId);
    } catch (error) {
      console.warn(`Failed to load persisted form "${formId}"`, error);
      return;
    }
    if (!saved) {
      return;
    }
    const entries: [string, unknown][] = [];
    for (const [key, value] of Object.entries(saved)) {
      if (!definitions.has(key)) {
        restoredValues.set(key, value);
      } else if (acceptsValue(typeOf(key), value)) {
        entries.push([key, value]);
      } else {
        console.warn(
          `Ignoring persisted value for "${key}": expected ${describeFieldType(
            typeOf(key),
          )}, received ${describeValueType(value)}`,
        );
      }
    }
    transaction(() => {
      applyValues(entries);
    }, "rebase");
  }

  // =====================================
  // Reads and subscriptions
  // =====================================

  function getSnapshot() {
    return state.peekValue();
  }

  function getValue<T>(id: FieldId<T>): T | undefined {
    return readValue(state.peekValue(), id);
  }

  function getValues() {
    return valuesToRecord(state.peekValue().values);
  }

  function subscribe(listener: () => void): Unsubscribe {
    return state.subscribe(() => {
      try {
        listener();
      } catch (error) {
        reportListenerError(error);
      }
    });
  }

  function bindField<T>(
    target: FieldId<T>,
    source: FormController,
    sourceField: FieldId<T>,
    { twoWay = false }: BindFieldOptions = {},
  ): Unsubscribe {
    function pull() {
      if (!definitions.has(target.key) || !source.isFieldRegistered(sourceField)) {
        return;
      }
      const incoming = source.getValue(sourceField);
      if (deepEqual(incoming, getValue(target))) {
        return;
      }
      setValue(target, incoming);
    }

    function push() {
      if (!definitions.has(target.key) || !source.isFieldRegistered(sourceField)) {
        return;
      }
      const outgoing = getValue(target);
      if (deepEqual(outgoing, source.getValue(sourceField))) {
        return;
      }
      source.setValue(sourceField, outgoing);
    }

    pull();
    const unsubscribers = [source.subscribe(pull)];
    if (twoWay) {
      unsubscribers.push(subscribe(push));
    }

    function unbind() {
      for (const unsubscribe of unsubscribers.splice(0)) {
        unsubscribe();
      }
      bindings.delete(unbind);
    }
    bindings.add(unbind);
    return unbind;
  }

  function dispose() {
    if (disposed) {
      return;
    }
    if (!submittedSuccessfully) {
      const elapsedMs = Date.now() - startedAt;
      report((hooks) => hooks.onFormAbandoned?.(formId, elapsedMs));
    }
    for (const key of [...asyncRuns.keys()]) {
      cancelAsync(key);
    }
    clearTimeout(persistTimeoutId);
    if (debouncedSubmit) {
      clearTimeout(debouncedSubmit.timeoutId);
      for (const waiter of debouncedSubmit.waiters) {
        waiter.resolve();
      }
      debouncedSubmit = null;
    }
    for (const unbind of [...bindings]) {
      unbind();
    }
    transaction(() => {
      writeSubmitting(false);
    }, "skip");
    disposed = true;
    markDisposed();
  }

  // -- Initialization
  registerAll(options.fields ?? []);
  history.clear(new Map(state.peekValue().values));
  report((hooks) => hooks.onFormStarted?.(formId));
  const ready = loadPersisted();

  return {
    ready,
    stream,
    get messages() {
      return messages;
    },
    get canUndo() {
      return history.canUndo;
    },
    get canRedo() {
      return history.canRedo;
    },
    get isDisposed() {
      return disposed;
    },
    getSnapshot,
    subscribe,
    addListener: stream.subscribe,
    select: (selector, equals) =>
      derived(() => selector(state.getValue()), equals),
    getValue,
    getInitialValue: (id) => readFieldValue(initialValues, id),
    getValues,
    getNestedValues: () => toNestedValues(state.peekValue()),
    getValidation: (id) => readValidation(state.peekValue(), id),
    isFieldRegistered: (id) => definitions.has(id.key),
    isFieldDirty: (id) => readDirty(state.peekValue(), id),
    isFieldTouched: (id) => readTouched(state.peekValue(), id),
    isFieldPending: (id) => readPending(state.peekValue(), id),
    isGroupValid: (prefix) => isGroupValid(state.peekValue(), prefix),
    isGroupDirty: (prefix) => isGroupDirty(state.peekValue(), prefix),
    getDefinition: (id) => definitions.get(id.key),
    register,
    registerAll,
    unregister,
    setValue,
    setValues,
    applyBatch,
    optimisticUpdate,
    updateInitialValue,
    addArrayItem,
    removeArrayItemAt,
    replaceArrayItem,
    moveArrayItem,
    clearArray,
    setPending,
    setFieldError,
    setFieldValidating,
    markAsTouched,
    validate,
    validateStep: (ids) => validate(ids),
    goToStep,
    nextStep,
    previousStep,
    reset,
    resetFields,
    resetToValues,
    undo,
    redo,
    clearHistory,
    submit,
    focusFirstError,
    setMessages: (next) => {
      messages = next;
    },
    bindField,
    dispose,
  };
}
