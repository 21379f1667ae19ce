import {
  createContext,
  use,
  useCallback,
  useEffect,
  useRef,
  useState,
  useSyncExternalStore,
  type ReactNode,
} from "react";
import {
  createAsyncField,
  type AsyncField,
  type AsyncFieldOptions,
  type AsyncFieldState,
} from "@lib/async-field";
import { shallow } from "@lib/equality";
import { invariant } from "@lib/errors";
import type { FieldDefinition } from "@lib/field-definition";
import type { FieldId } from "@lib/field-id";
import {
  createFormController,
  type FormController,
  type FormControllerOptions,
  type SetValueOptions,
} from "@lib/form-controller";
import {
  readDirty,
  readPending,
  readTouched,
  readValidation,
  readValue,
  type FormSnapshot,
} from "@lib/form-snapshot";
import type { Unsubscribe } from "@lib/store/signals";
import type { ValidationResult } from "@lib/validation-result";

// =====================================
// Context
// =====================================

const ControllerContext = createContext<FormController | null>(null);

export function FormProvider({
  children,
  controller,
}: Readonly<{
  children: ReactNode;
  controller: FormController;
}>) {
  return <ControllerContext value={controller}>{children}</ControllerContext>;
}

export function useFormContext(): FormController {
  const controller = use(ControllerContext);
  invariant(controller, "useFormContext must be used within a FormProvider");
  return controller;
}

// An explicit controller wins over the one from context.
function useResolvedController(
  controller: FormController | undefined,
  hookName: string,
): FormController {
  const fromContext = use(ControllerContext);
  const resolved = controller ?? fromContext;
  invariant(
    resolved,
    `${hookName} needs a controller argument or a FormProvider`,
  );
  return resolved;
}

// =====================================
// Controller lifecycle
// =====================================

/**
 * Creates a controller once per component and disposes it on unmount.
 *
 * Options are read on creation only. A controller disposed by a Strict Mode
 * effect replay is replaced with a fresh one.
 */
export function useFormController(
  options: FormControllerOptions = {},
): FormController {
  const optionsRef = useRef(options);
  const [controller, setController] = useState(() =>
    createFormController(options),
  );

  useEffect(() => {
    if (controller.isDisposed) {
      setController(createFormController(optionsRef.current));
      return;
    }
    return () => {
      controller.dispose();
    };
  }, [controller]);

  return controller;
}

// =====================================
// Selection
// =====================================

export function useFormSnapshot(controller?: FormController): FormSnapshot {
  const resolved = useResolvedController(controller, "useFormSnapshot");
  return useSyncExternalStore(
    resolved.subscribe,
    resolved.getSnapshot,
    resolved.getSnapshot,
  );
}

export type FormSelectorOptions<S> = {
  /** Decides whether a new selection replaces the previous one. */
  equality?: (a: S, b: S) => boolean;
  controller?: FormController;
};

/**
 * Subscribes to a slice of the snapshot. The component re-renders only when
 * the selection changes according to `equality` (shallow by default).
 */
export function useFormSelector<S>(
  selector: (snapshot: FormSnapshot) => S,
  options: FormSelectorOptions<S> = {},
): S {
  const { equality = shallow } = options;
  const controller = useResolvedController(
    options.controller,
    "useFormSelector",
  );

  const lastRef = useRef<{
    snapshot: FormSnapshot;
    selector: (snapshot: FormSnapshot) => S;
    selected: S;
  } | null>(null);

  const getSelected = useCallback(() => {
    const snapshot = controller.getSnapshot();
    const last = lastRef.current;
    if (last?.snapshot === snapshot && last.selector === selector) {
      return last.selected;
    }
    const next = selector(snapshot);
    // keep the previous reference so useSyncExternalStore bails out
    const selected = last && equality(last.selected, next) ? last.selected : next;
    lastRef.current = { snapshot, selector, selected };
    return selected;
  }, [controller, selector, equality]);

  return useSyncExternalStore(controller.subscribe, getSelected, getSelected);
}

// =====================================
// Fields
// =====================================

export type UseFieldReturn<T> = {
  id: FieldId<T>;
  value: T | undefined;
  validation: ValidationResult;
  isDirty: boolean;
  isTouched: boolean;
  isPending: boolean;
  setValue: (value: T | undefined, options?: SetValueOptions) => void;
  markAsTouched: () => void;
};

/**
 * Binds a component to one field.
 *
 * Passing a definition registers it while the component is mounted; on
 * unmount the field is unregistered with its state preserved, so remounting
 * resumes where the user left off. Define it outside the component so the
 * registration effect does not rerun every render.
 */
export function useField<T>(
  target: FieldId<T> | FieldDefinition<T>,
  controller?: FormController,
): UseFieldReturn<T> {
  const resolved = useResolvedController(controller, "useField");
  const definition = "id" in target ? target : null;
  const id: FieldId<T> = "id" in target ? target.id : target;

  useEffect(() => {
    if (!definition) {
      return;
    }
    resolved.register(definition);
    return () => {
      resolved.unregister(definition.id, { preserveState: true });
    };
  }, [definition, resolved]);

  const select = useCallback(
    (snapshot: FormSnapshot) => ({
      value: readValue(snapshot, id),
      validation: readValidation(snapshot, id),
      isDirty: readDirty(snapshot, id),
      isTouched: readTouched(snapshot, id),
      isPending: readPending(snapshot, id),
    }),
    [id],
  );
  const slice = useFormSelector(select, { controller: resolved });

  const setValue = useCallback(
    (value: T | undefined, options?: SetValueOptions) => {
      resolved.setValue(id, value, options);
    },
    [id, resolved],
  );

  const markAsTouched = useCallback(() => {
    resolved.markAsTouched(id);
  }, [id, resolved]);

  return { id, ...slice, setValue, markAsTouched };
}

// =====================================
// Async fields
// =====================================

const IDLE: AsyncFieldState<never> = Object.freeze({
  status: "idle",
  generation: 0,
  value: undefined,
  error: undefined,
  isLoading: false,
  keepPrevious: false,
});

function noopSubscribe(): Unsubscribe {
  return () => {};
}

export type UseAsyncFieldReturn<T> = AsyncFieldState<T> & {
  refresh: () => void;
};

/**
 * Runs an async field for the component's lifetime. The latest `fetch` and
 * callbacks are used without recreating the field; changing the field or
 * dependency id starts over.
 */
export function useAsyncField<T, D = unknown>(
  options: AsyncFieldOptions<T, D>,
  controller?: FormController,
): UseAsyncFieldReturn<T> {
  const resolved = useResolvedController(controller, "useAsyncField");
  const latestRef = useRef(options);
  useEffect(() => {
    latestRef.current = options;
  });

  const fieldKey = options.id.key;
  const dependencyKey = options.dependency?.key;
  const [field, setField] = useState<AsyncField<T, D> | null>(null);

  useEffect(() => {
    const created = createAsyncField<T, D>(resolved, {
      ...latestRef.current,
      fetch: (dependency, context) =>
        latestRef.current.fetch(dependency, context),
      onData: (data, target) => latestRef.current.onData?.(data, target),
    });
    setField(created);
    return () => {
      created.dispose();
    };
  }, [resolved, fieldKey, dependencyKey]);

  const subscribe = useCallback(
    (listener: () => void) =>
      field ? field.state.subscribe(listener) : noopSubscribe(),
    [field],
  );
  const getState = useCallback(
    (): AsyncFieldState<T> => (field ? field.getState() : IDLE),
    [field],
  );
  const state = useSyncExternalStore(subscribe, getState, getState);

  const refresh = useCallback(() => {
    field?.refresh();
  }, [field]);

  return { ...state, refresh };
}
