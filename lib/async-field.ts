import { deepEqual } from "@lib/equality";
import type { AnyFieldId, FieldId } from "@lib/field-id";
import type { FormController } from "@lib/form-controller";
import { normalizeDelayMs } from "@lib/normalize-number";
import {
  signal,
  type ReadonlySignal,
  type Unsubscribe,
} from "@lib/store/signals";

export type AsyncFieldStatus = "idle" | "loading" | "data" | "error";

export type AsyncFieldState<T> = {
  readonly status: AsyncFieldStatus;
  /** Incremented by every fetch request; completions carry the one they started with. */
  readonly generation: number;
  readonly value: T | undefined;
  readonly error: unknown;
  readonly isLoading: boolean;
  readonly keepPrevious: boolean;
};

export type AsyncFieldFetcher<T, D> = (
  dependency: D | undefined,
  context: { signal: AbortSignal },
) => Promise<T>;

export type AsyncFieldOptions<T, D = unknown> = {
  id: FieldId<T>;
  fetch: AsyncFieldFetcher<T, D>;
  /** Field whose changes trigger a new fetch. */
  dependency?: FieldId<D>;
  /** Part of the dependency to watch; other changes are ignored. */
  select?: (dependency: D | undefined) => unknown;
  /** Cleared (reset with the `clear` strategy) when the dependency changes. */
  resetField?: AnyFieldId;
  debounceMs?: number;
  /** Keep the last data visible while a new fetch is loading. */
  keepPreviousData?: boolean;
  /** Do not fetch on creation or dependency change; only on `refresh()`. */
  manual?: boolean;
  /** Used by `refresh()` instead of repeating the last fetch. */
  onRetry?: () => Promise<T>;
  onData?: (data: T, controller: FormController) => void;
};

export type AsyncField<T, D = unknown> = {
  readonly state: ReadonlySignal<AsyncFieldState<T>>;
  getState(): AsyncFieldState<T>;
  /** Fetches again now, skipping the debounce. */
  refresh(): void;
  /** Swaps the fetcher and requests with it. */
  setFetcher(fetch: AsyncFieldFetcher<T, D>): void;
  dispose(): void;
};

/**
 * Feeds a field from an external async source, latest request wins.
 *
 * Resolved data is offered to the field as its new initial value, so a
 * pristine field shows it and an edited one keeps the user's input. The field
 * is marked pending in the controller while a fetch is in flight, which makes
 * `submit()` wait for it.
 *
 * @example
 * const cities = createAsyncField(controller, {
 *   id: cityOptions,
 *   dependency: country,
 *   fetch: (code, { signal }) => api.cities(code, { signal }),
 *   resetField: city,
 * });
 */
export function createAsyncField<T, D = unknown>(
  controller: FormController,
  options: AsyncFieldOptions<T, D>,
): AsyncField<T, D> {
  const {
    id,
    dependency,
    select,
    resetField,
    keepPreviousData = false,
    manual = false,
    onRetry,
    onData,
  } = options;
  const debounceMs = normalizeDelayMs(options.debounceMs);

  const state = signal<AsyncFieldState<T>>({
    status: "idle",
    generation: 0,
    value: undefined,
    error: undefined,
    isLoading: false,
    keepPrevious: keepPreviousData,
  });

  let fetcher = options.fetch;
  let generation = 0;
  let timeoutId: ReturnType<typeof setTimeout> | undefined;
  let abortController: AbortController | null = null;
  let disposed = false;

  function readDependency(): D | undefined {
    return dependency ? controller.getValue(dependency) : undefined;
  }

  function watched() {
    const value = readDependency();
    return select ? select(value) : value;
  }

  function update(patch: Partial<AsyncFieldState<T>>) {
    state.setValue({ ...state.peekValue(), ...patch });
  }

  function setFieldPending(isPending: boolean) {
    if (controller.isFieldRegistered(id)) {
      controller.setPending(id, isPending);
    }
  }

  function cancel() {
    clearTimeout(timeoutId);
    timeoutId = undefined;
    abortController?.abort();
    abortController = null;
  }

  function execute(
    requested: number,
    load: (signal: AbortSignal) => Promise<T>,
  ) {
    if (disposed || requested !== generation) {
      return;
    }
    const current = new AbortController();
    abortController = current;
    const previous = state.peekValue();
    const keep = keepPreviousData && previous.value !== undefined;
    update({
      status: "loading",
      generation: requested,
      value: keep ? previous.value : undefined,
      error: undefined,
      isLoading: true,
    });
    setFieldPending(true);

    let pending: Promise<T>;
    try {
      pending = load(current.signal);
    } catch (error) {
      pending = Promise.reject(error);
    }

    pending
      .then((data) => {
        if (disposed || requested !== generation) {
          return;
        }
        abortController = null;
        update({ status: "data", value: data, isLoading: false });
        setFieldPending(false);
        if (controller.isFieldRegistered(id)) {
          controller.updateInitialValue(id, data);
        }
        onData?.(data, controller);
      })
      .catch((error: unknown) => {
        if (disposed || requested !== generation) {
          return;
        }
        abortController = null;
        update({ status: "error", error, isLoading: false });
        setFieldPending(false);
      });
  }

  function request(
    load: (signal: AbortSignal) => Promise<T>,
    immediate: boolean,
  ) {
    if (disposed) {
      return;
    }
    cancel();
    generation += 1;
    const requested = generation;
    if (debounceMs > 0 && !immediate) {
      timeoutId = setTimeout(() => {
        timeoutId = undefined;
        execute(requested, load);
      }, debounceMs);
      return;
    }
    execute(requested, load);
  }

  function fetchWithDependency(signal: AbortSignal) {
    return fetcher(readDependency(), { signal });
  }

  let lastWatched = watched();
  const unsubscribe: Unsubscribe = dependency
    ? controller.subscribe(() => {
        const next = watched();
        if (deepEqual(lastWatched, next)) {
          return;
        }
        lastWatched = next;
        if (resetField && controller.isFieldRegistered(resetField)) {
          controller.resetFields([resetField], { strategy: "clear" });
        }
        if (!manual) {
          request(fetchWithDependency, false);
        }
      })
    : () => {};

  if (!manual) {
    request(fetchWithDependency, false);
  }

  return {
    state,
    getState: state.peekValue,
    refresh() {
      request(onRetry ? () => onRetry() : fetchWithDependency, true);
    },
    setFetcher(fetch) {
      fetcher = fetch;
      request(fetchWithDependency, false);
    },
    dispose() {
      if (disposed) {
        return;
      }
      const wasLoading = state.peekValue().isLoading;
      cancel();
      generation += 1;
      unsubscribe();
      disposed = true;
      if (wasLoading) {
        update({ isLoading: false });
        setFieldPending(false);
      }
    },
  };
}
