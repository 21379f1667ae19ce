/**
 * @module signals
 *
 * Small reactive primitives the controller keeps its state in.
 *
 * Core ideas:
 * - A `Signal<T>` holds a value and notifies subscribers synchronously when it changes.
 * - `getValue()` tracks dependencies when called inside an `effect`/`derived` computation.
 * - `peekValue()` reads without tracking dependencies.
 * - `derived()` creates a read-only signal computed from other signals.
 *
 * Behaviour:
 * - Synchronous propagation. Batching is the caller's concern (the controller
 *   publishes one snapshot per transaction).
 * - Default equality is `Object.is`; customizable per update.
 * - `effect()` and `derived()` return disposers that drop every subscription
 *   they collected.
 * - Subscribers are notified over a copy of the subscriber set, so a callback
 *   may unsubscribe itself or others during a pass.
 */

/**
 * Callback invoked when a signal's value has changed.
 *
 * The callback is invoked synchronously and should be fast.
 */
type Subscriber = () => void;
/**
 * Function that removes a previously registered subscription.
 */
export type Unsubscribe = () => void;

/**
 * Mutable, subscribable container for a value of type `T`.
 *
 * Notes:
 * - Prefer immutable updates for objects/arrays; or pass a custom comparator.
 * - Notifications are synchronous and in insertion order.
 */
export type Signal<T> = ReadonlySignal<T> & {
  /**
   * Update the stored value and synchronously notify subscribers if it changed
   * according to the comparator (default `Object.is`).
   *
   * @param equals - Optional comparator to decide whether to notify subscribers.
   */
  setValue(v: T, equals?: (a: T, b: T) => boolean): void;
};

/**
 * Read-only view of a signal-like value. Exposes reads and subscription but no mutation.
 */
export type ReadonlySignal<T> = {
  /** Read the current value without tracking dependencies. */
  peekValue(): T;
  /**
   * Read the current value and, if inside an active computation, track it as a dependency.
   */
  getValue(): T;
  subscribe(cb: Subscriber): Unsubscribe;
};

export type DerivedSignal<T> = ReadonlySignal<T> & {
  /** Stops recomputing; the last value stays readable. */
  dispose(): void;
};

type Computation = {
  run: Subscriber;
  cleanups: Unsubscribe[];
};

let currentComputation: Computation | null = null;

function defaultEquals(a: unknown, b: unknown) {
  return Object.is(a, b);
}

export function signal<T>(initialValue: T): Signal<T> {
  const subscriptions = new Set<Subscriber>();
  let _value = initialValue;

  function subscribe(cb: Subscriber): Unsubscribe {
    subscriptions.add(cb);
    return function unsubscribe() {
      subscriptions.delete(cb);
    };
  }

  return {
    peekValue(): T {
      return _value;
    },
    getValue(): T {
      const computation = currentComputation;
      if (computation && !subscriptions.has(computation.run)) {
        computation.cleanups.push(subscribe(computation.run));
      }
      return _value;
    },
    setValue(updated: T, equals: (a: T, b: T) => boolean = defaultEquals) {
      if (equals(_value, updated)) {
        return;
      }
      _value = updated;
      // notify over a copy: subscribers may unsubscribe mid-pass
      for (const fn of [...subscriptions]) {
        fn();
      }
    },
    subscribe,
  };
}

/**
 * Run a side-effecting computation that re-executes whenever any signal read
 * via `getValue()` during the computation changes.
 *
 * The function runs immediately once. Dependency tracking is additive for the
 * lifetime of the effect; the returned disposer removes all of it.
 *
 * Warning: Because execution is synchronous, updating signals inside the effect
 * can cause feedback loops unless properly guarded.
 */
export function effect(fn: Subscriber): Unsubscribe {
  let disposed = false;
  const computation: Computation = {
    run() {
      if (disposed) {
        return;
      }
      const previous = currentComputation;
      currentComputation = computation;
      try {
        fn();
      } finally {
        currentComputation = previous;
      }
    },
    cleanups: [],
  };
  computation.run();
  return function dispose() {
    disposed = true;
    for (const cleanup of computation.cleanups.splice(0)) {
      cleanup();
    }
  };
}

/**
 * Create a read-only signal computed from other signals.
 *
 * The computation `fn` runs immediately to seed the value, then runs again
 * whenever any signal it reads via `getValue()` changes. Updates are published
 * only if the derived value differs according to the comparator (default `Object.is`).
 */
export function derived<T>(
  fn: () => T,
  equals: (a: T, b: T) => boolean = defaultEquals,
): DerivedSignal<T> {
  // Seed with an initial value to avoid undefined and TS assertions
  const derivedSignal = signal<T>(untracked(fn));
  const dispose = effect(() => {
    derivedSignal.setValue(fn(), equals);
  });
  return {
    peekValue: derivedSignal.peekValue,
    getValue: derivedSignal.getValue,
    subscribe: derivedSignal.subscribe,
    dispose,
  };
}

/** Runs `fn` without registering reads with the enclosing computation. */
export function untracked<T>(fn: () => T): T {
  const previous = currentComputation;
  currentComputation = null;
  try {
    return fn();
  } finally {
    currentComputation = previous;
  }
}
