import type { ReadonlySignal, Unsubscribe } from "@lib/store/signals";

/**
 * Multi-subscriber view over a snapshot signal.
 *
 * `subscribe` hands every listener the new value; `next()` resolves with the
 * first value published after the call, which is what the submit loop awaits
 * while fields are pending.
 */
export type SnapshotStream<T> = {
  getValue(): T;
  subscribe(listener: (value: T) => void): Unsubscribe;
  next(): Promise<T>;
};

export function createSnapshotStream<T>(
  source: ReadonlySignal<T>,
  onListenerError: (error: unknown) => void,
): SnapshotStream<T> {
  function subscribe(listener: (value: T) => void): Unsubscribe {
    return source.subscribe(() => {
      try {
        listener(source.peekValue());
      } catch (error) {
        onListenerError(error);
      }
    });
  }

  return {
    getValue: source.peekValue,
    subscribe,
    next() {
      return new Promise<T>((resolve) => {
        const unsubscribe = subscribe((value) => {
          unsubscribe();
          resolve(value);
        });
      });
    },
  };
}
