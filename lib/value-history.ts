import { invariant } from "@lib/errors";

type Values = ReadonlyMap<string, unknown>;

/**
 * Linear undo/redo list of value maps.
 *
 * The entry under the cursor always mirrors the controller's current values.
 * Recording while the cursor is behind the tail drops the redo branch first;
 * once `limit` entries are stored the oldest one is discarded.
 */
export type ValueHistory = {
  readonly cursor: number;
  readonly length: number;
  readonly canUndo: boolean;
  readonly canRedo: boolean;
  record(values: Values): void;
  /** Overwrites the current entry without creating an undo step. */
  replaceCurrent(values: Values): void;
  undo(): Values | null;
  redo(): Values | null;
  /** Drops every entry and starts over from `values`. */
  clear(values: Values): void;
};

export function createValueHistory(initial: Values, limit: number): ValueHistory {
  invariant(limit >= 1, "history limit must be at least 1");

  let entries: Values[] = [initial];
  let cursor = 0;

  function current() {
    const entry = entries[cursor];
    invariant(entry, "history cursor out of range");
    return entry;
  }

  return {
    get cursor() {
      return cursor;
    },
    get length() {
      return entries.length;
    },
    get canUndo() {
      return cursor > 0;
    },
    get canRedo() {
      return cursor < entries.length - 1;
    },
    record(values) {
      entries = entries.slice(0, cursor + 1);
      entries.push(values);
      if (entries.length > limit) {
        entries = entries.slice(entries.length - limit);
      }
      cursor = entries.length - 1;
    },
    replaceCurrent(values) {
      entries[cursor] = values;
    },
    undo() {
      if (cursor === 0) {
        return null;
      }
      cursor -= 1;
      return current();
    },
    redo() {
      if (cursor >= entries.length - 1) {
        return null;
      }
      cursor += 1;
      return current();
    },
    clear(values) {
      entries = [values];
      cursor = 0;
    },
  };
}
