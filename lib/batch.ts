import type { FieldDefinition } from "@lib/field-definition";
import type { FieldId } from "@lib/field-id";

export const FIELD_NOT_REGISTERED = "Field not registered";

/** Outcome of a non-strict `setValues`/`applyBatch`. */
export type BulkUpdateResult = {
  /** `true` when every entry was applied. */
  readonly success: boolean;
  readonly updatedFields: ReadonlySet<string>;
  /** Key → type mismatch description. */
  readonly typeMismatches: ReadonlyMap<string, string>;
  /** Keys that were supplied but are not registered. */
  readonly missingFields: ReadonlySet<string>;
  /** Mismatches and missing keys merged into one key → message map. */
  readonly errors: ReadonlyMap<string, string>;
};

export function createBulkUpdateResult(parts: {
  updatedFields: ReadonlySet<string>;
  typeMismatches: ReadonlyMap<string, string>;
  missingFields: ReadonlySet<string>;
}): BulkUpdateResult {
  const errors = new Map(parts.typeMismatches);
  for (const key of parts.missingFields) {
    errors.set(key, FIELD_NOT_REGISTERED);
  }
  return Object.freeze({ ...parts, success: errors.size === 0, errors });
}

/**
 * Collects typed updates for `applyBatch`. `set` is checked at compile time
 * against the field id's value type.
 *
 * @example
 * const batch = createBatch().set(name, "Ada").set(age, 36);
 * controller.applyBatch(batch);
 */
export type FormBatch = {
  set<T>(id: FieldId<T>, value: T): FormBatch;
  setField<T>(definition: FieldDefinition<T>, value: T): FormBatch;
  /** Untyped entries, checked only at runtime by the controller. */
  addAll(values: Readonly<Record<string, unknown>>): FormBatch;
  readonly updates: ReadonlyMap<string, unknown>;
  readonly size: number;
};

export function createBatch(): FormBatch {
  const updates = new Map<string, unknown>();

  const batch: FormBatch = {
    set(id, value) {
      updates.set(id.key, value);
      return batch;
    },
    setField(definition, value) {
      updates.set(definition.id.key, value);
      return batch;
    },
    addAll(values) {
      for (const [key, value] of Object.entries(values)) {
        updates.set(key, value);
      }
      return batch;
    },
    get updates() {
      return new Map(updates);
    },
    get size() {
      return updates.size;
    },
  };
  return batch;
}
