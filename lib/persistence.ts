import { isPlainObject } from "@lib/equality";

/**
 * Storage back end for form values. The controller loads once when it is
 * created and saves on a debounced schedule after value changes. Failures
 * are logged by the controller and never surface as form errors.
 */
export type FormPersistence = {
  save(formId: string, values: Readonly<Record<string, unknown>>): Promise<void>;
  load(formId: string): Promise<Record<string, unknown> | null>;
  clear(formId: string): Promise<void>;
};

function copyValue(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map(copyValue);
  }
  if (value instanceof Date) {
    return new Date(value.getTime());
  }
  if (isPlainObject(value)) {
    return copyRecord(value);
  }
  return value;
}

function copyRecord(
  record: Readonly<Record<string, unknown>>,
): Record<string, unknown> {
  const copy: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(record)) {
    copy[key] = copyValue(value);
  }
  return copy;
}

/**
 * Keeps saved forms in a `Map`. Values are deep-copied on the way in and
 * out, so neither the controller nor callers can mutate what is stored.
 */
export class InMemoryFormPersistence implements FormPersistence {
  readonly #storage = new Map<string, Record<string, unknown>>();

  save(formId: string, values: Readonly<Record<string, unknown>>) {
    this.#storage.set(formId, copyRecord(values));
    return Promise.resolve();
  }

  load(formId: string) {
    const stored = this.#storage.get(formId);
    return Promise.resolve(stored ? copyRecord(stored) : null);
  }

  clear(formId: string) {
    this.#storage.delete(formId);
    return Promise.resolve();
  }
}
