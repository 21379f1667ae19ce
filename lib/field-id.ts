// Phantom marker: never present at runtime, only carries `T` for the checker.
declare const FIELD_VALUE: unique symbol;

/**
 * Typed handle for a form field.
 *
 * Only `key` exists at runtime; two ids with the same key address the same
 * storage slot. The value type is checked at every read/write call site, and
 * by the controller's runtime type tag when the value arrives untyped.
 *
 * @example
 * const age = fieldId<number>("age");
 * controller.setValue(age, 21);
 */
export type FieldId<T> = {
  readonly key: string;
  readonly [FIELD_VALUE]?: (value: T) => T;
};

declare const ARRAY_FIELD: unique symbol;

/** Id of a field holding a list of `T`, with per-item ids. */
export type ArrayFieldId<T> = FieldId<T[]> & {
  readonly [ARRAY_FIELD]?: true;
};

/** Id whose value type is not statically known. */
export type AnyFieldId = { readonly key: string };

/** Extracts the value type of a field id. */
export type FieldValue<TId> = TId extends FieldId<infer T> ? T : never;

export function fieldId<T>(key: string): FieldId<T> {
  if (key.length === 0) {
    throw new TypeError("Field key must not be empty");
  }
  return Object.freeze({ key });
}

export function arrayFieldId<T>(key: string): ArrayFieldId<T> {
  if (key.length === 0) {
    throw new TypeError("Field key must not be empty");
  }
  return Object.freeze({ key });
}

export function isSameField(a: AnyFieldId, b: AnyFieldId): boolean {
  return a === b || a.key === b.key;
}

/** `user` + `name` → `user.name`. Useful for namespacing groups. */
export function withPrefix<T>(id: FieldId<T>, prefix: string): FieldId<T> {
  return fieldId<T>(`${prefix}.${id.key}`);
}

export function itemId<T>(id: ArrayFieldId<T>, index: number): FieldId<T> {
  return fieldId<T>(`${id.key}[${index}]`);
}

/** `user.address.city` → `user.address`; `null` for top-level keys. */
export function parentKey(id: AnyFieldId): string | null {
  const lastDot = id.key.lastIndexOf(".");
  return lastDot === -1 ? null : id.key.slice(0, lastDot);
}

/** `user.address.city` → `city`. */
export function localName(id: AnyFieldId): string {
  const lastDot = id.key.lastIndexOf(".");
  return lastDot === -1 ? id.key : id.key.slice(lastDot + 1);
}
