import type { AnyFieldId, FieldId } from "@lib/field-id";
import { VALID, type ValidationResult } from "@lib/validation-result";

/**
 * One immutable, complete picture of the form.
 *
 * The controller never mutates a published snapshot; every change produces a
 * new object, so listeners can compare old and new by reference, slice by
 * slice.
 */
export type FormSnapshot = {
  readonly values: ReadonlyMap<string, unknown>;
  readonly validations: ReadonlyMap<string, ValidationResult>;
  readonly dirty: ReadonlyMap<string, boolean>;
  readonly touched: ReadonlyMap<string, boolean>;
  readonly pending: ReadonlyMap<string, boolean>;
  readonly isSubmitting: boolean;
  /** Keys whose value changed (or that were re-validated because of it). */
  readonly changedFields: ReadonlySet<string>;
  readonly historyCursor: number;
  readonly currentStep: number;
  readonly resetCount: number;
  readonly submitCount: number;
  readonly isValid: boolean;
  readonly isDirty: boolean;
  readonly isPending: boolean;
  readonly isValidating: boolean;
};

export type SnapshotParts = Omit<
  FormSnapshot,
  "isValid" | "isDirty" | "isPending" | "isValidating"
>;

function some<V>(map: ReadonlyMap<string, V>, test: (v: V) => boolean) {
  for (const value of map.values()) {
    if (test(value)) {
      return true;
    }
  }
  return false;
}

/** Freezes the parts and derives the aggregate flags. */
export function createSnapshot(parts: SnapshotParts): FormSnapshot {
  return Object.freeze({
    ...parts,
    isValid: !some(parts.validations, (v) => !v.isValid),
    isDirty: some(parts.dirty, Boolean),
    isPending: some(parts.pending, Boolean),
    isValidating: some(parts.validations, (v) => v.isValidating),
  });
}

export const EMPTY_SNAPSHOT: FormSnapshot = createSnapshot({
  values: new Map(),
  validations: new Map(),
  dirty: new Map(),
  touched: new Map(),
  pending: new Map(),
  isSubmitting: false,
  changedFields: new Set(),
  historyCursor: 0,
  currentStep: 0,
  resetCount: 0,
  submitCount: 0,
});

// =====================================
// Read projections
// =====================================

/**
 * Field slots are type-checked against their runtime tag on every write, so
 * a value read back through a `FieldId<T>` is a `T` (or absent).
 */
export function readFieldValue<T>(
  values: ReadonlyMap<string, unknown>,
  id: FieldId<T>,
): T | undefined {
  return values.get(id.key) as T | undefined;
}

export function readValue<T>(
  snapshot: FormSnapshot,
  id: FieldId<T>,
): T | undefined {
  return readFieldValue(snapshot.values, id);
}

export function readValidation(
  snapshot: FormSnapshot,
  id: AnyFieldId,
): ValidationResult {
  return snapshot.validations.get(id.key) ?? VALID;
}

export function readDirty(snapshot: FormSnapshot, id: AnyFieldId): boolean {
  return snapshot.dirty.get(id.key) ?? false;
}

export function readTouched(snapshot: FormSnapshot, id: AnyFieldId): boolean {
  return snapshot.touched.get(id.key) ?? false;
}

/** Pending covers explicit pending work and in-flight async validation. */
export function readPending(snapshot: FormSnapshot, id: AnyFieldId): boolean {
  return (
    (snapshot.pending.get(id.key) ?? false) ||
    readValidation(snapshot, id).isValidating
  );
}

export function valuesToRecord(
  values: ReadonlyMap<string, unknown>,
): Record<string, unknown> {
  return Object.fromEntries(values);
}

export function validationsToRecord(
  validations: ReadonlyMap<string, ValidationResult>,
): Record<string, ValidationResult> {
  return Object.fromEntries(validations);
}

// =====================================
// Groups and nesting
// =====================================

function inGroup(key: string, prefix: string) {
  return key.startsWith(`${prefix}.`) || key.startsWith(`${prefix}[`);
}

/** `true` when every field under `prefix.` is valid. */
export function isGroupValid(snapshot: FormSnapshot, prefix: string): boolean {
  for (const [key, result] of snapshot.validations) {
    if (inGroup(key, prefix) && !result.isValid) {
      return false;
    }
  }
  return true;
}

export function isGroupDirty(snapshot: FormSnapshot, prefix: string): boolean {
  for (const [key, isDirty] of snapshot.dirty) {
    if (inGroup(key, prefix) && isDirty) {
      return true;
    }
  }
  return false;
}

const PATH_SEGMENT = /([^.[\]]+)|\[(\d+)\]/g;

function parsePath(key: string): (string | number)[] {
  const segments: (string | number)[] = [];
  for (const match of key.matchAll(PATH_SEGMENT)) {
    const [, name, index] = match;
    if (index !== undefined) {
      segments.push(Number(index));
    } else if (name !== undefined) {
      segments.push(name);
    }
  }
  return segments;
}

type Container = Record<string, unknown> | unknown[];

function isContainer(value: unknown): value is Container {
  return typeof value === "object" && value !== null;
}

function writeSegment(
  container: Container,
  segment: string | number,
  value: unknown,
) {
  if (Array.isArray(container) && typeof segment === "number") {
    container[segment] = value;
    return;
  }
  Reflect.set(container, segment, value);
}

function readSegment(
  container: Container,
  segment: string | number,
): unknown {
  return Reflect.get(container, segment);
}

/**
 * Expands flat keys (`user.name`, `tags[0]`) into nested objects and arrays.
 */
export function toNestedValues(
  snapshot: FormSnapshot,
): Record<string, unknown> {
  const root: Record<string, unknown> = {};
  for (const [key, value] of snapshot.values) {
    const segments = parsePath(key);
    let current: Container = root;
    for (const [i, segment] of segments.entries()) {
      if (i === segments.length - 1) {
        writeSegment(current, segment, value);
        break;
      }
      const next = readSegment(current, segment);
      if (isContainer(next)) {
        current = next;
        continue;
      }
      const created: Container =
        typeof segments[i + 1] === "number" ? [] : {};
      writeSegment(current, segment, created);
      current = created;
    }
  }
  return root;
}
