/**
 * @module field-type
 *
 * Runtime type tags for field storage. Values live untyped in the
 * controller's maps; the tag recorded at registration is checked on every
 * write so that a `FieldId<number>` slot never silently receives a string.
 */

export type PrimitiveFieldType =
  | "string"
  | "number"
  | "boolean"
  | "bigint"
  | "date"
  | "array"
  | "object"
  | "function"
  | "any";

/** Accepts any value the guard accepts; the way to type union fields. */
export type FieldTypeGuard<T = unknown> = {
  name: string;
  is: (value: unknown) => value is T;
};

/** Accepts instances of the class and of its subclasses. */
export type FieldTypeClass = abstract new (...args: never[]) => unknown;

export type FieldType = PrimitiveFieldType | FieldTypeGuard | FieldTypeClass;

export const ANY_TYPE: PrimitiveFieldType = "any";

function isFieldTypeGuard(type: FieldType): type is FieldTypeGuard {
  return typeof type === "object";
}

export function inferFieldType(value: unknown): FieldType {
  if (value === null || value === undefined) {
    return ANY_TYPE;
  }
  switch (typeof value) {
    case "string": {
      return "string";
    }
    case "number": {
      return "number";
    }
    case "boolean": {
      return "boolean";
    }
    case "bigint": {
      return "bigint";
    }
    case "function": {
      return "function";
    }
    case "symbol": {
      return ANY_TYPE;
    }
  }
  if (value instanceof Date) {
    return "date";
  }
  if (Array.isArray(value)) {
    return "array";
  }
  const proto: unknown = Object.getPrototypeOf(value);
  if (proto === Object.prototype || proto === null) {
    return "object";
  }
  const ctor: unknown = Reflect.get(value, "constructor");
  return typeof ctor === "function" && isClassConstructor(ctor)
    ? ctor
    : "object";
}

function isClassConstructor(fn: unknown): fn is FieldTypeClass {
  return typeof fn === "function" && fn.prototype !== undefined;
}

/**
 * `null` and `undefined` are accepted by every type: field values are
 * always optional.
 */
export function acceptsValue(type: FieldType, value: unknown): boolean {
  if (value === null || value === undefined) {
    return true;
  }
  if (isFieldTypeGuard(type)) {
    return type.is(value);
  }
  if (typeof type === "function") {
    return value instanceof type;
  }
  switch (type) {
    case "any": {
      return true;
    }
    case "date": {
      return value instanceof Date;
    }
    case "array": {
      return Array.isArray(value);
    }
    case "object": {
      return typeof value === "object" && !Array.isArray(value);
    }
    default: {
      return typeof value === type;
    }
  }
}

export function describeFieldType(type: FieldType): string {
  if (isFieldTypeGuard(type)) {
    return type.name;
  }
  if (typeof type === "function") {
    return type.name || "anonymous class";
  }
  return type;
}

export function describeValueType(value: unknown): string {
  if (value === null) {
    return "null";
  }
  const inferred = inferFieldType(value);
  return describeFieldType(inferred);
}

/** Builds a guard for a fixed set of literal values, e.g. a status union. */
export function oneOfType<const T extends readonly unknown[]>(
  name: string,
  members: T,
): FieldTypeGuard<T[number]> {
  return {
    name,
    is: (value: unknown): value is T[number] => members.includes(value),
  };
}
