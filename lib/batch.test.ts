import { describe, it, expect } from "vitest";
import {
  FIELD_NOT_REGISTERED,
  createBatch,
  createBulkUpdateResult,
} from "@lib/batch";
import { defineField } from "@lib/field-definition";
import { fieldId } from "@lib/field-id";

describe(createBatch, () => {
  it("collects typed and untyped updates, last write wins", () => {
    expect.hasAssertions();

    const name = fieldId<string>("name");
    const age = defineField({ id: fieldId<number>("age"), initialValue: 0 });

    const batch = createBatch()
      .set(name, "Ada")
      .setField(age, 36)
      .addAll({ name: "Grace", extra: true });

    expect(batch.size).toBe(3);
    expect(Object.fromEntries(batch.updates)).toStrictEqual({
      name: "Grace",
      age: 36,
      extra: true,
    });
  });

  it("hands out copies of its updates", () => {
    expect.hasAssertions();

    const batch = createBatch().set(fieldId<string>("name"), "Ada");
    const updates = batch.updates;
    batch.set(fieldId<string>("city"), "Oslo");

    expect(updates.size).toBe(1);
  });
});

describe(createBulkUpdateResult, () => {
  it("merges mismatches and missing keys into errors", () => {
    expect.hasAssertions();

    const result = createBulkUpdateResult({
      updatedFields: new Set(["name"]),
      typeMismatches: new Map([["age", "wrong type"]]),
      missingFields: new Set(["ghost"]),
    });

    expect(result.success).toBe(false);
    expect(Object.fromEntries(result.errors)).toStrictEqual({
      age: "wrong type",
      ghost: FIELD_NOT_REGISTERED,
    });
  });

  it("succeeds when nothing was rejected", () => {
    expect.hasAssertions();

    const result = createBulkUpdateResult({
      updatedFields: new Set(["name"]),
      typeMismatches: new Map(),
      missingFields: new Set(),
    });

    expect(result.success).toBe(true);
    expect(result.errors.size).toBe(0);
  });
});
