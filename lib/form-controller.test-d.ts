import { describe, expectTypeOf, it } from "vitest";
import { createAsyncField, type AsyncFieldState } from "@lib/async-field";
import { defineField, type FieldDefinition } from "@lib/field-definition";
import {
  arrayFieldId,
  fieldId,
  type FieldId,
  type FieldValue,
} from "@lib/field-id";
import { createFormController } from "@lib/form-controller";
import type { UseFieldReturn } from "@lib/react/form-hooks";

const age = fieldId<number>("age");
const tags = arrayFieldId<string>("tags");

describe("field ids", () => {
  it("carry their value type", () => {
    expectTypeOf<FieldValue<typeof age>>().toEqualTypeOf<number>();
    expectTypeOf(tags).toExtend<FieldId<string[]>>();
  });

  it("infer the definition type from the id", () => {
    const definition = defineField({ id: age, initialValue: 1 });

    expectTypeOf(definition).toEqualTypeOf<FieldDefinition<number>>();
  });
});

describe("controller", () => {
  const controller = createFormController({
    fields: [defineField({ id: age, initialValue: 1 })],
  });

  it("reads values as the field's type", () => {
    expectTypeOf(controller.getValue(age)).toEqualTypeOf<number | undefined>();
    expectTypeOf(controller.getValue(tags)).toEqualTypeOf<
      string[] | undefined
    >();
  });

  it("rejects values of another type", () => {
    // @ts-expect-error age holds numbers
    controller.setValue(age, "ten");
    // @ts-expect-error tags hold strings
    controller.addArrayItem(tags, 1);
  });

  it("types async field state by the field", () => {
    const field = createAsyncField(controller, {
      id: tags,
      fetch: () => Promise.resolve(["a"]),
    });

    expectTypeOf(field.getState()).toEqualTypeOf<AsyncFieldState<string[]>>();
  });

  it("types useField by the id", () => {
    expectTypeOf<UseFieldReturn<number>["value"]>().toEqualTypeOf<
      number | undefined
    >();
  });
});
