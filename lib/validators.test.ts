import { describe, it, expect, vi } from "vitest";
import { z } from "zod";
import { ValidationKeys, withParam } from "@lib/messages";
import { validators } from "@lib/validators";

const context = { signal: new AbortController().signal };

describe("validators.string", () => {
  it("requires a non-blank value", () => {
    expect.hasAssertions();

    const validate = validators.string().required().build();

    expect(validate(undefined)).toBe(ValidationKeys.required);
    expect(validate("   ")).toBe(ValidationKeys.required);
    expect(validate("Ada")).toBeNull();
  });

  it("lets empty values through rules other than required", () => {
    expect.hasAssertions();

    const validate = validators.string().email().minLength(3).build();

    expect(validate("")).toBeNull();
    expect(validate(undefined)).toBeNull();
  });

  it("reports the first failing rule", () => {
    expect.hasAssertions();

    const validate = validators.string().minLength(5).email().build();

    expect(validate("a@b")).toBe(withParam(ValidationKeys.minLength, 5));
    expect(validate("ada@x")).toBe(ValidationKeys.invalidEmail);
    expect(validate("ada@example.com")).toBeNull();
  });

  it("checks maximum length and patterns", () => {
    expect.hasAssertions();

    const validate = validators
      .string()
      .maxLength(4)
      .pattern(/^\d+$/g)
      .build();

    expect(validate("12345")).toBe(withParam(ValidationKeys.maxLength, 4));
    expect(validate("12a")).toBe(ValidationKeys.invalidFormat);
    // a global pattern matches on every call
    expect(validate("12")).toBeNull();
    expect(validate("12")).toBeNull();
  });

  it("prefers a custom message", () => {
    expect.hasAssertions();

    const validate = validators.string().required("Tell us your name").build();

    expect(validate("")).toBe("Tell us your name");
  });

  it("runs a standard schema", () => {
    expect.hasAssertions();

    const validate = validators
      .string()
      .schema(z.string().regex(/^[a-z]+$/, "lowercase only"))
      .build();

    expect(validate("Ada")).toBe("lowercase only");
    expect(validate("ada")).toBeNull();
  });

  it("keeps earlier chains unchanged", () => {
    expect.hasAssertions();

    const base = validators.string();
    const strict = base.required();

    expect(base.build()(undefined)).toBeNull();
    expect(strict.build()(undefined)).toBe(ValidationKeys.required);
  });
});

describe("validators.number", () => {
  it("checks bounds", () => {
    expect.hasAssertions();

    const validate = validators.number().min(18).max(130).build();

    expect(validate(17)).toBe(withParam(ValidationKeys.min, 18));
    expect(validate(131)).toBe(withParam(ValidationKeys.max, 130));
    expect(validate(40)).toBeNull();
    expect(validate(undefined)).toBeNull();
  });

  it("treats positive as zero or greater", () => {
    expect.hasAssertions();

    const validate = validators.number().positive().build();

    expect(validate(0)).toBeNull();
    expect(validate(-1)).toBe(withParam(ValidationKeys.min, 0));
  });
});

describe("validators.any", () => {
  it("checks membership and custom rules", () => {
    expect.hasAssertions();

    const validate = validators
      .any<"draft" | "sent" | "archived">()
      .oneOf(["draft", "sent"])
      .custom((value) => (value === "sent" ? "Already sent" : null))
      .build();

    expect(validate("archived")).toBe(ValidationKeys.invalidSelection);
    expect(validate("sent")).toBe("Already sent");
    expect(validate("draft")).toBeNull();
  });
});

describe("buildAsync", () => {
  it("skips async rules when a sync rule fails", async () => {
    expect.hasAssertions();

    const isTaken = vi.fn(() => Promise.resolve("taken"));
    const validate = validators.string().minLength(3).async(isTaken).buildAsync();

    await expect(validate("ab", context)).resolves.toBeNull();
    expect(isTaken).not.toHaveBeenCalled();
  });

  it("returns the first async error", async () => {
    expect.hasAssertions();

    const first = vi.fn(() => Promise.resolve(null));
    const second = vi.fn(() => Promise.resolve("Username is taken"));
    const validate = validators
      .string()
      .required()
      .async(first)
      .async(second)
      .buildAsync();

    await expect(validate("ada", context)).resolves.toBe("Username is taken");
    expect(first).toHaveBeenCalledWith("ada", context);
  });
});
