import { afterEach, describe, it, expect, vi } from "vitest";
import {
  defineField,
  type AsyncValidator,
  type ValidatorResult,
} from "@lib/field-definition";
import { fieldId } from "@lib/field-id";
import { createFormController } from "@lib/form-controller";
import { VALID, VALIDATING, invalid } from "@lib/validation-result";
import { validators } from "@lib/validators";

const username = fieldId<string>("username");

type PendingCheck = {
  value: string | undefined;
  signal: AbortSignal;
  resolve: (error: ValidatorResult) => void;
};

/** Async validator whose calls stay in flight until the test resolves them. */
function createDeferredValidator() {
  const calls: PendingCheck[] = [];
  const validator: AsyncValidator<string> = (value, { signal }) =>
    new Promise<ValidatorResult>((resolve) => {
      calls.push({ value, signal, resolve });
    });
  return { calls, validator };
}

function createUsernameController(
  asyncValidator: AsyncValidator<string>,
  debounceMs?: number,
) {
  return createFormController({
    fields: [
      defineField({
        id: username,
        initialValue: "",
        label: "Username",
        validator: validators.string().required().build(),
        asyncValidator,
        debounceMs,
      }),
    ],
  });
}

const flush = () =>
  new Promise<void>((resolve) => {
    setTimeout(resolve, 0);
  });

afterEach(() => {
  vi.useRealTimers();
});

describe("async validation", () => {
  it("runs after the debounce window", async () => {
    expect.hasAssertions();

    vi.useFakeTimers();
    const check = vi.fn((value: string | undefined) =>
      Promise.resolve(value === "taken" ? "Username is taken" : null),
    );
    const controller = createUsernameController(check);

    controller.setValue(username, "taken");

    expect(controller.getValidation(username)).toBe(VALIDATING);
    expect(controller.isFieldPending(username)).toBe(true);

    await vi.advanceTimersByTimeAsync(299);

    expect(check).not.toHaveBeenCalled();

    await vi.advanceTimersByTimeAsync(1);

    expect(check).toHaveBeenCalledTimes(1);
    expect(controller.getValidation(username)).toStrictEqual(
      invalid("Username is taken"),
    );
    expect(controller.getSnapshot().isValidating).toBe(false);
  });

  it("restarts the debounce on every change", async () => {
    expect.hasAssertions();

    vi.useFakeTimers();
    const check = vi.fn(() => Promise.resolve(null));
    const controller = createUsernameController(check, 100);

    controller.setValue(username, "a");
    await vi.advanceTimersByTimeAsync(60);
    controller.setValue(username, "ab");
    await vi.advanceTimersByTimeAsync(60);

    expect(check).not.toHaveBeenCalled();

    await vi.advanceTimersByTimeAsync(40);

    expect(check).toHaveBeenCalledTimes(1);
    expect(check).toHaveBeenCalledWith("ab", expect.anything());
  });

  it("skips the async validator at registration", () => {
    expect.hasAssertions();

    const check = vi.fn(() => Promise.resolve(null));
    const controller = createFormController({
      fields: [
        defineField({ id: username, initialValue: "ada", asyncValidator: check }),
      ],
    });

    expect(check).not.toHaveBeenCalled();
    expect(controller.getValidation(username)).toBe(VALID);
  });

  it("ignores results of superseded runs", async () => {
    expect.hasAssertions();

    const { calls, validator } = createDeferredValidator();
    const controller = createUsernameController(validator, 0);

    controller.setValue(username, "a");
    controller.setValue(username, "ab");

    expect(calls.map((call) => call.value)).toStrictEqual(["a", "ab"]);
    expect(calls[0].signal.aborted).toBe(true);

    calls[0].resolve("Username is taken");
    await flush();

    expect(controller.getValidation(username)).toBe(VALIDATING);

    calls[1].resolve(null);
    await flush();

    expect(controller.getValidation(username)).toBe(VALID);
  });

  it("cancels the async run when sync validation fails", () => {
    expect.hasAssertions();

    const { calls, validator } = createDeferredValidator();
    const controller = createUsernameController(validator, 0);

    controller.setValue(username, "ada");
    controller.setValue(username, " ");

    expect(calls[0].signal.aborted).toBe(true);
    expect(calls).toHaveLength(1);
    expect(controller.getValidation(username)).toStrictEqual(
      invalid("Username is required"),
    );
  });

  it("starts a debounced run at once on validate()", () => {
    expect.hasAssertions();

    const check = vi.fn(() => Promise.resolve(null));
    const controller = createUsernameController(check);
    controller.setValue(username, "ada");

    expect(check).not.toHaveBeenCalled();
    expect(controller.validate()).toBe(true);
    expect(check).toHaveBeenCalledTimes(1);
  });

  it("reuses a settled result for the same value", async () => {
    expect.hasAssertions();

    const check = vi.fn(() => Promise.resolve("Username is taken"));
    const controller = createUsernameController(check, 0);
    controller.setValue(username, "taken");
    await flush();

    expect(controller.validate()).toBe(false);
    expect(check).toHaveBeenCalledTimes(1);
    expect(controller.getValidation(username).errorMessage).toBe(
      "Username is taken",
    );
  });

  it("reports a rejected validator and retries it next time", async () => {
    expect.hasAssertions();

    const check = vi.fn(() => Promise.reject(new Error("offline")));
    const controller = createUsernameController(check, 0);
    controller.setValue(username, "ada");
    await flush();

    expect(controller.getValidation(username)).toStrictEqual(
      invalid("Validation failed: offline"),
    );

    controller.validate();
    await flush();

    expect(check).toHaveBeenCalledTimes(2);
  });

  it("drops a late result after reset with clearErrors", async () => {
    expect.hasAssertions();

    const { calls, validator } = createDeferredValidator();
    const controller = createUsernameController(validator, 0);
    controller.setValue(username, "taken");

    controller.reset({ clearErrors: true });
    calls[0].resolve("Username is taken");
    await flush();

    expect(calls[0].signal.aborted).toBe(true);
    expect(controller.getValidation(username)).toBe(VALID);
    expect(controller.getValue(username)).toBe("");
  });

  it("cancels in-flight runs on dispose", () => {
    expect.hasAssertions();

    const { calls, validator } = createDeferredValidator();
    const controller = createUsernameController(validator, 0);
    controller.setValue(username, "ada");

    controller.dispose();

    expect(calls[0].signal.aborted).toBe(true);
  });
});
