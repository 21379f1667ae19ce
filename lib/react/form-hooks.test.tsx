// @vitest-environment jsdom
import { act, cleanup, render, renderHook, waitFor } from "@testing-library/react";
import { Component, type ReactNode } from "react";
import { afterEach, describe, it, expect, vi } from "vitest";
import { createBatch } from "@lib/batch";
import { defineField } from "@lib/field-definition";
import { arrayFieldId, fieldId } from "@lib/field-id";
import { createFormController, type FormController } from "@lib/form-controller";
import type { FormSnapshot } from "@lib/form-snapshot";
import {
  FormProvider,
  useAsyncField,
  useField,
  useFormContext,
  useFormController,
  useFormSelector,
  useFormSnapshot,
} from "@lib/react/form-hooks";
import { validators } from "@lib/validators";

const name = fieldId<string>("name");
const age = fieldId<number>("age");

const nameField = defineField({
  id: name,
  initialValue: "",
  label: "Name",
  validator: validators.string().required().build(),
  validationMode: "onBlur",
});
const ageField = defineField({ id: age, initialValue: 0 });

const selectAge = (snapshot: FormSnapshot) => snapshot.values.get("age");

function createWrapper(controller: FormController) {
  return function Wrapper({ children }: { children: ReactNode }) {
    return <FormProvider controller={controller}>{children}</FormProvider>;
  };
}

class CatchError extends Component<
  { children: ReactNode; onError: (error: unknown) => void },
  { failed: boolean }
> {
  state = { failed: false };

  static getDerivedStateFromError() {
    return { failed: true };
  }

  componentDidCatch(error: unknown) {
    this.props.onError(error);
  }

  render() {
    return this.state.failed ? null : this.props.children;
  }
}

function captureRenderError(useHook: () => unknown): unknown {
  vi.spyOn(console, "error").mockImplementation(() => {});
  let caught: unknown;
  function Probe() {
    useHook();
    return null;
  }
  render(
    <CatchError
      onError={(error) => {
        caught = error;
      }}
    >
      <Probe />
    </CatchError>,
  );
  return caught;
}

afterEach(() => {
  cleanup();
  vi.restoreAllMocks();
});

describe(useFormController, () => {
  it("keeps one controller across renders and disposes it on unmount", () => {
    expect.hasAssertions();

    const { result, rerender, unmount } = renderHook(() =>
      useFormController({ fields: [ageField] }),
    );
    const first = result.current;

    rerender();

    expect(result.current).toBe(first);
    expect(first.getValue(age)).toBe(0);

    unmount();

    expect(first.isDisposed).toBe(true);
  });
});

describe(useFormSnapshot, () => {
  it("re-renders with every published snapshot", () => {
    expect.hasAssertions();

    const controller = createFormController({ fields: [ageField] });
    const { result } = renderHook(() => useFormSnapshot(controller));

    act(() => {
      controller.setValue(age, 36);
    });

    expect(result.current).toBe(controller.getSnapshot());
    expect(result.current.isDirty).toBe(true);
  });

  it("prefers an explicit controller over the provider's", () => {
    expect.hasAssertions();

    const fromContext = createFormController({ fields: [ageField] });
    const explicit = createFormController({ fields: [ageField] });
    explicit.setValue(age, 36);

    const { result } = renderHook(() => useFormSnapshot(explicit), {
      wrapper: createWrapper(fromContext),
    });

    expect(result.current).toBe(explicit.getSnapshot());
  });
});

describe(useFormSelector, () => {
  it("re-renders only when the selection changes", () => {
    expect.hasAssertions();

    const controller = createFormController({ fields: [nameField, ageField] });
    let renders = 0;
    const { result } = renderHook(() => {
      renders += 1;
      return useFormSelector(selectAge, { controller });
    });

    act(() => {
      controller.setValue(name, "Ada");
    });

    expect(renders).toBe(1);

    act(() => {
      controller.setValue(age, 36);
    });

    expect(renders).toBe(2);
    expect(result.current).toBe(36);
  });

  it("uses the equality option to keep the previous selection", () => {
    expect.hasAssertions();

    const controller = createFormController({ fields: [ageField] });
    let renders = 0;
    const { result } = renderHook(() => {
      renders += 1;
      return useFormSelector(selectAge, {
        controller,
        equality: () => true,
      });
    });

    act(() => {
      controller.setValue(age, 36);
    });

    expect(renders).toBe(1);
    expect(result.current).toBe(0);
  });
});

describe(useField, () => {
  it("registers the definition while mounted and preserves state after", () => {
    expect.hasAssertions();

    const controller = createFormController();
    const { result, unmount } = renderHook(() => useField(nameField, controller));

    expect(controller.isFieldRegistered(name)).toBe(true);
    expect(result.current.value).toBe("");

    act(() => {
      result.current.setValue("Ada");
    });

    expect(result.current.value).toBe("Ada");
    expect(result.current.isDirty).toBe(true);

    unmount();

    expect(controller.isFieldRegistered(name)).toBe(false);
    expect(controller.getValue(name)).toBe("Ada");
  });

  it("reads an already registered field from the provider", () => {
    expect.hasAssertions();

    const controller = createFormController({ fields: [nameField] });
    const { result } = renderHook(() => useField(name), {
      wrapper: createWrapper(controller),
    });

    expect(result.current.id).toBe(name);
    expect(result.current.validation.isValid).toBe(true);

    act(() => {
      result.current.markAsTouched();
    });

    expect(result.current.isTouched).toBe(true);
    expect(result.current.validation.errorMessage).toBe("Name is required");
  });

  it("renders the value of the published snapshot", () => {
    expect.hasAssertions();

    const controller = createFormController({ fields: [nameField, ageField] });
    const { result } = renderHook(() => useField(age, controller));

    act(() => {
      controller.applyBatch(createBatch().set(name, "Ada").set(age, 36));
    });

    expect(result.current.value).toBe(36);
    expect(result.current.value).toBe(controller.getSnapshot().values.get("age"));
    expect(result.current.isDirty).toBe(true);
  });

  it("throws without a controller", () => {
    expect.hasAssertions();

    const error = captureRenderError(() => useField(name));

    expect(error).toStrictEqual(
      new Error("useField needs a controller argument or a FormProvider"),
    );
  });
});

describe(useFormContext, () => {
  it("returns the provided controller", () => {
    expect.hasAssertions();

    const controller = createFormController();
    const { result } = renderHook(() => useFormContext(), {
      wrapper: createWrapper(controller),
    });

    expect(result.current).toBe(controller);
  });

  it("throws outside a provider", () => {
    expect.hasAssertions();

    const error = captureRenderError(() => useFormContext());

    expect(error).toStrictEqual(
      new Error("useFormContext must be used within a FormProvider"),
    );
  });
});

describe(useAsyncField, () => {
  const country = fieldId<string>("country");
  const cityOptions = arrayFieldId<string>("cityOptions");

  it("loads data into the field and stops on unmount", async () => {
    expect.hasAssertions();

    const controller = createFormController({
      fields: [
        defineField({ id: country, initialValue: "no" }),
        defineField({ id: cityOptions, initialValue: [] }),
      ],
    });
    const fetch = vi.fn((code: string | undefined) =>
      Promise.resolve([`${code ?? ""}-oslo`]),
    );
    const { result, rerender, unmount } = renderHook(() =>
      useAsyncField({ id: cityOptions, dependency: country, fetch }, controller),
    );

    await waitFor(() => {
      expect(result.current.status).toBe("data");
    });
    rerender();

    expect(result.current.value).toStrictEqual(["no-oslo"]);
    expect(controller.getValue(cityOptions)).toStrictEqual(["no-oslo"]);
    expect(fetch).toHaveBeenCalledTimes(1);

    act(() => {
      result.current.refresh();
    });

    expect(fetch).toHaveBeenCalledTimes(2);

    unmount();
    controller.setValue(country, "se");

    expect(fetch).toHaveBeenCalledTimes(2);
  });
});
