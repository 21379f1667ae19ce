/**
 * Receives form lifecycle events. Every hook is optional so an
 * implementation can listen to just the events it cares about.
 */
export type FormAnalytics = {
  onFormStarted?(formId: string | undefined): void;
  onFieldChanged?(formId: string | undefined, key: string, value: unknown): void;
  onFieldTouched?(formId: string | undefined, key: string): void;
  onSubmitAttempt?(
    formId: string | undefined,
    values: Readonly<Record<string, unknown>>,
  ): void;
  onSubmitSuccess?(formId: string | undefined): void;
  onSubmitFailure?(
    formId: string | undefined,
    errors: Readonly<Record<string, string | null>>,
  ): void;
  /** `elapsedMs` runs from controller creation to disposal. */
  onFormAbandoned?(formId: string | undefined, elapsedMs: number): void;
};

function describeValue(value: unknown): string {
  try {
    return (
      JSON.stringify(value, (_key, item: unknown) =>
        typeof item === "bigint" ? `${item}n` : item,
      ) ?? "undefined"
    );
  } catch {
    // circular structures
    return String(value);
  }
}

export type ConsoleAnalyticsOptions = {
  prefix?: string;
  enabled?: boolean;
  log?: (message: string) => void;
};

/**
 * Logs every event through `console.info` (or `log`). Intended for
 * development; disabled when `NODE_ENV` is `production` unless `enabled`
 * is passed explicitly.
 */
export function createConsoleAnalytics(
  options: ConsoleAnalyticsOptions = {},
): Required<FormAnalytics> {
  const {
    prefix = "formwright",
    enabled = process.env.NODE_ENV !== "production",
    log = (message: string) => {
      console.info(message);
    },
  } = options;

  function emit(message: string) {
    if (enabled) {
      log(`[${prefix}] ${message}`);
    }
  }

  return {
    onFormStarted(formId) {
      emit(`Form Started: ${formId ?? "unknown"}`);
    },
    onFieldChanged(_formId, key, value) {
      emit(`Field Changed [${key}]: ${describeValue(value)}`);
    },
    onFieldTouched(_formId, key) {
      emit(`Field Touched [${key}]`);
    },
    onSubmitAttempt(_formId, values) {
      emit(`Submit Attempt: ${describeValue(values)}`);
    },
    onSubmitSuccess() {
      emit("Submit Success");
    },
    onSubmitFailure(_formId, errors) {
      emit(`Submit Failure. Errors: ${describeValue(errors)}`);
    },
    onFormAbandoned(formId, elapsedMs) {
      emit(
        `Form Abandoned after ${Math.round(elapsedMs / 1000)}s (FormId: ${formId ?? "unknown"})`,
      );
    },
  };
}
