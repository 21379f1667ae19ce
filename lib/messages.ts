/**
 * Display strings for validation errors.
 *
 * The controller holds a reference to one `FormMessages` object and never
 * hardcodes text. Built-in validator rules emit validation keys (see
 * `ValidationKeys`) which are turned into text here, at validation time, so a
 * swapped message set applies to the next validation run.
 */
export type FormMessages = {
  required(label: string): string;
  invalidFormat(label: string): string;
  invalidEmail(label: string): string;
  minLength(label: string, length: number): string;
  maxLength(label: string, length: number): string;
  minValue(label: string, min: number): string;
  maxValue(label: string, max: number): string;
  invalidSelection(label: string): string;
  validationFailed(reason: string): string;
  validating(): string;
  format(template: string, params: Readonly<Record<string, unknown>>): string;
};

const KEY_PREFIX = "formwright:";

export const ValidationKeys = {
  required: `${KEY_PREFIX}required`,
  invalidFormat: `${KEY_PREFIX}invalidFormat`,
  invalidEmail: `${KEY_PREFIX}invalidEmail`,
  minLength: `${KEY_PREFIX}minLength`,
  maxLength: `${KEY_PREFIX}maxLength`,
  min: `${KEY_PREFIX}min`,
  max: `${KEY_PREFIX}max`,
  invalidSelection: `${KEY_PREFIX}invalidSelection`,
} as const;

export type ValidationKey = (typeof ValidationKeys)[keyof typeof ValidationKeys];

/** `minLength` + 3 → `formwright:minLength:3`. */
export function withParam(key: ValidationKey, param: number): string {
  return `${key}:${param}`;
}

/** Replaces `{name}` placeholders; unknown placeholders are left as-is. */
export function formatMessage(
  template: string,
  params: Readonly<Record<string, unknown>>,
): string {
  return template.replaceAll(/\{(\w+)\}/g, (match, name: string) =>
    Object.prototype.hasOwnProperty.call(params, name)
      ? String(params[name])
      : match,
  );
}

export const defaultMessages: FormMessages = Object.freeze({
  required: (label: string) => `${label} is required`,
  invalidFormat: (label: string) => `${label} has an invalid format`,
  invalidEmail: (label: string) => `${label} must be a valid email address`,
  minLength: (label: string, length: number) =>
    `${label} must be at least ${length} characters`,
  maxLength: (label: string, length: number) =>
    `${label} must be at most ${length} characters`,
  minValue: (label: string, min: number) =>
    `${label} must be at least ${min}`,
  maxValue: (label: string, max: number) => `${label} must be at most ${max}`,
  invalidSelection: (label: string) => `${label} has an invalid selection`,
  validationFailed: (reason: string) => `Validation failed: ${reason}`,
  validating: () => "Validating...",
  format: formatMessage,
});

function parseKey(error: string): { key: string; param: number } | null {
  if (!error.startsWith(KEY_PREFIX)) {
    return null;
  }
  const [name = "", rawParam] = error.slice(KEY_PREFIX.length).split(":");
  return {
    key: `${KEY_PREFIX}${name}`,
    param: rawParam === undefined ? Number.NaN : Number(rawParam),
  };
}

/**
 * Turns a validator's output into display text: validation keys go through
 * the message set, then `{label}`/`{value}` placeholders are filled.
 */
export function resolveMessage(
  messages: FormMessages,
  error: string,
  params: { label: string; value: unknown },
): string {
  const parsed = parseKey(error);
  let text = error;
  if (parsed) {
    const { label } = params;
    switch (parsed.key) {
      case ValidationKeys.required: {
        text = messages.required(label);
        break;
      }
      case ValidationKeys.invalidFormat: {
        text = messages.invalidFormat(label);
        break;
      }
      case ValidationKeys.invalidEmail: {
        text = messages.invalidEmail(label);
        break;
      }
      case ValidationKeys.minLength: {
        text = messages.minLength(label, parsed.param);
        break;
      }
      case ValidationKeys.maxLength: {
        text = messages.maxLength(label, parsed.param);
        break;
      }
      case ValidationKeys.min: {
        text = messages.minValue(label, parsed.param);
        break;
      }
      case ValidationKeys.max: {
        text = messages.maxValue(label, parsed.param);
        break;
      }
      case ValidationKeys.invalidSelection: {
        text = messages.invalidSelection(label);
        break;
      }
    }
  }
  return messages.format(text, params);
}
