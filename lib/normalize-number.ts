/**
 * Generic number normalizer with bounds, integer coercion, and fallback.
 */
export function normalizeNumber(
  value: unknown,
  options: {
    fallback: number;
    min?: number;
    max?: number;
    integer?: "floor" | "ceil" | "round";
  },
): number {
  const { fallback, min, max, integer } = options;

  let normalized =
    typeof value === "number" && Number.isFinite(value) ? value : fallback;

  switch (integer) {
    case "ceil": {
      normalized = Math.ceil(normalized);
      break;
    }
    case "round": {
      normalized = Math.round(normalized);
      break;
    }
    case "floor": {
      normalized = Math.floor(normalized);
      break;
    }
  }

  if (typeof min === "number") {
    normalized = Math.max(min, normalized);
  }
  if (typeof max === "number") {
    normalized = Math.min(max, normalized);
  }
  return normalized;
}

/**
 * Debounce/throttle windows in milliseconds. Missing or non-finite values
 * fall back to `fallback`; negatives clamp to 0; decimals round.
 */
export function normalizeDelayMs(value: unknown, fallback = 0): number {
  return normalizeNumber(value, { fallback, min: 0, integer: "round" });
}

/**
 * Upper bound for bounded buffers such as the undo history. Always at least
 * one entry so the current values can be recorded.
 */
export function normalizeLimit(value: unknown, fallback: number): number {
  return normalizeNumber(value, { fallback, min: 1, integer: "floor" });
}

/** Step index for multi-step forms. */
export function normalizeStep(value: unknown): number {
  return normalizeNumber(value, { fallback: 0, min: 0, integer: "floor" });
}
