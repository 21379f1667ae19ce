import type { StandardSchemaV1 } from "@standard-schema/spec";

/**
 * Runs a Standard Schema (zod, valibot, arktype…) synchronously and returns
 * the issues, or `undefined` when the input passes.
 */
export function standardValidate<TSchema extends StandardSchemaV1>(
  schema: TSchema,
  input: unknown,
): readonly StandardSchemaV1.Issue[] | undefined {
  const result = schema["~standard"].validate(input);

  if (result instanceof Promise) {
    throw new TypeError("Schema validation must be synchronous");
  }

  if (!result.issues) {
    return;
  }

  return result.issues;
}

/**
 * Field validators report a single message; the first issue wins.
 */
export function firstIssueMessage(
  issues: readonly StandardSchemaV1.Issue[] | undefined,
): string | null {
  if (!issues || issues.length === 0) {
    return null;
  }
  return issues[0]?.message ?? null;
}
