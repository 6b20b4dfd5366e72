import type { z } from "zod";

/**
 * Flattens zod issues into `path: message` strings.
 */
export const formatIssues = (error: z.ZodError): string[] =>
  error.issues.map((issue) => {
    const path = issue.path.join(".") || "(root)";
    return `${path}: ${issue.message}`;
  });

/**
 * Validates the supplied payload against the provided schema.
 *
 * @param schema - Zod schema used for validation.
 * @param value - Candidate payload to validate.
 * @param label - Descriptive label for error reporting.
 * @returns The validated payload typed as {@link T}.
 * @throws Error when validation fails.
 */
export function assertValid<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  value: unknown,
  label = "payload",
): T {
  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    throw new Error(`Invalid ${label}: ${formatIssues(parsed.error).join("; ")}`);
  }
  return parsed.data;
}
