/**
 * Contextual Validation Utilities
 *
 * Zod validation wrapper that reports failures as ValidationError,
 * naming the operation whose options were rejected.
 */

import { type ZodError, type ZodType } from "zod";

import { ValidationError, type ValidationIssue } from "./index";

/**
 * Converts Zod issues to ValidationIssue format.
 */
function zodIssuesToValidationIssues(error: ZodError): ValidationIssue[] {
  return error.issues.map((issue) => ({
    path: issue.path.join("."),
    message: issue.message,
    code: issue.code,
  }));
}

/**
 * Validates an options object for the named operation.
 *
 * @param schema - Zod schema to validate against
 * @param value - Value to validate
 * @param operation - Operation name used in the error message
 * @returns Validated and transformed value
 * @throws ValidationError if validation fails
 *
 * @example
 * ```typescript
 * const options = validateOptions(generatorOptionsSchema, input, "createIdGenerator");
 * ```
 */
export function validateOptions<T>(
  schema: ZodType<T>,
  value: unknown,
  operation: string,
): T {
  const result = schema.safeParse(value);

  if (result.success) {
    return result.data;
  }

  const issues = zodIssuesToValidationIssues(result.error);
  const fields = issues.map((issue) => issue.path || "(root)").join(", ");

  throw new ValidationError(
    `Invalid options for ${operation}: ${fields}`,
    { issues },
    { cause: result.error },
  );
}
