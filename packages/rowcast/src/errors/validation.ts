/**
 * Zod validation wrappers that raise ConfigurationError with the
 * individual issues attached.
 */

import { type ZodError, type ZodType, type ZodTypeDef } from "zod";

import { ConfigurationError, type ValidationIssue } from "./index";

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
 * Parses `input` with `schema`, throwing ConfigurationError on failure.
 *
 * @param subject - What is being validated, used in the error message
 */
export function validateConfig<TOutput, TInput = TOutput>(
  schema: ZodType<TOutput, ZodTypeDef, TInput>,
  input: unknown,
  subject: string,
): TOutput {
  const result = schema.safeParse(input);

  if (result.success) {
    return result.data;
  }

  const issues = zodIssuesToValidationIssues(result.error);
  const fieldList = issues.map((issue) => issue.path || "(root)").join(", ");

  throw new ConfigurationError(
    `Invalid ${subject}: ${result.error.message}`,
    { subject, issues },
    {
      cause: result.error,
      suggestion: `Check the following fields: ${fieldList}. See error.details.issues for specific validation failures.`,
    },
  );
}
