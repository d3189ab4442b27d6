/**
 * Input Validation
 *
 * The pipeline cannot run without a structurally valid roster and
 * transcript. Those problems are fatal and surface as a thrown
 * PipelineInputError before any parsing begins; everything after that point
 * is reported through diagnostics instead.
 */

import { z } from 'zod';

/**
 * Fatal input failure.
 *
 * Carries the zod issues so callers can show which roster row or field was
 * rejected.
 */
export class PipelineInputError extends Error {
  /** Field-level issues from zod */
  public readonly issues: z.ZodIssue[];
  /** Which input was rejected ("roster", "transcript", "options") */
  public readonly input: string;

  constructor(input: string, message: string, issues: z.ZodIssue[] = []) {
    super(message);
    this.name = 'PipelineInputError';
    this.input = input;
    this.issues = issues;

    // Ensure correct prototype chain for instanceof checks.
    Object.setPrototypeOf(this, PipelineInputError.prototype);
  }

  /** Issues formatted as "path: message" */
  get details(): string[] {
    return formatIssues(this.issues);
  }
}

export function formatIssues(issues: z.ZodIssue[]): string[] {
  return issues.map((issue) => {
    const path = issue.path.join('.');
    return path ? `${path}: ${issue.message}` : issue.message;
  });
}

/**
 * Validate one pipeline input, throwing PipelineInputError on failure.
 *
 * @param input - Name of the input, used in the error message
 * @param schema - Schema to validate against
 * @param data - Raw value
 * @returns The parsed value typed by the schema
 */
export function validateInput<T extends z.ZodTypeAny>(
  input: string,
  schema: T,
  data: unknown
): z.output<T> {
  const result = schema.safeParse(data);
  if (!result.success) {
    const details = formatIssues(result.error.issues);
    throw new PipelineInputError(
      input,
      `Invalid ${input}: ${details.join('; ')}`,
      result.error.issues
    );
  }
  return result.data;
}
