/**
 * Schema validation errors.
 */

import type { z } from 'zod';

export class SchemaValidationError extends Error {
  public readonly issues: string[];

  constructor(
    public readonly label: string,
    issues: string[]
  ) {
    super(`Invalid ${label}: ${issues.join('; ')}`);
    this.name = 'SchemaValidationError';
    this.issues = issues;
  }
}

/** `content.0.type: Required` style lines, one per issue. */
export function describeIssues(error: z.ZodError): string[] {
  return error.issues.map(issue => {
    const where = issue.path.length > 0 ? issue.path.join('.') : '(root)';
    return `${where}: ${issue.message}`;
  });
}

/**
 * Parse `value` with `schema`, throwing SchemaValidationError on failure.
 */
export function parseWithSchema<T extends z.ZodTypeAny>(schema: T, value: unknown, label: string): z.output<T> {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw new SchemaValidationError(label, describeIssues(result.error));
  }
  return result.data;
}
