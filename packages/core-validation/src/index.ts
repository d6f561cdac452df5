import type { z, ZodIssue, ZodTypeAny } from 'zod';

export type ValidationIssue = {
  path: string;
  message: string;
};

export class ValidationError extends Error {
  public readonly issues: ValidationIssue[];
  public readonly context?: string;

  constructor(message: string, issues: ValidationIssue[], context?: string) {
    super(message);
    this.name = 'ValidationError';
    this.issues = issues;
    this.context = context;
  }
}

export function toValidationIssues(issues: readonly ZodIssue[]): ValidationIssue[] {
  return issues.map((issue) => ({
    path: issue.path.join('.') || '<root>',
    message: issue.message
  }));
}

/**
 * Parse `data` with `schema`, returning the schema's output (defaults applied).
 * Refinement messages are surfaced as-is so callers can match on them.
 */
export function parseOrThrow<Schema extends ZodTypeAny>(
  schema: Schema,
  data: unknown,
  context?: string
): z.output<Schema> {
  const result = schema.safeParse(data);
  if (result.success) {
    return result.data;
  }

  const issues = toValidationIssues(result.error.issues);
  const summary = issues
    .map((issue) => (issue.path === '<root>' ? issue.message : `${issue.path}: ${issue.message}`))
    .join('; ');
  const message = context ? `${context}: ${summary}` : summary;
  throw new ValidationError(message || 'Validation failed', issues, context);
}
