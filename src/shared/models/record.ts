import type { z } from 'zod';
import { ValidationError } from '@shared/errors/domain-errors.js';
import { formatZodIssues } from '@shared/errors/zod-error-formatter.js';

/**
 * Parse a record through its schema and freeze the result.
 * Throws ValidationError naming every offending field.
 */
export function buildRecord<S extends z.ZodTypeAny>(
  entity: string,
  schema: S,
  input: unknown
): Readonly<z.output<S>> {
  const result = schema.safeParse(input);
  if (!result.success) {
    const issues = formatZodIssues(result.error);
    const summary = issues.map((issue) => `${issue.field} ${issue.message}`).join('; ');
    throw new ValidationError(`Invalid ${entity}: ${summary}`, { issues });
  }
  return Object.freeze(result.data);
}
