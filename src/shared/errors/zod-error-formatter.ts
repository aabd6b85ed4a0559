import type { ZodError } from 'zod';
import { ValidationError } from './domain-errors.js';

export interface ValidationIssue {
  field: string;
  message: string;
}

export function formatZodIssues(error: ZodError): ValidationIssue[] {
  return error.issues.map((issue) => ({
    field: issue.path.join('.'),
    message: issue.message,
  }));
}

export function formatZodError(error: ZodError, message = 'Validation failed'): ValidationError {
  return new ValidationError(message, { issues: formatZodIssues(error) });
}
