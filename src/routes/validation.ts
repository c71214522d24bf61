import type { ZodError } from 'zod';

import { ValidationError, type ErrorIssue } from '../util/errors';

export const toIssues = (error: ZodError): ErrorIssue[] =>
  error.issues.map((issue) => ({
    path: issue.path.join('.') || undefined,
    message: issue.message,
  }));

export const validationFailed = (error: ZodError): ValidationError =>
  new ValidationError('Request validation failed.', toIssues(error));
