import type { ZodError } from 'zod';
import type { ErrorIssue } from '@/utils/errors';

/** Flattens zod issues into `{ path, message }` pairs. */
export function toIssues(error: ZodError): ErrorIssue[] {
  return error.errors.map((e) => ({
    path: e.path.join('.') || 'root',
    message: e.message,
  }));
}
