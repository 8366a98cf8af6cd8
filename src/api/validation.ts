import type { z } from 'zod';
import { RequestValidationError } from '../errors/request.js';

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

/** Parses `input` or throws a RequestValidationError (HTTP 400). */
export function parseRequest<S extends z.ZodTypeAny>(schema: S, input: unknown): z.output<S> {
  const parsed = schema.safeParse(input);
  if (!parsed.success) {
    throw new RequestValidationError(describeIssues(parsed.error));
  }
  return parsed.data;
}
