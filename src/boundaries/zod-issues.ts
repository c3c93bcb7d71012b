import type { z } from 'zod';

// "path: message" per issue, e.g. "maxSize: Number must be greater than 0"
export function formatZodIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}
