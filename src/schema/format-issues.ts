import type { z } from 'zod';

/**
 * One line description of validation issues, e.g.
 * `dialog.0.condition: Required; dialog.1.label: Expected string`
 */
export function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) =>
      issue.path.length > 0
        ? `${issue.path.join('.')}: ${issue.message}`
        : issue.message
    )
    .join('; ');
}
