/**
 * Shared helpers for zod validation at the boundaries.
 *
 * @module core/validation
 */

import type { z } from 'zod';

/**
 * Formats zod issues as "path: message" pairs.
 *
 * @example
 * formatIssues(error) // "http.timeout: Expected number, received string"
 */
export function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    .join('; ');
}
