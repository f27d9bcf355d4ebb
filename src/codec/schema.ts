/**
 * Schema checks that report where a value went wrong
 */

import type { ZodError } from 'zod';
import type { Schema } from '../api/endpoints';
import type { DecodingIssue } from '../api/errors';

export type SchemaResult<T> = { ok: true; value: T } | { ok: false; issues: DecodingIssue[] };

export function toIssues(error: ZodError): DecodingIssue[] {
  return error.issues.map((issue) => ({
    path: issue.path.length > 0 ? issue.path.join('.') : '(root)',
    message: issue.message,
  }));
}

export function checkSchema<T>(schema: Schema<T>, value: unknown): SchemaResult<T> {
  const result = schema.safeParse(value);
  if (result.success) {
    return { ok: true, value: result.data };
  }
  return { ok: false, issues: toIssues(result.error) };
}

export function describeIssues(issues: DecodingIssue[]): string {
  return issues.map((issue) => `${issue.path}: ${issue.message}`).join('; ');
}
