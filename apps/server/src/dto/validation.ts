/**
 * Request validation with zod.
 *
 * Failures become a core ValidationError so the error handler can answer
 * them with a 422 listing every issue.
 */

import type { ZodError, ZodType, ZodTypeDef } from 'zod';
import { ValidationError, type ValidationIssue } from '@taskdeck/core';

/** Convert a ZodError to ValidationIssues, prefixing paths with `location` */
export function zodErrorToIssues(error: ZodError, location?: string): ValidationIssue[] {
  return error.errors.map((issue) => {
    const path = [location, ...issue.path].filter(p => p !== undefined && p !== '').join('.');
    return { path: path || 'request', message: issue.message, code: issue.code };
  });
}

/** Format validation issues into a human-readable message */
export function formatValidationMessage(issues: ValidationIssue[]): string {
  return issues.map(i => `${i.path}: ${i.message}`).join('; ');
}

export function parseOrThrow<Out, In>(
  schema: ZodType<Out, ZodTypeDef, In>,
  input: unknown,
  location?: string,
): Out {
  const parsed = schema.safeParse(input);
  if (parsed.success) return parsed.data;

  const issues = zodErrorToIssues(parsed.error, location);
  throw new ValidationError(formatValidationMessage(issues), issues);
}

/** Read a JSON request body; an empty body reads as an empty object */
export async function readJsonBody(request: Request): Promise<unknown> {
  const text = await request.text();
  if (text.trim() === '') return {};

  try {
    const parsed: unknown = JSON.parse(text);
    return parsed;
  } catch {
    const issues: ValidationIssue[] = [{ path: 'body', message: 'Request body is not valid JSON', code: 'invalid_json' }];
    throw new ValidationError(formatValidationMessage(issues), issues);
  }
}

export function searchParamsToObject(url: URL): Record<string, string> {
  return Object.fromEntries(url.searchParams.entries());
}
