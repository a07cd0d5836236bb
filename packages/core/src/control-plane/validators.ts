import { z, type ZodError } from 'zod';
import { ValidationError } from './errors.js';

function describeIssues(error: ZodError): string[] {
  return error.errors.map((issue) => {
    const path = issue.path.join('.');
    return path ? `${path}: ${issue.message}` : issue.message;
  });
}

/**
 * Parse raw commander options, throwing a ValidationError (exit 12) on failure.
 */
export function validateOptions<S extends z.ZodTypeAny>(schema: S, raw: unknown): z.infer<S> {
  const result = schema.safeParse(raw);
  if (!result.success) {
    throw new ValidationError('Invalid command options', describeIssues(result.error));
  }
  return result.data;
}

/**
 * Commander hands option values over as strings.
 */
export const positiveInt = z.coerce.number().int().positive();
export const nonNegativeInt = z.coerce.number().int().min(0);

export const repeatable = z
  .union([z.string(), z.array(z.string())])
  .optional()
  .transform((value) => (value === undefined ? [] : Array.isArray(value) ? value : [value]));

export const bridgeName = z
  .string()
  .regex(/^[A-Za-z0-9][A-Za-z0-9._-]*$/, 'Bridge names may contain letters, digits, ".", "_" and "-"');
