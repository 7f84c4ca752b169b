import { z } from 'zod';
import { Logger } from '../utils/logger';
import { ValidationError } from '../utils/errors';
import { Result, createError, createSuccess } from '../utils/result';

const logger = new Logger('Validation');

export function formatIssues(error: z.ZodError): string {
  return error.errors
    .map(err => (err.path.length > 0 ? `${err.path.join('.')}: ${err.message}` : err.message))
    .join(', ');
}

/**
 * Parse untrusted input against `schema`; failures become a ValidationError
 * carrying the individual issues.
 */
export function validateRequest<T>(
  data: unknown,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>
): Result<T, ValidationError> {
  const parsed = schema.safeParse(data);

  if (parsed.success) {
    return createSuccess(parsed.data);
  }

  const formattedError = formatIssues(parsed.error);
  logger.warn(`Validation error: ${formattedError}`);
  return createError(new ValidationError(formattedError, {
    issues: parsed.error.errors.map(err => ({ field: err.path.join('.'), message: err.message }))
  }));
}
