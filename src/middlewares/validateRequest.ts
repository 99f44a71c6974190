import { z, ZodError, type ZodTypeAny } from 'zod';
import { ValidationError } from '../utils';
import { isIsoDate } from '../utils/dateOnly';

export type RequestPart = 'body' | 'query' | 'params';

/**
 * Formats zod issues the way every 400 response reports them.
 */
export function formatZodError(error: ZodError, part: RequestPart): string {
  const errorMessages = error.errors.map((err) => ({
    field: [part, ...err.path].join('.'),
    message: err.message,
  }));
  return `Validation failed: ${JSON.stringify(errorMessages)}`;
}

/**
 * Parses one part of a request with a zod schema.
 *
 * @returns The parsed (and coerced) value, typed by the schema
 * @throws ValidationError (400) listing every offending field
 */
export function validateRequest<T extends ZodTypeAny>(
  schema: T,
  value: unknown,
  part: RequestPart
): z.output<T> {
  const result = schema.safeParse(value);

  if (!result.success) {
    throw new ValidationError(formatZodError(result.error, part));
  }

  return result.data;
}

// Common validation schemas
export const commonSchemas = {
  uuid: (field: string) => z.string().uuid(`Invalid ${field} format`),
  isoDate: z.string().refine(isIsoDate, 'Must be a valid date in YYYY-MM-DD format'),
  performedBy: z.string().trim().min(1).max(100).optional(),
};

export default validateRequest;
