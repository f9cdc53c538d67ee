/**
 * =============================================================================
 * VALIDATION UTILITIES
 * =============================================================================
 *
 * Shared zod schemas and helpers. Every request body and query string is
 * parsed through one of these before it reaches a service.
 * =============================================================================
 */

import { z } from 'zod';
import { Request, Response, NextFunction } from 'express';
import { ValidationError } from '../../core/errors/AppError';
import { SIZE_CLASSES } from '../../core/constants';

// ============================================================
// COMMON SCHEMAS
// ============================================================

/** Query-string coordinates; blank values are rejected rather than read as 0 */
export const latitudeSchema = z.string().trim().min(1).pipe(z.coerce.number().finite().min(-90).max(90));
export const longitudeSchema = z.string().trim().min(1).pipe(z.coerce.number().finite().min(-180).max(180));

/**
 * Free-text address. Blank strings are rejected after trimming.
 */
export const addressSchema = z.string()
  .trim()
  .min(1, 'Address must not be empty')
  .max(500, 'Address is too long');

/**
 * Size class, case-insensitive on the wire ("m" -> "M")
 */
export const sizeClassSchema = z.string()
  .trim()
  .transform(val => val.toUpperCase())
  .pipe(z.enum(SIZE_CLASSES, {
    errorMap: () => ({ message: `Size must be one of ${SIZE_CLASSES.join(', ')}` })
  }));

/**
 * "true"/"1" query flags
 */
export const booleanQuerySchema = z.enum(['true', 'false', '1', '0'])
  .optional()
  .transform(val => val === 'true' || val === '1');

// ============================================================
// VALIDATION HELPERS
// ============================================================

/**
 * Parse data against a schema
 * Throws ValidationError on failure
 */
export function validateSchema<T extends z.ZodTypeAny>(
  schema: T,
  data: unknown
): z.infer<T> {
  const result = schema.safeParse(data);
  if (!result.success) {
    throw ValidationError.fromZodError(result.error);
  }
  return result.data;
}

/**
 * Request validation middleware
 * Replaces req.body with the parsed (transformed) value
 */
export function validateRequest<T extends z.ZodTypeAny>(schema: T) {
  return (req: Request, _res: Response, next: NextFunction): void => {
    const result = schema.safeParse(req.body);
    if (!result.success) {
      next(ValidationError.fromZodError(result.error));
      return;
    }
    req.body = result.data;
    next();
  };
}
