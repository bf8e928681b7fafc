import { Request, Response, NextFunction } from 'express';
import { ZodError, type ZodSchema, type ZodTypeDef, type ZodType } from 'zod';
import { AppError, ErrorCode } from '../utils/appError.js';

function validationError(error: ZodError): AppError {
  const details = error.issues.map((e) => ({
    path: e.path.join('.'),
    message: e.message,
  }));
  return AppError.badRequest('Validation failed', ErrorCode.VALIDATION_ERROR, {
    errors: details,
  });
}

/**
 * Validate the request body with a Zod schema, replacing it with the parsed value.
 */
export const validate = (schema: ZodSchema) => {
  return (req: Request, _res: Response, next: NextFunction): void => {
    const result = schema.safeParse(req.body);
    if (!result.success) {
      next(validationError(result.error));
      return;
    }
    req.body = result.data;
    next();
  };
};

/**
 * Parse query or params inside a handler. In Express 5 req.query is getter-only,
 * so the typed result is returned instead of written back.
 */
export function parseWith<Output>(schema: ZodType<Output, ZodTypeDef, unknown>, value: unknown): Output {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw validationError(result.error);
  }
  return result.data;
}
