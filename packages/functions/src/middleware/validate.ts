import type { NextFunction } from 'express';
import type { ZodType, ZodTypeDef } from 'zod';

interface BodyCarrier {
  body: unknown;
}

interface ParamsCarrier {
  params: unknown;
}

/**
 * Parse `req.body` against a schema and replace it with the parsed value.
 * A failing parse throws the ZodError, which Express routes to the error handler.
 */
export function validate<T>(schema: ZodType<T, ZodTypeDef, unknown>) {
  return (req: BodyCarrier, _res: unknown, next: NextFunction): void => {
    req.body = schema.parse(req.body);
    next();
  };
}

export function validateParams<T>(schema: ZodType<T, ZodTypeDef, unknown>) {
  return (req: ParamsCarrier, _res: unknown, next: NextFunction): void => {
    req.params = schema.parse(req.params);
    next();
  };
}
