import type { Request } from 'express';
import type { z, ZodTypeAny } from 'zod';
import { ValidationError } from './errors.js';

export type ValidationDetails = {
  formErrors: string[];
  fieldErrors: Record<string, string[] | undefined>;
};

function parseRequestPart<T extends ZodTypeAny>(value: unknown, schema: T): z.infer<T> {
  const result = schema.safeParse(value);
  if (!result.success) {
    const details: ValidationDetails = result.error.flatten();
    throw new ValidationError(details);
  }
  return result.data;
}

export function validateParams<T extends ZodTypeAny>(req: Request, schema: T): z.infer<T> {
  return parseRequestPart(req.params, schema);
}

export function validateBody<T extends ZodTypeAny>(req: Request, schema: T): z.infer<T> {
  return parseRequestPart(req.body, schema);
}
