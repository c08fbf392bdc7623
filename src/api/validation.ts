import type { z } from 'zod';
import { createError } from './middleware/errorHandler';

/** Parses request input, turning schema failures into 400 VALIDATION_ERROR responses. */
export function parseInput<S extends z.ZodTypeAny>(schema: S, value: unknown, what: string): z.output<S> {
  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || what}: ${issue.message}`)
      .join('; ');
    throw createError(`Invalid ${what}: ${details}`, 400, 'VALIDATION_ERROR');
  }
  return parsed.data;
}
