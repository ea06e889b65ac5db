import { z } from 'zod';
import { ValidationError } from './errorHandler';

export function parseOrThrow<T extends z.ZodTypeAny>(schema: T, value: unknown, message?: string): z.output<T> {
  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    throw ValidationError.fromZod(parsed.error, message);
  }
  return parsed.data;
}
