import { z } from 'zod';
import { ValidationError } from '../errors/index.js';

/** Parses request input against `schema`, raising ValidationError with the zod issues. */
export function parseInput<T extends z.ZodTypeAny>(schema: T, input: unknown, what: string): z.infer<T> {
  const parsed = schema.safeParse(input);
  if (!parsed.success) {
    throw new ValidationError(`Invalid ${what}`, {
      issues: parsed.error.issues.map(issue => ({ path: issue.path.join('.'), message: issue.message })),
    });
  }
  return parsed.data;
}
