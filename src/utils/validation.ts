import type { z } from 'zod';
import { ValidationError } from '../errors';

export function parseBody<T extends z.ZodTypeAny>(schema: T, body: unknown, detail: string): z.infer<T> {
  const parsed = schema.safeParse(body);
  if (!parsed.success) {
    throw new ValidationError(
      detail,
      parsed.error.issues.map((issue) => ({ path: issue.path.join('.'), message: issue.message })),
    );
  }
  return parsed.data;
}
