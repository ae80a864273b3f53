import type { ZodTypeAny, output } from 'zod';
import { ReputationError, formatZodError } from '../errors/index.js';

/**
 * Validate a request body or querystring; failures become a 400 ValidationError.
 */
export function parseRequest<S extends ZodTypeAny>(schema: S, input: unknown): output<S> {
  const result = schema.safeParse(input ?? {});
  if (!result.success) {
    throw new ReputationError('ValidationError', formatZodError(result.error));
  }
  return result.data;
}
