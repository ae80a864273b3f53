import type { ZodError } from 'zod';

export type ErrorKind =
  | 'InvalidAddress'
  | 'ValidationError'
  | 'LookupFailed'
  | 'PersistenceError'
  | 'NotFound';

const HTTP_STATUS: Record<ErrorKind, number> = {
  InvalidAddress: 400,
  ValidationError: 400,
  LookupFailed: 502,
  PersistenceError: 500,
  NotFound: 404,
};

export class ReputationError extends Error {
  readonly kind: ErrorKind;

  constructor(kind: ErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ReputationError';
    this.kind = kind;
  }

  get statusCode(): number {
    return HTTP_STATUS[this.kind];
  }
}

export function isReputationError(error: unknown): error is ReputationError {
  return error instanceof ReputationError;
}

/**
 * Flatten zod issues into a single line, e.g. `points: Number must be greater than or equal to 0`
 */
export function formatZodError(error: ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}
