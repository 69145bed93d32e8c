/**
 * Error raised when a caller breaks a scoring contract (unknown severity,
 * negative modifier, duplicate profile names). Never used for data problems,
 * which are recovered into result notes instead.
 */
export class InvalidInputError extends Error {
  readonly code = 'INVALID_INPUT';

  constructor(message: string) {
    super(message);
    this.name = 'InvalidInputError';
  }
}

export function isInvalidInputError(error: unknown): error is InvalidInputError {
  return error instanceof InvalidInputError;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
