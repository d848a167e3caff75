/**
 * Error raised when a caller passes parameters that can never produce a
 * meaningful grid (non-positive cell size, zero grid cells, inverted bounds).
 * These are caller bugs, not data conditions.
 */
export class InvalidArgumentError extends Error {
  constructor(
    message: string,
    public readonly argument: string
  ) {
    super(message);
    this.name = 'InvalidArgumentError';

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, InvalidArgumentError);
    }
  }
}

export function isAbortError(error: unknown): boolean {
  return error instanceof Error && error.name === 'AbortError';
}
