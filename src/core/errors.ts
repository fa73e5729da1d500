export type ScratchpadErrorCode = 'VALIDATION' | 'INVALID_ID' | 'NOT_FOUND' | 'STORE_UNAVAILABLE';

/**
 * Base class for errors the note engine reports to its callers.
 * Anything else that escapes a handler is an internal failure.
 */
export abstract class ScratchpadError extends Error {
  abstract readonly code: ScratchpadErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class ValidationError extends ScratchpadError {
  readonly code = 'VALIDATION';
}

export class InvalidIdentifierError extends ScratchpadError {
  readonly code = 'INVALID_ID';

  constructor(readonly id: string) {
    super(`invalid note ID: ${id}`);
  }
}

export class NoteNotFoundError extends ScratchpadError {
  readonly code = 'NOT_FOUND';

  constructor(readonly id: string) {
    super('note not found');
  }
}

export class StoreUnavailableError extends ScratchpadError {
  readonly code = 'STORE_UNAVAILABLE';
}

const STATUS_BY_CODE: Record<ScratchpadErrorCode, number> = {
  VALIDATION: 400,
  INVALID_ID: 400,
  NOT_FOUND: 404,
  STORE_UNAVAILABLE: 503,
};

/**
 * HTTP status for an error surfaced by a route handler.
 */
export function httpStatusFor(error: unknown): number {
  if (error instanceof ScratchpadError) {
    return STATUS_BY_CODE[error.code];
  }
  return 500;
}

/**
 * Message safe to return to a caller. Internal failures are not described.
 */
export function publicMessageFor(error: unknown): string {
  if (error instanceof StoreUnavailableError) {
    return 'store unavailable';
  }
  if (error instanceof ScratchpadError) {
    return error.message;
  }
  return 'internal error';
}
