/**
 * Error taxonomy shared by the scheduler, the session service and the HTTP layer.
 *
 * Every error carries a stable `code` so callers can branch on it without
 * relying on instanceof across module boundaries.
 */

export type SrsErrorCode =
  | 'INVALID_STATE'
  | 'NOT_FOUND'
  | 'STORE_UNAVAILABLE'
  | 'INVALID_ARGUMENT';

export class SrsError extends Error {
  readonly code: SrsErrorCode;

  constructor(code: SrsErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'SrsError';
    this.code = code;
  }
}

/**
 * Transition attempted from the wrong mode, or for a card that is not the
 * active one. Usually a stale or duplicate client message.
 */
export class InvalidStateError extends SrsError {
  constructor(message: string) {
    super('INVALID_STATE', message);
    this.name = 'InvalidStateError';
  }
}

export class NotFoundError extends SrsError {
  constructor(message: string) {
    super('NOT_FOUND', message);
    this.name = 'NotFoundError';
  }
}

/**
 * Transient storage failure or timeout. The whole operation may be retried.
 */
export class StoreUnavailableError extends SrsError {
  constructor(message: string, cause?: unknown) {
    super('STORE_UNAVAILABLE', message, { cause });
    this.name = 'StoreUnavailableError';
  }
}

export class InvalidArgumentError extends SrsError {
  constructor(message: string) {
    super('INVALID_ARGUMENT', message);
    this.name = 'InvalidArgumentError';
  }
}

const KNOWN_CODES: readonly SrsErrorCode[] = [
  'INVALID_STATE',
  'NOT_FOUND',
  'STORE_UNAVAILABLE',
  'INVALID_ARGUMENT',
];

export function isSrsError(error: unknown): error is SrsError {
  if (error instanceof SrsError) {
    return true;
  }
  if (error instanceof Error && 'code' in error) {
    const { code } = error;
    return typeof code === 'string' && KNOWN_CODES.some(known => known === code);
  }
  return false;
}
