/**
 * Error taxonomy for caption selection and locking.
 *
 * DataError is recovered where it is raised (logged, default applied).
 * ConflictError and PoolExhaustionError reach the caller as structured results.
 */

export class DataError extends Error {
  constructor(message: string, readonly context: Record<string, unknown> = {}) {
    super(message);
    this.name = 'DataError';
  }
}

export class PoolExhaustionError extends Error {
  constructor(readonly needed: number, readonly available: number) {
    super('insufficient eligible captions');
    this.name = 'PoolExhaustionError';
  }
}

export class ConflictError extends Error {
  constructor(readonly captionIds: string[], message = 'conflict: captions already reserved') {
    super(message);
    this.name = 'ConflictError';
  }
}

export class UnknownCaptionError extends Error {
  constructor(readonly captionIds: string[]) {
    super(`Unknown caption ids: ${captionIds.join(', ')}`);
    this.name = 'UnknownCaptionError';
  }
}
