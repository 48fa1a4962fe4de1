export type StatePersistenceErrorCode = 'READ_ERROR' | 'WRITE_ERROR' | 'INVALID_SNAPSHOT';

/**
 * Error thrown when the persisted state snapshot cannot be read, written or validated.
 */
export class StatePersistenceError extends Error {
  constructor(
    message: string,
    public readonly code: StatePersistenceErrorCode,
    public readonly location: string
  ) {
    super(message);
    this.name = 'StatePersistenceError';
    Object.setPrototypeOf(this, StatePersistenceError.prototype);
  }
}
