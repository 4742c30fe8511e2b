/**
 * Raised when user input is rejected before it reaches the store.
 */
export class ValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ValidationError';
  }
}

export class EmptyNoteError extends ValidationError {
  static readonly MESSAGE = 'Note must have either a title or content';

  constructor() {
    super(EmptyNoteError.MESSAGE);
    this.name = 'EmptyNoteError';
  }
}

/**
 * Raised by note stores. Never crosses the repository boundary.
 */
export class PersistenceError extends Error {
  readonly operation: string;

  constructor(operation: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'PersistenceError';
    this.operation = operation;
  }
}
