/**
 * Error types raised by the lock layer
 */

export class LockError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/**
 * Releasing, upgrading or downgrading a hold that is not held.
 * This is a caller contract violation and is never retried.
 */
export class LockStateError extends LockError {
  readonly operation: string;

  constructor(operation: string, detail: string) {
    super(`${operation}: ${detail}`);
    this.operation = operation;
  }
}

/**
 * A blocking acquire on a single-thread primitive that cannot be granted now.
 * Waiting would park the only thread that could release it.
 */
export class LockWouldBlockError extends LockError {
  readonly operation: string;

  constructor(operation: string) {
    super(`${operation} would block the current thread forever; use the async acquire instead`);
    this.operation = operation;
  }
}

export class GuardReleasedError extends LockError {
  constructor(kind: string) {
    super(`${kind} guard used after release`);
  }
}

export class LockAbortedError extends LockError {
  readonly reason: unknown;

  constructor(kind: string, reason: unknown) {
    super(`${kind} acquire aborted`);
    this.reason = reason;
  }
}
