/**
 * Raised when the key-value store or the transaction ledger cannot be read or written.
 * The budget core never retries; callers can repeat the observation later.
 */
export class PersistenceError extends Error {
  readonly operation: string;

  constructor(operation: string, cause: unknown) {
    super(`${operation} failed: ${cause instanceof Error ? cause.message : String(cause)}`, { cause });
    this.name = 'PersistenceError';
    this.operation = operation;
  }
}

/**
 * Runs a store or ledger operation, wrapping any thrown error in a PersistenceError
 */
export function withPersistence<T>(operation: string, fn: () => T): T {
  try {
    return fn();
  } catch (error) {
    if (error instanceof PersistenceError) {
      throw error;
    }
    throw new PersistenceError(operation, error);
  }
}
