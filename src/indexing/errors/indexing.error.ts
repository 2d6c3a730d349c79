/**
 * Non-fatal failure recorded during an indexing session. These are collected by the
 * ErrorHandlingService instead of being thrown.
 */
export abstract class IndexingError extends Error {
  abstract readonly context: Record<string, unknown>;

  constructor(message: string) {
    super(message);
    this.name = 'IndexingError';
    Object.setPrototypeOf(this, IndexingError.prototype);
  }
}
