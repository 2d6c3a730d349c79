import { IndexingError } from './indexing.error';

/**
 * A bulk request line that could not be encoded and was dropped before submission.
 */
export class MalformedBulkRequestError extends IndexingError {
  readonly context: Record<string, unknown>;

  constructor(
    message: string,
    readonly dimensionsHash: string,
    readonly encodingErrors: readonly string[],
  ) {
    super(message);
    this.name = 'MalformedBulkRequestError';
    this.context = { dimensionsHash, encodingErrors };
    Object.setPrototypeOf(this, MalformedBulkRequestError.prototype);
  }
}
