import { BulkResponseItem } from '../../search-engine/interfaces/driver.interface';
import { IndexingError } from './indexing.error';

/**
 * A bulk item the search engine rejected.
 */
export class BulkIndexingError extends IndexingError {
  readonly context: Record<string, unknown>;

  constructor(
    readonly request: readonly string[],
    readonly response: BulkResponseItem,
  ) {
    super(`Bulk indexing error: ${describeItemError(response)}`);
    this.name = 'BulkIndexingError';
    this.context = { response };
    Object.setPrototypeOf(this, BulkIndexingError.prototype);
  }
}

function describeItemError(item: BulkResponseItem): string {
  const { action, id, status, error } = item;
  const cause =
    typeof error === 'string' ? error : [error?.type, error?.reason].filter(Boolean).join(': ');

  return `${action} of document "${id ?? 'unknown'}" failed with status ${status}${cause === '' ? '' : ` (${cause})`}`;
}
