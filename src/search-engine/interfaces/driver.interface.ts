import { ContentNode, NodeType } from '../../content-repository/interfaces/content-repository.interface';
import { DocumentData, FulltextIndex } from '../../indexing/interfaces/document.interface';
import { SearchIndex } from '../search-index';

export const DOCUMENT_DRIVER = 'DOCUMENT_DRIVER';
export const INDEXER_DRIVER = 'INDEXER_DRIVER';
export const INDEX_DRIVER = 'INDEX_DRIVER';
export const REQUEST_DRIVER = 'REQUEST_DRIVER';

/**
 * Bulk API lines of one operation, e.g. an action line followed by its source line
 */
export type BulkRequestTuple = readonly Record<string, unknown>[];

export type AliasAction =
  | { add: { index: string; alias: string } }
  | { remove: { index: string; alias: string } };

export interface BulkItemError {
  type?: string;
  reason?: string;
}

export interface BulkResponseItem {
  action: string;
  id?: string;
  index?: string;
  status: number;
  error?: string | BulkItemError;
}

export interface BulkResponse {
  errors: boolean;
  items: BulkResponseItem[];
}

export interface DocumentDriver {
  delete(node: ContentNode, identifier: string): BulkRequestTuple;

  /**
   * Removes a document stored under the identifier by a different node type, needed
   * after the type of a node changed
   */
  deleteDuplicateDocumentNotMatchingType(
    index: SearchIndex,
    identifier: string,
    nodeType: NodeType,
  ): Promise<void>;
}

export interface IndexerDriver {
  document(indexName: string, node: ContentNode, identifier: string, data: DocumentData): BulkRequestTuple;

  /**
   * Update of the closest fulltext root with the fulltext of the node, null when the
   * node has no fulltext root to write to
   */
  fulltext(
    node: ContentNode,
    fulltext: FulltextIndex,
    targetWorkspaceName?: string,
  ): Promise<BulkRequestTuple | null>;
}

export interface IndexDriver {
  aliasActions(actions: AliasAction[]): Promise<void>;
  deleteIndex(indexName: string): Promise<void>;
  indexesByAlias(alias: string): Promise<string[]>;
  indexesByPrefix(prefix: string): Promise<string[]>;
}

export interface RequestDriver {
  bulk(index: SearchIndex, request: string): Promise<BulkResponse>;
}
