import { NodeType } from './interfaces/content-repository.interface';

export function isFulltextEnabled(nodeType: NodeType): boolean {
  return nodeType.search.fulltext?.enable === true;
}

/**
 * Fulltext roots (typically documents such as pages) aggregate the fulltext of all
 * nodes below them
 */
export function isFulltextRoot(nodeType: NodeType): boolean {
  return nodeType.search.fulltext?.isRoot === true;
}
