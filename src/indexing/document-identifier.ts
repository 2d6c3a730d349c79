import { createHash } from 'crypto';
import { TargetContextPath } from '../content-repository/context-path';
import { ContentNode } from '../content-repository/interfaces/content-repository.interface';

/**
 * Stable search document id of a node materialization. With a target workspace the id
 * is the one the node will have once published there.
 */
export function calculateDocumentIdentifier(node: ContentNode, targetWorkspaceName?: string): string {
  const contextPath =
    targetWorkspaceName === undefined
      ? node.contextPath
      : new TargetContextPath(node, targetWorkspaceName).toString();

  return createHash('sha1').update(contextPath).digest('hex');
}
