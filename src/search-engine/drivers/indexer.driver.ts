import { Injectable, Logger } from '@nestjs/common';
import { ContentNode } from '../../content-repository/interfaces/content-repository.interface';
import { isFulltextRoot } from '../../content-repository/node-type.utils';
import { calculateDocumentIdentifier } from '../../indexing/document-identifier';
import { DocumentData, FulltextIndex } from '../../indexing/interfaces/document.interface';
import { BulkRequestTuple, IndexerDriver } from '../interfaces/driver.interface';

// Replaces the source of a fulltext root but keeps the fulltext its descendants contributed
const DOCUMENT_UPDATE_SCRIPT = `
  HashMap fulltext = (ctx._source.containsKey("__fulltext") && ctx._source.__fulltext instanceof Map ? ctx._source.__fulltext : new HashMap());
  HashMap fulltextParts = (ctx._source.containsKey("__fulltextParts") && ctx._source.__fulltextParts instanceof Map ? ctx._source.__fulltextParts : new HashMap());
  ctx._source = params.newData;
  ctx._source.__fulltext = fulltext;
  ctx._source.__fulltextParts = fulltextParts;
`;

// Stores the fulltext of one node in the parts of its root and rebuilds __fulltext from all parts
const FULLTEXT_UPDATE_SCRIPT = `
  ctx._source.__fulltext = new HashMap();
  if (!ctx._source.containsKey("__fulltextParts") || !(ctx._source.__fulltextParts instanceof Map)) {
    ctx._source.__fulltextParts = new HashMap();
  }
  if (params.nodeIsRemoved || params.nodeIsHidden || params.fulltext.size() == 0) {
    ctx._source.__fulltextParts.remove(params.identifier);
  } else {
    ctx._source.__fulltextParts.put(params.identifier, params.fulltext);
  }
  for (fulltextPart in ctx._source.__fulltextParts.entrySet()) {
    for (entry in fulltextPart.getValue().entrySet()) {
      def value = entry.getValue().trim();
      if (ctx._source.__fulltext.containsKey(entry.getKey())) {
        value = ctx._source.__fulltext[entry.getKey()] + " " + value;
      }
      ctx._source.__fulltext[entry.getKey()] = value;
    }
  }
`;

const ROOT_PATHS = ['/', '/sites'];

@Injectable()
export class ElasticsearchIndexerDriver implements IndexerDriver {
  private readonly logger = new Logger(ElasticsearchIndexerDriver.name);

  document(
    indexName: string,
    node: ContentNode,
    identifier: string,
    data: DocumentData,
  ): BulkRequestTuple {
    if (isFulltextRoot(node.nodeType)) {
      return [
        { update: { _id: identifier, _index: indexName, retry_on_conflict: 3 } },
        {
          script: { lang: 'painless', source: DOCUMENT_UPDATE_SCRIPT, params: { newData: data } },
          upsert: data,
        },
      ];
    }

    return [{ index: { _id: identifier, _index: indexName } }, data];
  }

  async fulltext(
    node: ContentNode,
    fulltext: FulltextIndex,
    targetWorkspaceName?: string,
  ): Promise<BulkRequestTuple | null> {
    const root = await this.findClosestFulltextRoot(node);
    if (root === null) {
      if (!ROOT_PATHS.includes(node.path)) {
        this.logger.warn(`No fulltext root found for node ${node.path} (${node.identifier})`);
      }
      return null;
    }

    if (root.removed) {
      // the root is about to be deleted, nothing to update
      return null;
    }

    const rootIdentifier = calculateDocumentIdentifier(root, targetWorkspaceName);
    const hasFulltext = Object.keys(fulltext).length > 0;

    return [
      { update: { _id: rootIdentifier, retry_on_conflict: 3 } },
      {
        script: {
          lang: 'painless',
          source: FULLTEXT_UPDATE_SCRIPT,
          params: {
            identifier: node.identifier,
            nodeIsRemoved: node.removed,
            nodeIsHidden: node.hidden,
            fulltext,
          },
        },
        upsert: {
          __fulltext: fulltext,
          __fulltextParts: hasFulltext ? { [node.identifier]: fulltext } : {},
        },
      },
    ];
  }

  private async findClosestFulltextRoot(node: ContentNode): Promise<ContentNode | null> {
    let current: ContentNode | null = node;
    while (current !== null && !isFulltextRoot(current.nodeType)) {
      current = await current.getParent();
    }
    return current;
  }
}
