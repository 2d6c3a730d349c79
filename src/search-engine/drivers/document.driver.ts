import { Injectable, Logger } from '@nestjs/common';
import {
  ContentNode,
  NodeType,
} from '../../content-repository/interfaces/content-repository.interface';
import { BulkRequestTuple, DocumentDriver } from '../interfaces/driver.interface';
import { SearchIndex } from '../search-index';
import { deleteByQueryResponseSchema } from './response.schemas';

@Injectable()
export class ElasticsearchDocumentDriver implements DocumentDriver {
  private readonly logger = new Logger(ElasticsearchDocumentDriver.name);

  delete(node: ContentNode, identifier: string): BulkRequestTuple {
    return [{ delete: { _id: identifier } }];
  }

  async deleteDuplicateDocumentNotMatchingType(
    index: SearchIndex,
    identifier: string,
    nodeType: NodeType,
  ): Promise<void> {
    const response = await index.request('POST', '/_delete_by_query', {
      query: {
        bool: {
          must: { ids: { values: [identifier] } },
          must_not: { term: { __nodeType: nodeType.name } },
        },
      },
    });

    const { deleted = 0 } = deleteByQueryResponseSchema.parse(response);
    if (deleted > 0) {
      this.logger.debug(
        `Removed ${deleted} document(s) for ${identifier} not matching node type ${nodeType.name}`,
      );
    }
  }
}
