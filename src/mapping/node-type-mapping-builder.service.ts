import { Inject, Injectable } from '@nestjs/common';
import {
  CONTENT_REPOSITORY,
  ContentRepository,
  IndexingStrategyName,
  NodeType,
} from '../content-repository/interfaces/content-repository.interface';
import { DEFAULT_STRATEGY_PER_TYPE } from '../indexing/property-extractor.service';
import { SearchIndex } from '../search-engine/search-index';
import { FieldMapping, MappingInformation } from './interfaces/mapping.interface';
import { NodeTypeMapping } from './node-type-mapping';

const KEYWORD: FieldMapping = { type: 'keyword' };

const DEFAULT_MAPPING_PER_STRATEGY: Record<IndexingStrategyName, FieldMapping> = {
  string: KEYWORD,
  boolean: { type: 'boolean' },
  integer: { type: 'integer' },
  float: { type: 'float' },
  date: { type: 'date', format: 'date_optional_time' },
  array: KEYWORD,
  reference: KEYWORD,
  references: KEYWORD,
};

const FULLTEXT_BUCKETS = ['text', 'h1', 'h2', 'h3', 'h4', 'h5', 'h6'];

export const SYSTEM_FIELD_MAPPINGS: Readonly<Record<string, FieldMapping>> = {
  __identifier: KEYWORD,
  __path: KEYWORD,
  __parentPath: KEYWORD,
  __nodeType: KEYWORD,
  __typeAndSupertypes: KEYWORD,
  __workspace: KEYWORD,
  __fulltext: {
    type: 'object',
    properties: Object.fromEntries(FULLTEXT_BUCKETS.map(bucket => [bucket, { type: 'text' }])),
  },
  // the parts are only stored to rebuild __fulltext, they are never searched
  __fulltextParts: { type: 'object', enabled: false },
};

@Injectable()
export class NodeTypeMappingBuilderService {
  constructor(
    @Inject(CONTENT_REPOSITORY) private readonly contentRepository: ContentRepository,
  ) {}

  /**
   * Mapping names must not contain ":" or "."
   */
  convertNodeTypeNameToMappingName(nodeTypeName: string): string {
    return nodeTypeName.replace(/[:.]/g, '-');
  }

  buildMappingInformation(index: SearchIndex): MappingInformation {
    const mappings: NodeTypeMapping[] = [];
    const warnings: string[] = [];

    for (const nodeType of this.contentRepository.getNodeTypes()) {
      if (nodeType.abstract) {
        continue;
      }

      mappings.push(
        new NodeTypeMapping(
          index,
          nodeType,
          this.convertNodeTypeNameToMappingName(nodeType.name),
          this.buildProperties(nodeType, warnings),
        ),
      );
    }

    return { mappings, warnings };
  }

  private buildProperties(nodeType: NodeType, warnings: string[]): Record<string, FieldMapping> {
    const properties: Record<string, FieldMapping> = {};

    for (const [name, configuration] of Object.entries(nodeType.properties)) {
      const search = configuration.search ?? {};
      if (search.indexing === false) {
        continue;
      }

      if (search.mapping !== undefined) {
        properties[name] = search.mapping;
        continue;
      }

      const strategyName: IndexingStrategyName | undefined =
        typeof search.indexing === 'string'
          ? search.indexing
          : DEFAULT_STRATEGY_PER_TYPE.get(configuration.type ?? '');
      if (strategyName === undefined) {
        warnings.push(
          `Node type "${nodeType.name}", property "${name}": no mapping found for type "${configuration.type ?? 'undefined'}"`,
        );
        continue;
      }

      properties[name] = DEFAULT_MAPPING_PER_STRATEGY[strategyName];
    }

    return { ...properties, ...SYSTEM_FIELD_MAPPINGS };
  }
}
