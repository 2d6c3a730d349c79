import { NodeType } from '../content-repository/interfaces/content-repository.interface';
import { SearchIndex } from '../search-engine/search-index';
import { FieldMapping } from './interfaces/mapping.interface';

/**
 * Field mapping of one node type, applied to one index
 */
export class NodeTypeMapping {
  constructor(
    readonly index: SearchIndex,
    readonly nodeType: NodeType,
    readonly mappingName: string,
    readonly properties: Record<string, FieldMapping>,
  ) {}

  toJSON(): { properties: Record<string, FieldMapping> } {
    return { properties: this.properties };
  }

  async apply(): Promise<void> {
    await this.index.request('PUT', '/_mapping', this.toJSON());
  }
}
