import { NodeTypeMapping } from '../node-type-mapping';

export type FieldMapping = Record<string, unknown>;

export interface MappingInformation {
  mappings: NodeTypeMapping[];

  /**
   * Properties no mapping could be derived for
   */
  warnings: string[];
}
