export type FulltextBucket = 'text' | 'h1' | 'h2' | 'h3' | 'h4' | 'h5' | 'h6';

/**
 * Fulltext of one node, grouped by bucket
 */
export type FulltextIndex = Partial<Record<FulltextBucket, string>>;

/**
 * Source of a search document, extracted properties plus the `__`-prefixed system fields
 */
export type DocumentData = Record<string, unknown>;

export interface ExtractionResult {
  properties: DocumentData;
  fulltext: FulltextIndex;

  /**
   * Properties skipped because no indexing rule applies to them
   */
  unconfigured: string[];
}
