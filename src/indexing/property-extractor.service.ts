import { Injectable } from '@nestjs/common';
import {
  ContentNode,
  FulltextExtractorName,
  IndexingStrategyName,
} from '../content-repository/interfaces/content-repository.interface';
import {
  DocumentData,
  ExtractionResult,
  FulltextBucket,
  FulltextIndex,
} from './interfaces/document.interface';

type IndexingStrategy = (value: unknown) => unknown;

/**
 * Strategy used for a property type when the property itself names none
 */
export const DEFAULT_STRATEGY_PER_TYPE: ReadonlyMap<string, IndexingStrategyName> = new Map<
  string,
  IndexingStrategyName
>([
  ['string', 'string'],
  ['boolean', 'boolean'],
  ['integer', 'integer'],
  ['float', 'float'],
  ['date', 'date'],
  ['DateTime', 'date'],
  ['array', 'array'],
  ['reference', 'reference'],
  ['references', 'references'],
]);

// a strategy returning undefined keeps the property out of the document
const STRATEGIES: Record<IndexingStrategyName, IndexingStrategy> = {
  string: value =>
    typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean'
      ? String(value)
      : undefined,
  boolean: value => {
    if (typeof value === 'boolean') {
      return value;
    }
    return value === 'true' ? true : value === 'false' ? false : undefined;
  },
  integer: value => {
    const number = toNumber(value);
    return number === undefined ? undefined : Math.trunc(number);
  },
  float: value => toNumber(value),
  date: value => {
    if (!(value instanceof Date) && typeof value !== 'string' && typeof value !== 'number') {
      return undefined;
    }
    const date = new Date(value);
    return Number.isNaN(date.getTime()) ? undefined : date.toISOString();
  },
  array: value => (Array.isArray(value) ? value : undefined),
  reference: value => (typeof value === 'string' && value !== '' ? value : undefined),
  references: value =>
    Array.isArray(value) ? value.filter(item => typeof item === 'string') : undefined,
};

const HEADING_PATTERN = /<h([1-6])(?:\s[^>]*)?>([\s\S]*?)<\/h\1\s*>/gi;

/**
 * Turns the property bag of a node into document fields and fulltext, driven by the
 * property schema of its node type.
 */
@Injectable()
export class PropertyExtractorService {
  extract(node: ContentNode): ExtractionResult {
    const properties: DocumentData = {};
    const fulltext: FulltextIndex = {};
    const unconfigured: string[] = [];

    for (const [name, configuration] of Object.entries(node.nodeType.properties)) {
      const search = configuration.search ?? {};
      const value = node.properties[name];

      if (search.indexing !== false) {
        const strategyName = this.resolveStrategyName(search.indexing, configuration.type);
        if (strategyName === undefined) {
          unconfigured.push(name);
        } else if (value !== undefined && value !== null) {
          const indexedValue = STRATEGIES[strategyName](value);
          if (indexedValue !== undefined) {
            properties[name] = indexedValue;
          }
        }
      }

      if (search.fulltextExtractor !== undefined && typeof value === 'string') {
        this.extractFulltext(fulltext, search.fulltextExtractor, value);
      }
    }

    return { properties, fulltext, unconfigured };
  }

  private resolveStrategyName(
    indexing: boolean | IndexingStrategyName | undefined,
    type: string | undefined,
  ): IndexingStrategyName | undefined {
    if (typeof indexing === 'string') {
      return indexing;
    }
    return type === undefined ? undefined : DEFAULT_STRATEGY_PER_TYPE.get(type);
  }

  private extractFulltext(
    fulltext: FulltextIndex,
    extractor: FulltextExtractorName,
    value: string,
  ): void {
    if (extractor !== 'html') {
      appendFulltext(fulltext, extractor, stripTags(value));
      return;
    }

    const text = value.replace(HEADING_PATTERN, (heading: string, level: string, content: string) => {
      appendFulltext(fulltext, `h${level}`, stripTags(content));
      return ' ';
    });
    appendFulltext(fulltext, 'text', stripTags(text));
  }
}

function toNumber(value: unknown): number | undefined {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : undefined;
  }
  if (typeof value === 'string' && value.trim() !== '') {
    const number = Number(value);
    return Number.isFinite(number) ? number : undefined;
  }
  return undefined;
}

function stripTags(html: string): string {
  return html
    .replace(/<[^>]*>/g, ' ')
    .replace(/\s+/g, ' ')
    .trim();
}

function isFulltextBucket(bucket: string): bucket is FulltextBucket {
  return /^(text|h[1-6])$/.test(bucket);
}

function appendFulltext(fulltext: FulltextIndex, bucket: string, text: string): void {
  if (text === '' || !isFulltextBucket(bucket)) {
    return;
  }
  const existing = fulltext[bucket];
  fulltext[bucket] = existing === undefined ? text : `${existing} ${text}`;
}
