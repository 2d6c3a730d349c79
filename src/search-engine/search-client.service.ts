import { Inject, Injectable } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import elasticsearchConfig from '../config/elasticsearch.config';
import { DEFAULT_DIMENSIONS_HASH, DimensionsService } from '../dimensions/dimensions.service';
import { DimensionValues } from '../dimensions/interfaces/dimension.interface';
import { ConfigurationError } from '../indexing/errors/configuration.error';
import { SEARCH_TRANSPORT, SearchTransport } from './interfaces/transport.interface';
import { SearchIndex } from './search-index';

/**
 * Holds the active dimension context and derives index names from it: every
 * dimension combination is written to its own `<prefix>-<dimensionHash>` index.
 */
@Injectable()
export class SearchClientService {
  private dimensionsHash = DEFAULT_DIMENSIONS_HASH;

  constructor(
    @Inject(elasticsearchConfig.KEY)
    private readonly config: ConfigType<typeof elasticsearchConfig>,
    @Inject(SEARCH_TRANSPORT) private readonly transport: SearchTransport,
    private readonly dimensionsService: DimensionsService,
  ) {}

  getIndexNamePrefix(): string {
    const prefix = this.config.indexNamePrefix.toLowerCase();
    if (prefix === '' || prefix.includes('-')) {
      throw new ConfigurationError(
        `The index name prefix "${prefix}" must be non-empty and must not contain "-".`,
        1589374235,
      );
    }
    return prefix;
  }

  /**
   * Alias name of the index for the active dimensions
   */
  getIndexName(): string {
    return `${this.getIndexNamePrefix()}-${this.dimensionsHash}`;
  }

  getDimensionsHash(): string {
    return this.dimensionsHash;
  }

  setDimensions(dimensionValues: DimensionValues = {}): void {
    this.dimensionsHash = this.dimensionsService.hash(dimensionValues);
  }

  /**
   * Runs the callback with the given dimensions active and restores the previous ones
   * afterwards, whether or not the callback fails.
   */
  async withDimensions<T>(callback: () => Promise<T>, dimensionValues: DimensionValues): Promise<T> {
    const previousHash = this.dimensionsHash;
    this.setDimensions(dimensionValues);
    try {
      return await callback();
    } finally {
      this.dimensionsHash = previousHash;
    }
  }

  findIndex(indexName: string): SearchIndex {
    return new SearchIndex(this.transport, indexName);
  }

  getTransport(): SearchTransport {
    return this.transport;
  }
}
