import { Inject, Injectable } from '@nestjs/common';
import { AliasAction, IndexDriver } from '../interfaces/driver.interface';
import { SEARCH_TRANSPORT, SearchTransport } from '../interfaces/transport.interface';
import { aliasResponseSchema, catIndicesResponseSchema } from './response.schemas';

@Injectable()
export class ElasticsearchIndexDriver implements IndexDriver {
  constructor(@Inject(SEARCH_TRANSPORT) private readonly transport: SearchTransport) {}

  /**
   * Submits all actions in one request, the engine applies them atomically
   */
  async aliasActions(actions: AliasAction[]): Promise<void> {
    if (actions.length === 0) {
      return;
    }
    await this.transport.request('POST', '/_aliases', { body: { actions } });
  }

  async deleteIndex(indexName: string): Promise<void> {
    await this.transport.request('DELETE', `/${indexName}`);
  }

  /**
   * Throws an ApiError with status 404 when the alias does not exist
   */
  async indexesByAlias(alias: string): Promise<string[]> {
    const response = await this.transport.request('GET', `/_alias/${alias}`);
    return Object.keys(aliasResponseSchema.parse(response));
  }

  async indexesByPrefix(prefix: string): Promise<string[]> {
    const response = await this.transport.request('GET', `/_cat/indices/${prefix}*`, {
      params: { format: 'json', h: 'index' },
    });
    return catIndicesResponseSchema
      .parse(response)
      .map(({ index }) => index)
      .filter(index => index.startsWith(prefix));
  }
}
