import { Injectable } from '@nestjs/common';
import { BulkResponse, RequestDriver } from '../interfaces/driver.interface';
import { SearchIndex } from '../search-index';
import { parseBulkResponse } from './response.schemas';

@Injectable()
export class ElasticsearchRequestDriver implements RequestDriver {
  /**
   * `request` holds newline separated JSON lines, without the trailing newline
   */
  async bulk(index: SearchIndex, request: string): Promise<BulkResponse> {
    const response = await index.request('POST', '/_bulk', `${request}\n`, 'application/x-ndjson');
    return parseBulkResponse(response);
  }
}
