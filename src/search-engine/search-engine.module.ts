import { Module } from '@nestjs/common';
import { ConfigModule, ConfigType } from '@nestjs/config';
import elasticsearchConfig from '../config/elasticsearch.config';
import { DimensionsService } from '../dimensions/dimensions.service';
import { ElasticsearchDocumentDriver } from './drivers/document.driver';
import { ElasticsearchIndexDriver } from './drivers/index.driver';
import { ElasticsearchIndexerDriver } from './drivers/indexer.driver';
import { ElasticsearchRequestDriver } from './drivers/request.driver';
import { ElasticsearchClient } from './elasticsearch-client';
import {
  DOCUMENT_DRIVER,
  INDEX_DRIVER,
  INDEXER_DRIVER,
  REQUEST_DRIVER,
} from './interfaces/driver.interface';
import { SEARCH_TRANSPORT } from './interfaces/transport.interface';
import { SearchClientService } from './search-client.service';

@Module({
  imports: [ConfigModule.forFeature(elasticsearchConfig)],
  providers: [
    {
      provide: SEARCH_TRANSPORT,
      useFactory: (config: ConfigType<typeof elasticsearchConfig>) =>
        new ElasticsearchClient({
          baseURL: config.url,
          timeout: config.timeout,
          username: config.username,
          password: config.password,
        }),
      inject: [elasticsearchConfig.KEY],
    },
    DimensionsService,
    SearchClientService,
    { provide: DOCUMENT_DRIVER, useClass: ElasticsearchDocumentDriver },
    { provide: INDEXER_DRIVER, useClass: ElasticsearchIndexerDriver },
    { provide: INDEX_DRIVER, useClass: ElasticsearchIndexDriver },
    { provide: REQUEST_DRIVER, useClass: ElasticsearchRequestDriver },
  ],
  exports: [
    SEARCH_TRANSPORT,
    DimensionsService,
    SearchClientService,
    DOCUMENT_DRIVER,
    INDEXER_DRIVER,
    INDEX_DRIVER,
    REQUEST_DRIVER,
  ],
})
export class SearchEngineModule {}
