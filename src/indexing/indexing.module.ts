import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import indexingConfig from '../config/indexing.config';
import { ContentRepositoryModule } from '../content-repository/content-repository.module';
import { SearchEngineModule } from '../search-engine/search-engine.module';
import { ErrorHandlingService } from './error-handling.service';
import { NodeIndexerService } from './node-indexer.service';
import { PropertyExtractorService } from './property-extractor.service';

@Module({
  imports: [ConfigModule.forFeature(indexingConfig), ContentRepositoryModule, SearchEngineModule],
  providers: [NodeIndexerService, PropertyExtractorService, ErrorHandlingService],
  exports: [NodeIndexerService, ErrorHandlingService],
})
export class IndexingModule {}
