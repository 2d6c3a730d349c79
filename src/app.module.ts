import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { CommandModule } from './command/command.module';
import contentRepositoryConfig from './config/content-repository.config';
import elasticsearchConfig from './config/elasticsearch.config';
import indexingConfig from './config/indexing.config';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      load: [indexingConfig, elasticsearchConfig, contentRepositoryConfig],
    }),
    CommandModule,
  ],
})
export class AppModule {}
