import { Module } from '@nestjs/common';
import { ConfigModule, ConfigType } from '@nestjs/config';
import contentRepositoryConfig from '../config/content-repository.config';
import { CONTENT_REPOSITORY } from './interfaces/content-repository.interface';
import { JsonContentRepository } from './json-content-repository';

@Module({
  imports: [ConfigModule.forFeature(contentRepositoryConfig)],
  providers: [
    {
      provide: CONTENT_REPOSITORY,
      useFactory: (config: ConfigType<typeof contentRepositoryConfig>) =>
        JsonContentRepository.fromFile(config.file),
      inject: [contentRepositoryConfig.KEY],
    },
  ],
  exports: [CONTENT_REPOSITORY],
})
export class ContentRepositoryModule {}
