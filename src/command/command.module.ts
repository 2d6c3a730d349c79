import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import indexingConfig from '../config/indexing.config';
import { ContentRepositoryModule } from '../content-repository/content-repository.module';
import { IndexingModule } from '../indexing/indexing.module';
import { MappingModule } from '../mapping/mapping.module';
import { ConsoleOutput } from './console-output';
import { NodeIndexCommand } from './node-index.command';

@Module({
  imports: [
    ConfigModule.forFeature(indexingConfig),
    ContentRepositoryModule,
    IndexingModule,
    MappingModule,
  ],
  providers: [NodeIndexCommand, ConsoleOutput],
  exports: [NodeIndexCommand],
})
export class CommandModule {}
