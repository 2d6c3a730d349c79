import { Module } from '@nestjs/common';
import { ContentRepositoryModule } from '../content-repository/content-repository.module';
import { NodeTypeMappingBuilderService } from './node-type-mapping-builder.service';

@Module({
  imports: [ContentRepositoryModule],
  providers: [NodeTypeMappingBuilderService],
  exports: [NodeTypeMappingBuilderService],
})
export class MappingModule {}
