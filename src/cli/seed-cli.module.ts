import { Module } from '@nestjs/common';
import { DatabaseModule } from '../database.module';
import { PipelineModule } from '../modules/pipeline/pipeline.module';

@Module({
  imports: [DatabaseModule, PipelineModule],
})
export class SeedCliModule {}
