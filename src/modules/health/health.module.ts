import { Module } from '@nestjs/common';
import { CatalogModule } from '../catalog/catalog.module';
import { EmbeddingModule } from '../embedding/embedding.module';
import { HealthController } from './health.controller';
import { HealthService } from './health.service';

@Module({
  imports: [CatalogModule, EmbeddingModule],
  providers: [HealthService],
  controllers: [HealthController],
})
export class HealthModule {}
