import { Module } from '@nestjs/common';
import { CatalogModule } from '../catalog/catalog.module';
import { EmbeddingModule } from '../embedding/embedding.module';
import { FetchModule } from '../fetch/fetch.module';
import { CsvIngestService } from './csv-ingest.service';
import { EntityEmbedderService } from './entity-embedder.service';
import { EntityLoaderService } from './entity-loader.service';
import { ImageLocalizerService } from './image-localizer.service';
import { SeedService } from './seed.service';

@Module({
  imports: [CatalogModule, EmbeddingModule, FetchModule],
  providers: [
    CsvIngestService,
    ImageLocalizerService,
    EntityEmbedderService,
    EntityLoaderService,
    SeedService,
  ],
  exports: [SeedService],
})
export class PipelineModule {}
