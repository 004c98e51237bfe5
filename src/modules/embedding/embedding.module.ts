import { Module } from '@nestjs/common';
import { EmbeddingService } from './embedding.service';
import { CLIP_BACKEND_LOADER, TransformersClipLoader } from './clip-backend';

@Module({
  providers: [
    EmbeddingService,
    { provide: CLIP_BACKEND_LOADER, useClass: TransformersClipLoader },
  ],
  exports: [EmbeddingService],
})
export class EmbeddingModule {}
