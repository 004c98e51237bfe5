import { registerAs } from '@nestjs/config';
import { parseBoolean, parseInteger } from '../common/utils/env.util';

export interface EmbeddingConfig {
  model: string;
  // Must match the VECTOR(n) width of the airports/airlines tables
  dimensions: number;
  batchSize: number;
  loadOnStart: boolean;
}

export default registerAs(
  'embedding',
  (): EmbeddingConfig => ({
    // CLIP ViT-B/32 exported to ONNX; text and image share one 512-d space
    model: process.env.EMBEDDING_MODEL || 'Xenova/clip-vit-base-patch32',
    dimensions: parseInteger(process.env.EMBEDDING_DIM, 512, 'EMBEDDING_DIM', 1),
    batchSize: parseInteger(process.env.EMBEDDING_BATCH_SIZE, 32, 'EMBEDDING_BATCH_SIZE', 1),
    loadOnStart: parseBoolean(process.env.EMBEDDING_LOAD_ON_START, true),
  }),
);
