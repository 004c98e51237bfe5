import { Inject, Injectable, Logger, OnModuleInit } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { EmbeddingConfig } from '../../configs/embedding.config';
import {
  EmbeddingError,
  ModelLoadError,
  ModelUnavailableError,
  SkyVisionError,
  errorMessage,
} from '../../common/errors/skyvision.errors';
import { assertDimension, l2Normalize } from '../../common/utils/vector.util';
import { MAX_IMAGE_BYTES, sniffImageMime } from '../../common/utils/image.util';
import { CLIP_BACKEND_LOADER, ClipBackend, ClipBackendLoader } from './clip-backend';

export interface EmbeddingStatus {
  model: string;
  dimensions: number;
  loaded: boolean;
  error: string | null;
}

/**
 * Holds the one CLIP model instance of the process. The model is loaded once
 * (on module init unless disabled) and only read afterwards, so concurrent
 * requests share it.
 */
@Injectable()
export class EmbeddingService implements OnModuleInit {
  private readonly logger = new Logger(EmbeddingService.name);

  private readonly modelName: string;
  private readonly embeddingDimensions: number;
  private readonly batchSize: number;
  private readonly loadOnStart: boolean;

  private backend: ClipBackend | null = null;
  private loading: Promise<ClipBackend> | null = null;
  private lastLoadError: string | null = null;

  constructor(
    private readonly configService: ConfigService,
    @Inject(CLIP_BACKEND_LOADER) private readonly loader: ClipBackendLoader,
  ) {
    const config = this.configService.getOrThrow<EmbeddingConfig>('embedding');
    this.modelName = config.model;
    this.embeddingDimensions = config.dimensions;
    this.batchSize = Math.max(1, config.batchSize);
    this.loadOnStart = config.loadOnStart;
  }

  async onModuleInit() {
    if (!this.loadOnStart) {
      return;
    }
    try {
      await this.load();
    } catch (error) {
      // Searches answer 503 and /readyz reports the failure until a later load succeeds
      this.logger.warn(`Continuing without embedding model: ${errorMessage(error)}`);
    }
  }

  /**
   * Load the model if it is not loaded yet. Concurrent callers share one load.
   * @throws ModelLoadError when the model cannot be obtained or its output
   * width differs from the configured dimension
   */
  async load(): Promise<ClipBackend> {
    if (this.backend) {
      return this.backend;
    }
    if (!this.loading) {
      this.loading = this.loadBackend().finally(() => {
        this.loading = null;
      });
    }
    return this.loading;
  }

  private async loadBackend(): Promise<ClipBackend> {
    this.logger.log(`Loading CLIP model: ${this.modelName}...`);

    let backend: ClipBackend;
    let probe: number[] | undefined;
    try {
      backend = await this.loader.load(this.modelName);
      [probe] = await backend.embedTexts(['dimension probe']);
    } catch (error) {
      this.lastLoadError = errorMessage(error);
      this.logger.error(`Failed to load CLIP model ${this.modelName}: ${this.lastLoadError}`);
      throw new ModelLoadError(
        `Failed to load embedding model ${this.modelName}: ${this.lastLoadError}`,
        { cause: error },
      );
    }

    const width = probe?.length ?? 0;
    if (width !== this.embeddingDimensions) {
      this.lastLoadError = `model produces ${width}-d vectors, EMBEDDING_DIM is ${this.embeddingDimensions}`;
      this.logger.error(`CLIP model ${this.modelName} rejected: ${this.lastLoadError}`);
      throw new ModelLoadError(`Embedding model ${this.modelName}: ${this.lastLoadError}`);
    }

    this.backend = backend;
    this.lastLoadError = null;
    this.logger.log(
      `CLIP model loaded: ${this.modelName} (${this.embeddingDimensions} dimensions)`,
    );
    return backend;
  }

  private async requireBackend(): Promise<ClipBackend> {
    if (this.backend) {
      return this.backend;
    }
    try {
      return await this.load();
    } catch (error) {
      throw new ModelUnavailableError(
        `Embedding model is unavailable: ${errorMessage(error)}`,
        { cause: error },
      );
    }
  }

  async embedText(text: string): Promise<number[]> {
    const [vector] = await this.embedTexts([text]);
    return vector;
  }

  /**
   * Embed texts in batches of EMBEDDING_BATCH_SIZE. Returned vectors are
   * L2-normalized and in input order.
   */
  async embedTexts(texts: string[]): Promise<number[][]> {
    if (texts.length === 0) {
      return [];
    }
    const processed = texts.map((text) => this.preprocessText(text));
    if (processed.some((text) => text.length === 0)) {
      throw new EmbeddingError('Text cannot be empty');
    }

    const backend = await this.requireBackend();
    const vectors: number[][] = [];

    for (let i = 0; i < processed.length; i += this.batchSize) {
      const batch = processed.slice(i, i + this.batchSize);
      let raw: number[][];
      try {
        raw = await backend.embedTexts(batch);
      } catch (error) {
        throw this.wrap(error, 'text');
      }
      if (raw.length !== batch.length) {
        throw new EmbeddingError(
          `Model returned ${raw.length} text embeddings for ${batch.length} inputs`,
        );
      }
      for (const vector of raw) {
        assertDimension(vector, this.embeddingDimensions, 'text');
        vectors.push(l2Normalize(vector));
      }
    }

    this.logger.debug(`Generated ${vectors.length} text embeddings`);
    return vectors;
  }

  /**
   * Embed one encoded image (JPEG, PNG, WEBP or GIF).
   * @throws EmbeddingError for oversized, unsupported or corrupted images
   */
  async embedImage(data: Uint8Array, maxBytes = MAX_IMAGE_BYTES): Promise<number[]> {
    if (data.length === 0) {
      throw new EmbeddingError('Image is empty');
    }
    if (data.length > maxBytes) {
      throw new EmbeddingError(`Image exceeds ${Math.floor(maxBytes / (1024 * 1024))} MB limit`);
    }
    if (!sniffImageMime(data)) {
      throw new EmbeddingError('Unsupported or corrupted image');
    }

    const backend = await this.requireBackend();
    let vector: number[];
    try {
      vector = await backend.embedImage(data);
    } catch (error) {
      throw this.wrap(error, 'image');
    }
    assertDimension(vector, this.embeddingDimensions, 'image');
    return l2Normalize(vector);
  }

  private wrap(error: unknown, what: 'text' | 'image'): SkyVisionError {
    if (error instanceof SkyVisionError) {
      return error;
    }
    return new EmbeddingError(`Failed to embed ${what}: ${errorMessage(error)}`, { cause: error });
  }

  /**
   * Collapse whitespace and cap the length; the tokenizer truncates to the
   * model's context anyway.
   */
  private preprocessText(text: string, maxLength = 1000): string {
    const processed = (text || '').replace(/\s+/g, ' ').trim();
    return processed.length > maxLength ? processed.substring(0, maxLength) : processed;
  }

  isAvailable(): boolean {
    return this.backend !== null;
  }

  getDimensions(): number {
    return this.embeddingDimensions;
  }

  getModelName(): string {
    return this.modelName;
  }

  getStatus(): EmbeddingStatus {
    return {
      model: this.modelName,
      dimensions: this.embeddingDimensions,
      loaded: this.backend !== null,
      error: this.lastLoadError,
    };
  }
}
