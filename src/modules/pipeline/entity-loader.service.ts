import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { EmbeddingConfig } from '../../configs/embedding.config';
import {
  DimensionMismatchError,
  LoadError,
  errorMessage,
} from '../../common/errors/skyvision.errors';
import { buildMetadata, invalidMetadataKeys } from '../../common/utils/metadata.util';
import { assertDimension } from '../../common/utils/vector.util';
import { ENTITY_KINDS, EntityKind, StoredEntity, tableFor } from '../../types/entity.types';
import { EntityStore } from '../catalog/entity-store';
import { indexMediaRows, mediaKey, readPreferredMediaTable } from './media-table';
import { readEmbeddings, readRecords } from './processed-data';
import { LoadCounts, MediaRow, PerKind } from './pipeline.types';

interface PreparedRows {
  rows: StoredEntity[];
  skipped: number;
}

export interface LoadOptions {
  processedDir: string;
  urlsCsv: string;
  publicBaseUrl?: string | null;
  chunkSize?: number;
}

/**
 * Resolve a media URL against the public base URL. Absolute http(s) URLs are
 * kept; relative ones stay relative when no base is configured.
 */
export function absoluteUrl(url: string | null, base: string | null | undefined): string | null {
  const value = (url ?? '').trim();
  if (!value) {
    return null;
  }
  if (/^https?:\/\//i.test(value) || !base) {
    return value;
  }
  const root = base.replace(/\/+$/, '');
  return value.startsWith('/') ? `${root}${value}` : `${root}/${value}`;
}

@Injectable()
export class EntityLoaderService {
  private readonly logger = new Logger(EntityLoaderService.name);
  private readonly dimensions: number;

  constructor(
    private readonly configService: ConfigService,
    private readonly store: EntityStore,
  ) {
    this.dimensions = this.configService.getOrThrow<EmbeddingConfig>('embedding').dimensions;
  }

  /**
   * Every row of both tables is validated before the first chunk is written.
   * @throws DimensionMismatchError when a column width or any vector differs
   * from the configured dimension; nothing is written in that case
   */
  async load(options: LoadOptions): Promise<PerKind<LoadCounts>> {
    const chunkSize = Math.max(1, options.chunkSize ?? 500);
    const media = await this.readMedia(options.urlsCsv);

    const prepared: Partial<PerKind<PreparedRows>> = {};
    for (const kind of ENTITY_KINDS) {
      await this.checkColumnWidth(kind);
      prepared[kind] = await this.prepare(kind, options, media);
    }

    const counts: PerKind<LoadCounts> = {
      airport: emptyCounts(),
      airline: emptyCounts(),
    };
    for (const kind of ENTITY_KINDS) {
      const { rows, skipped } = prepared[kind] ?? { rows: [], skipped: 0 };
      counts[kind] = await this.write(kind, rows, chunkSize);
      counts[kind].skipped = skipped;
      this.logger.log(
        `Loaded ${tableFor(kind)}: inserted=${counts[kind].inserted}, updated=${counts[kind].updated}, ` +
          `failed=${counts[kind].failed}, skipped=${skipped}`,
      );
    }
    return counts;
  }

  private async prepare(
    kind: EntityKind,
    options: LoadOptions,
    media: Map<string, MediaRow>,
  ): Promise<PreparedRows> {
    const records = await readRecords(options.processedDir, kind);
    const embeddings = new Map(
      (await readEmbeddings(options.processedDir, kind)).map((record) => [record.id, record]),
    );

    const rows: StoredEntity[] = [];
    let skipped = 0;

    for (const record of records) {
      const embedding = embeddings.get(record.id);
      if (!embedding) {
        skipped++;
        continue;
      }
      assertDimension(embedding.vector, this.dimensions, `${kind} ${record.id}`);

      const mediaRow = media.get(mediaKey(kind, record.id));
      const metadata = buildMetadata(mediaRow ?? {});
      const invalid = invalidMetadataKeys(metadata);
      if (invalid.length > 0) {
        throw new LoadError(`${kind} ${record.id}: invalid metadata keys ${invalid.join(', ')}`);
      }

      rows.push({
        ...record,
        url: absoluteUrl(mediaRow?.url ?? null, options.publicBaseUrl),
        metadata: Object.keys(metadata).length > 0 ? metadata : null,
        embedding: embedding.vector,
      });
    }
    return { rows, skipped };
  }

  private async write(kind: EntityKind, rows: StoredEntity[], chunkSize: number): Promise<LoadCounts> {
    const counts = emptyCounts();

    for (let i = 0; i < rows.length; i += chunkSize) {
      const chunk = rows.slice(i, i + chunkSize);
      try {
        const written = await this.store.upsertChunk(kind, chunk);
        counts.inserted += written.inserted;
        counts.updated += written.updated;
      } catch (error) {
        // The chunk's transaction was rolled back; none of its rows were written
        const failure = new LoadError(
          `${tableFor(kind)} ids ${chunk[0].id}..${chunk[chunk.length - 1].id}: ${errorMessage(error)}`,
          { cause: error },
        );
        counts.failed += chunk.length;
        counts.errors.push(failure.message);
        this.logger.error(`Chunk failed, ${chunk.length} rows rolled back: ${failure.message}`);
      }
    }
    return counts;
  }

  private async checkColumnWidth(kind: EntityKind): Promise<void> {
    const width = await this.store.vectorDimension(kind);
    if (width === null) {
      this.logger.warn(`Could not read the vector column width of ${tableFor(kind)}`);
      return;
    }
    if (width !== this.dimensions) {
      throw new DimensionMismatchError(this.dimensions, width, `${tableFor(kind)}.embedding column`);
    }
  }

  private async readMedia(urlsCsv: string): Promise<Map<string, MediaRow>> {
    const table = await readPreferredMediaTable(urlsCsv);
    return indexMediaRows(table.rows);
  }
}

function emptyCounts(): LoadCounts {
  return { inserted: 0, updated: 0, failed: 0, skipped: 0, errors: [] };
}
