import { Injectable, Logger } from '@nestjs/common';
import { readFile } from 'fs/promises';
import { basename, join } from 'path';
import { EmbeddingError, errorMessage } from '../../common/errors/skyvision.errors';
import { writeJsonFile } from '../../common/utils/file.util';
import {
  EmbeddingRecord,
  EntityKind,
  EntityRecord,
  ENTITY_KINDS,
  tableFor,
} from '../../types/entity.types';
import { EmbeddingService } from '../embedding/embedding.service';
import {
  LOCAL_MEDIA_PREFIX,
  indexMediaRows,
  isLocalMediaUrl,
  mediaKey,
  readPreferredMediaTable,
} from './media-table';
import { embeddingsPath, readRecords } from './processed-data';
import { EmbedCounts, MediaRow, PerKind } from './pipeline.types';

export interface EmbedOptions {
  processedDir: string;
  urlsCsv: string;
  mediaDir: string;
  preferImage: boolean;
}

export function textPrompt(record: EntityRecord): string {
  if ('callsign' in record) {
    const base = `${record.name} airline logo, brand identity, typography, colors`;
    return record.country ? `${base}, ${record.country}` : base;
  }
  const place = [record.name, record.city, record.country]
    .filter((part): part is string => Boolean(part))
    .join(', ');
  return `${place}. airport, architecture, travel, terminals, runways.`;
}

/**
 * Produces one vector per entity: the cached image's when image embedding is
 * preferred and succeeds, otherwise the descriptive text's.
 */
@Injectable()
export class EntityEmbedderService {
  private readonly logger = new Logger(EntityEmbedderService.name);

  constructor(private readonly embeddingService: EmbeddingService) {}

  async embed(options: EmbedOptions): Promise<PerKind<EmbedCounts>> {
    // Fails fast with ModelLoadError before any output is touched
    await this.embeddingService.load();

    const media = await this.readMedia(options.urlsCsv);
    const counts: PerKind<EmbedCounts> = {
      airport: emptyCounts(),
      airline: emptyCounts(),
    };
    for (const kind of ENTITY_KINDS) {
      counts[kind] = await this.embedKind(kind, options, media);
    }
    return counts;
  }

  private async embedKind(
    kind: EntityKind,
    options: EmbedOptions,
    media: Map<string, MediaRow>,
  ): Promise<EmbedCounts> {
    const records = await readRecords(options.processedDir, kind);
    const counts = emptyCounts();

    const textVectors = await this.embedPrompts(records);
    const output: EmbeddingRecord[] = [];

    for (let i = 0; i < records.length; i++) {
      const record = records[i];
      if (options.preferImage) {
        const imageVector = await this.embedCachedImage(
          kind,
          record.id,
          media.get(mediaKey(kind, record.id)),
          options.mediaDir,
          counts,
        );
        if (imageVector) {
          output.push({ id: record.id, source: 'image', vector: imageVector });
          counts.image++;
          continue;
        }
      }

      const textVector = textVectors[i];
      if (textVector) {
        output.push({ id: record.id, source: 'text', vector: textVector });
        counts.text++;
      } else {
        counts.failed++;
      }
    }

    const outPath = embeddingsPath(options.processedDir, kind);
    await writeJsonFile(outPath, output, { pretty: false });
    this.logger.log(
      `Embedded ${tableFor(kind)}: ${counts.image} image, ${counts.text} text, ` +
        `${counts.failed} failed, ${counts.imageErrors} image errors -> ${outPath}`,
    );
    return counts;
  }

  /**
   * Batch-embed every prompt. When a batch fails, its prompts are retried one
   * by one so a single bad input only costs its own entity.
   */
  private async embedPrompts(records: EntityRecord[]): Promise<(number[] | null)[]> {
    const prompts = records.map(textPrompt);
    try {
      return await this.embeddingService.embedTexts(prompts);
    } catch (error) {
      if (!(error instanceof EmbeddingError)) {
        throw error;
      }
      this.logger.warn(`Batch text embedding failed, retrying per entity: ${error.message}`);
    }

    const vectors: (number[] | null)[] = [];
    for (let i = 0; i < prompts.length; i++) {
      try {
        vectors.push(await this.embeddingService.embedText(prompts[i]));
      } catch (error) {
        if (!(error instanceof EmbeddingError)) {
          throw error;
        }
        this.logger.warn(`Text embedding failed for id=${records[i].id}: ${error.message}`);
        vectors.push(null);
      }
    }
    return vectors;
  }

  private async embedCachedImage(
    kind: EntityKind,
    id: number,
    row: MediaRow | undefined,
    mediaDir: string,
    counts: EmbedCounts,
  ): Promise<number[] | null> {
    if (!row || !isLocalMediaUrl(row.url)) {
      return null;
    }
    const path = join(mediaDir, basename(row.url.slice(LOCAL_MEDIA_PREFIX.length)));

    let data: Buffer;
    try {
      data = await readFile(path);
    } catch (error) {
      counts.imageErrors++;
      this.logger.warn(`${kind} ${id}: cached image unreadable, using text (${errorMessage(error)})`);
      return null;
    }

    try {
      return await this.embeddingService.embedImage(data);
    } catch (error) {
      if (!(error instanceof EmbeddingError)) {
        throw error;
      }
      counts.imageErrors++;
      this.logger.warn(`${kind} ${id}: ${error.message}, using text`);
      return null;
    }
  }

  /** Prefer the localized table written by the localize stage. */
  private async readMedia(urlsCsv: string): Promise<Map<string, MediaRow>> {
    const table = await readPreferredMediaTable(urlsCsv);
    this.logger.log(`Using media table ${table.source} (${table.rows.length} rows)`);
    return indexMediaRows(table.rows);
  }
}

function emptyCounts(): EmbedCounts {
  return { text: 0, image: 0, failed: 0, imageErrors: 0 };
}
