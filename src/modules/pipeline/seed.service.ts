import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { AppConfig } from '../../configs/app.config';
import { PipelineConfig } from '../../configs/pipeline.config';
import { CsvIngestService } from './csv-ingest.service';
import { EntityEmbedderService } from './entity-embedder.service';
import { EntityLoaderService } from './entity-loader.service';
import { ImageLocalizerService } from './image-localizer.service';
import {
  CleanUrlTableResult,
  EmbedCounts,
  IngestCounts,
  LoadCounts,
  LocalizeResult,
  PerKind,
} from './pipeline.types';

export const SEED_STAGES = ['clean-urls', 'ingest', 'localize', 'embed', 'load'] as const;

export type SeedStage = (typeof SEED_STAGES)[number];

export interface SeedOptions {
  rawDir: string;
  processedDir: string;
  urlsCsv: string;
  mediaDir: string;
  maxErrors: number;
  overwrite: boolean;
  strict: boolean;
  preferImage: boolean;
  publicBaseUrl: string | null;
  chunkSize: number;
}

export interface SeedReport {
  stages: SeedStage[];
  cleanUrls?: CleanUrlTableResult;
  ingest?: PerKind<IngestCounts>;
  localize?: LocalizeResult;
  embed?: PerKind<EmbedCounts>;
  load?: PerKind<LoadCounts>;
  // false when any loader row failed
  ok: boolean;
}

/**
 * Runs the seeding stages in order. A stage that throws aborts the run; the
 * loader's per-chunk failures are reported through `ok`.
 */
@Injectable()
export class SeedService {
  private readonly logger = new Logger(SeedService.name);

  constructor(
    private readonly configService: ConfigService,
    private readonly ingestService: CsvIngestService,
    private readonly localizerService: ImageLocalizerService,
    private readonly embedderService: EntityEmbedderService,
    private readonly loaderService: EntityLoaderService,
  ) {}

  /** Configured defaults with the given overrides applied. */
  resolveOptions(overrides: Partial<SeedOptions> = {}): SeedOptions {
    const pipeline = this.configService.getOrThrow<PipelineConfig>('pipeline');
    const app = this.configService.getOrThrow<AppConfig>('app');

    return {
      rawDir: overrides.rawDir ?? pipeline.rawDir,
      processedDir: overrides.processedDir ?? pipeline.processedDir,
      urlsCsv: overrides.urlsCsv ?? pipeline.urlsCsv,
      mediaDir: overrides.mediaDir ?? app.mediaDir,
      maxErrors: overrides.maxErrors ?? pipeline.parseMaxErrors,
      overwrite: overrides.overwrite ?? false,
      strict: overrides.strict ?? pipeline.fetchStrict,
      preferImage: overrides.preferImage ?? pipeline.preferImage,
      publicBaseUrl: overrides.publicBaseUrl ?? app.publicBaseUrl,
      chunkSize: overrides.chunkSize ?? pipeline.loadChunkSize,
    };
  }

  async run(stages: readonly SeedStage[], options: SeedOptions): Promise<SeedReport> {
    const ordered = SEED_STAGES.filter((stage) => stages.includes(stage));
    const report: SeedReport = { stages: ordered, ok: true };

    for (const stage of ordered) {
      this.logger.log(`Stage ${stage}...`);
      switch (stage) {
        case 'clean-urls':
          report.cleanUrls = await this.localizerService.cleanUrlTable(options.urlsCsv);
          break;
        case 'ingest':
          report.ingest = await this.ingestService.ingest({
            rawDir: options.rawDir,
            outDir: options.processedDir,
            maxErrors: options.maxErrors,
          });
          break;
        case 'localize':
          report.localize = await this.localizerService.localize({
            urlsCsv: options.urlsCsv,
            mediaDir: options.mediaDir,
            overwrite: options.overwrite,
            strict: options.strict,
          });
          break;
        case 'embed':
          report.embed = await this.embedderService.embed({
            processedDir: options.processedDir,
            urlsCsv: options.urlsCsv,
            mediaDir: options.mediaDir,
            preferImage: options.preferImage,
          });
          break;
        case 'load':
          report.load = await this.loaderService.load({
            processedDir: options.processedDir,
            urlsCsv: options.urlsCsv,
            publicBaseUrl: options.publicBaseUrl,
            chunkSize: options.chunkSize,
          });
          report.ok = report.load.airport.failed === 0 && report.load.airline.failed === 0;
          break;
      }
    }

    return report;
  }
}
