import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { mkdir, readFile, readdir, unlink } from 'fs/promises';
import { join } from 'path';
import { setTimeout as sleep } from 'timers/promises';
import { PipelineConfig } from '../../configs/pipeline.config';
import { FetchError, errorMessage } from '../../common/errors/skyvision.errors';
import { fileExists, writeFileAtomic } from '../../common/utils/file.util';
import {
  MAX_IMAGE_BYTES,
  extensionForMime,
  extensionFromUrl,
  isImageContentType,
  sniffImageMime,
} from '../../common/utils/image.util';
import { ImageFetcher } from '../fetch/image-fetcher';
import {
  LOCAL_MEDIA_PREFIX,
  indexMediaRows,
  isLocalMediaUrl,
  localizedTablePath,
  mediaKey,
  parseMediaTable,
  readMediaTable,
  writeMediaTable,
} from './media-table';
import {
  CleanUrlTableResult,
  LocalizeResult,
  LocalizeRowResult,
  LocalizeStatus,
  MediaRow,
} from './pipeline.types';

const CACHE_FILE = /^(airport|airline)_(-?\d+)\.(jpg|png|webp|gif)$/;

export interface LocalizeOptions {
  urlsCsv: string;
  mediaDir: string;
  overwrite?: boolean;
  strict?: boolean;
  concurrency?: number;
  retries?: number;
  timeoutMs?: number;
  // first backoff delay; doubles after every failed attempt
  retryDelayMs?: number;
}

interface DownloadedImage {
  data: Buffer;
  contentType: string | null;
}

/**
 * Downloads the images named in the URL table into the media cache. Each
 * entity owns exactly one cache file, `<kind>_<id><ext>`.
 */
@Injectable()
export class ImageLocalizerService {
  private readonly logger = new Logger(ImageLocalizerService.name);
  private readonly defaults: PipelineConfig;

  constructor(
    private readonly configService: ConfigService,
    private readonly fetcher: ImageFetcher,
  ) {
    this.defaults = this.configService.getOrThrow<PipelineConfig>('pipeline');
  }

  /**
   * Normalize the URL table in place: known entity types only, integer ids,
   * non-empty URLs, one row per entity. A missing table becomes an empty
   * template.
   */
  async cleanUrlTable(path: string): Promise<CleanUrlTableResult> {
    if (!(await fileExists(path))) {
      await writeMediaTable(path, []);
      this.logger.log(`Created template: ${path}`);
      return { path, created: true, rows: 0, dropped: 0 };
    }

    const table = parseMediaTable(await readFile(path, 'utf-8'), path);
    const withUrl = table.rows.filter((row) => row.url !== null);
    const rows = [...indexMediaRows(withUrl).values()];
    const dropped = table.invalid + (table.rows.length - rows.length);

    await writeMediaTable(path, rows);
    this.logger.log(`Cleaned image url list -> ${path} (${rows.length} rows, ${dropped} dropped)`);
    return { path, created: false, rows: rows.length, dropped };
  }

  async localize(options: LocalizeOptions): Promise<LocalizeResult> {
    const overwrite = options.overwrite ?? false;
    const strict = options.strict ?? this.defaults.fetchStrict;
    const concurrency = Math.max(1, options.concurrency ?? this.defaults.fetchConcurrency);
    const outputCsv = localizedTablePath(options.urlsCsv);

    const counts: Record<LocalizeStatus, number> = {
      downloaded: 0,
      cached: 0,
      kept: 0,
      skipped: 0,
      failed: 0,
    };

    if (!(await fileExists(options.urlsCsv))) {
      this.logger.warn(`No image url table at ${options.urlsCsv}; nothing to localize`);
      return { outputCsv, counts, rows: [] };
    }

    const table = await readMediaTable(options.urlsCsv);
    if (table.invalid > 0) {
      this.logger.warn(`${table.invalid} rows of ${options.urlsCsv} have no valid entity type or id`);
    }

    await mkdir(options.mediaDir, { recursive: true });
    const cached = await this.scanCache(options.mediaDir);
    const claimed = new Set<string>();

    const results: LocalizeRowResult[] = [];
    const outputRows: MediaRow[] = [];

    for (let i = 0; i < table.rows.length; i += concurrency) {
      const batch = table.rows.slice(i, i + concurrency);
      const settled = await Promise.all(
        batch.map((row) => {
          const key = mediaKey(row.entityType, row.id);
          if (claimed.has(key)) {
            return Promise.resolve(this.result(row, 'skipped', { error: 'duplicate entity row' }));
          }
          claimed.add(key);
          return this.localizeRow(row, options, cached, overwrite);
        }),
      );

      settled.forEach((result, j) => {
        counts[result.status]++;
        results.push(result);
        const row = batch[j];
        outputRows.push(result.file ? { ...row, url: `${LOCAL_MEDIA_PREFIX}${result.file}` } : row);
      });
    }

    await writeMediaTable(outputCsv, outputRows);
    this.logger.log(
      `Localized images -> ${outputCsv}: downloaded=${counts.downloaded}, cached=${counts.cached}, ` +
        `kept=${counts.kept}, skipped=${counts.skipped}, failed=${counts.failed}`,
    );

    if (strict && counts.failed > 0) {
      const firstFailure = results.find((result) => result.status === 'failed');
      throw new FetchError(
        `${counts.failed} image downloads failed`,
        firstFailure?.url ?? options.urlsCsv,
      );
    }
    return { outputCsv, counts, rows: results };
  }

  private async localizeRow(
    row: MediaRow,
    options: LocalizeOptions,
    cached: Map<string, string>,
    overwrite: boolean,
  ): Promise<LocalizeRowResult> {
    const url = row.url;
    if (!url) {
      return this.result(row, 'skipped');
    }
    if (isLocalMediaUrl(url)) {
      return this.result(row, 'kept');
    }
    if (!isHttpUrl(url)) {
      const error = new FetchError('Not an absolute http(s) URL', url);
      this.logger.warn(`${row.entityType} ${row.id}: ${error.message}: ${url}`);
      return this.result(row, 'failed', { error: error.message });
    }

    const key = mediaKey(row.entityType, row.id);
    const existing = cached.get(key);
    if (existing && !overwrite) {
      return this.result(row, 'cached', { file: existing });
    }

    try {
      const image = await this.download(url, options);
      const ext =
        extensionFromUrl(url) ||
        extensionForMime(image.contentType) ||
        extensionForMime(sniffImageMime(image.data)) ||
        '.jpg';
      const file = `${row.entityType}_${row.id}${ext}`;

      await writeFileAtomic(join(options.mediaDir, file), image.data);
      if (existing && existing !== file) {
        await this.removeStale(options.mediaDir, existing);
      }
      cached.set(key, file);
      this.logger.debug(`${url} -> ${file}`);
      return this.result(row, 'downloaded', { file });
    } catch (error) {
      this.logger.warn(`${row.entityType} ${row.id}: failed ${url} (${errorMessage(error)})`);
      return this.result(row, 'failed', { error: errorMessage(error) });
    }
  }

  // the new file is already in place; a leftover copy only wastes space
  private async removeStale(mediaDir: string, file: string): Promise<void> {
    try {
      await unlink(join(mediaDir, file));
    } catch (error) {
      this.logger.warn(`Could not remove stale ${file}: ${errorMessage(error)}`);
    }
  }

  private async download(url: string, options: LocalizeOptions): Promise<DownloadedImage> {
    const retries = Math.max(1, options.retries ?? this.defaults.fetchRetries);
    const timeoutMs = options.timeoutMs ?? this.defaults.fetchTimeoutMs;
    const retryDelayMs = options.retryDelayMs ?? 500;

    let lastError: unknown;
    for (let attempt = 1; attempt <= retries; attempt++) {
      try {
        return await this.fetchImage(url, timeoutMs);
      } catch (error) {
        lastError = error;
        if (attempt < retries) {
          await sleep(retryDelayMs * 2 ** (attempt - 1));
        }
      }
    }
    if (lastError instanceof FetchError) {
      throw lastError;
    }
    throw new FetchError(errorMessage(lastError), url, { cause: lastError });
  }

  private async fetchImage(url: string, timeoutMs: number): Promise<DownloadedImage> {
    const response = await this.fetcher.fetch(url, { timeoutMs, maxBytes: MAX_IMAGE_BYTES });
    if (response.status < 200 || response.status >= 300) {
      throw new FetchError(`HTTP ${response.status}`, url);
    }
    // Some hosts mislabel images, so a recognizable signature also counts
    if (!isImageContentType(response.contentType) && !sniffImageMime(response.data)) {
      throw new FetchError(`Non-image content-type: ${response.contentType ?? 'unknown'}`, url);
    }
    if (response.data.length === 0) {
      throw new FetchError('Empty response body', url);
    }
    return { data: response.data, contentType: response.contentType };
  }

  /** Existing cache files keyed by `<kind>:<id>`. */
  private async scanCache(mediaDir: string): Promise<Map<string, string>> {
    const cached = new Map<string, string>();
    for (const name of (await readdir(mediaDir)).sort()) {
      const match = CACHE_FILE.exec(name);
      if (match) {
        cached.set(mediaKey(match[1], parseInt(match[2], 10)), name);
      }
    }
    return cached;
  }

  private result(
    row: MediaRow,
    status: LocalizeStatus,
    extra: { file?: string; error?: string } = {},
  ): LocalizeRowResult {
    return { entityType: row.entityType, id: row.id, url: row.url, status, ...extra };
  }
}

function isHttpUrl(value: string): boolean {
  try {
    const url = new URL(value);
    return url.protocol === 'http:' || url.protocol === 'https:';
  } catch {
    return false;
  }
}
