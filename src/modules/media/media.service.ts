import {
  BadGatewayException,
  BadRequestException,
  HttpException,
  HttpStatus,
  Injectable,
  Logger,
  NotFoundException,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { stat } from 'fs/promises';
import { basename, join, resolve } from 'path';
import { AppConfig } from '../../configs/app.config';
import { PipelineConfig } from '../../configs/pipeline.config';
import { FetchError } from '../../common/errors/skyvision.errors';
import { isNotFound } from '../../common/utils/file.util';
import { MAX_IMAGE_BYTES } from '../../common/utils/image.util';
import { FetchedImage, ImageFetcher } from '../fetch/image-fetcher';

export interface MediaCheck {
  ok: true;
  path: string;
  size: number;
}

@Injectable()
export class MediaService {
  private readonly logger = new Logger(MediaService.name);
  private readonly mediaDir: string;
  private readonly timeoutMs: number;

  constructor(
    private readonly configService: ConfigService,
    private readonly fetcher: ImageFetcher,
  ) {
    this.mediaDir = resolve(this.configService.getOrThrow<AppConfig>('app').mediaDir);
    this.timeoutMs = this.configService.getOrThrow<PipelineConfig>('pipeline').fetchTimeoutMs;
  }

  getMediaDir(): string {
    return this.mediaDir;
  }

  /** Stat a cached media file. Only bare file names inside the media directory are accepted. */
  async check(filename: string | undefined): Promise<MediaCheck> {
    const name = (filename ?? '').trim();
    if (!name || name !== basename(name) || name === '.' || name === '..' || name.includes('\\')) {
      throw new BadRequestException('filename must be a bare file name');
    }

    try {
      const info = await stat(join(this.mediaDir, name));
      if (!info.isFile()) {
        throw new NotFoundException(`Media file not found: ${name}`);
      }
      return { ok: true, path: `/media/${name}`, size: info.size };
    } catch (error) {
      if (isNotFound(error)) {
        throw new NotFoundException(`Media file not found: ${name}`);
      }
      throw error;
    }
  }

  /**
   * Fetch a remote image for the browser. Upstream error statuses are relayed;
   * transport failures become 502.
   */
  async proxy(url: string | undefined): Promise<FetchedImage> {
    const target = (url ?? '').trim();
    if (!/^https?:\/\//i.test(target)) {
      throw new BadRequestException('u must be an absolute http(s) URL');
    }

    let response: FetchedImage;
    try {
      response = await this.fetcher.fetch(target, {
        timeoutMs: this.timeoutMs,
        maxBytes: MAX_IMAGE_BYTES,
      });
    } catch (error) {
      if (error instanceof FetchError) {
        this.logger.warn(`Proxy fetch failed for ${target}: ${error.message}`);
        throw new BadGatewayException(`Upstream fetch failed: ${error.message}`);
      }
      throw error;
    }

    if (response.status !== HttpStatus.OK) {
      const status = response.status >= 400 && response.status <= 599 ? response.status : HttpStatus.BAD_GATEWAY;
      throw new HttpException(`Upstream returned ${response.status}`, status);
    }
    return response;
  }
}
