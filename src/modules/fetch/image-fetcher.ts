import { Injectable } from '@nestjs/common';
import axios from 'axios';
import { FetchError, errorMessage } from '../../common/errors/skyvision.errors';

export interface FetchedImage {
  status: number;
  contentType: string | null;
  data: Buffer;
}

export interface FetchImageOptions {
  timeoutMs: number;
  maxBytes: number;
}

/**
 * HTTP GET for image bytes. Non-2xx responses resolve with their status;
 * transport failures (DNS, timeout, oversize body) reject with FetchError.
 */
export abstract class ImageFetcher {
  abstract fetch(url: string, options: FetchImageOptions): Promise<FetchedImage>;
}

const BROWSER_HEADERS = {
  'User-Agent':
    'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/126.0 Safari/537.36',
  Accept: 'image/avif,image/webp,image/apng,image/*,*/*;q=0.8',
  'Accept-Language': 'en-US,en;q=0.9',
};

@Injectable()
export class AxiosImageFetcher extends ImageFetcher {
  async fetch(url: string, options: FetchImageOptions): Promise<FetchedImage> {
    const headers: Record<string, string> = { ...BROWSER_HEADERS };
    // Wikimedia rejects hotlinks without a referer
    if (url.includes('upload.wikimedia.org')) {
      headers.Referer = 'https://commons.wikimedia.org/';
    }

    try {
      const response = await axios.get<ArrayBuffer>(url, {
        headers,
        responseType: 'arraybuffer',
        timeout: options.timeoutMs,
        maxContentLength: options.maxBytes,
        maxRedirects: 5,
        validateStatus: () => true,
      });
      const contentType: unknown = response.headers['content-type'];
      return {
        status: response.status,
        contentType: typeof contentType === 'string' ? contentType : null,
        data: Buffer.from(response.data),
      };
    } catch (error) {
      const reason = errorMessage(error);
      throw new FetchError(`Request failed: ${reason}`, url, { cause: error });
    }
  }
}
