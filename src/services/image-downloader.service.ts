import axios from 'axios';
import type { AxiosInstance, AxiosResponse } from 'axios';
import { CONFIG } from '../config';
import { ImageTransientError, ImageValidationError } from '../errors';

export interface ImageDownloader {
  download(url: string, signal?: AbortSignal): Promise<Buffer>;
}

/**
 * Downloads listing images the way a browser on the listing page would,
 * so hotlink protection lets the request through
 */
export class AxiosImageDownloader implements ImageDownloader {
  constructor(
    private readonly http: AxiosInstance = axios.create({
      timeout: CONFIG.images.timeoutMs,
      headers: { 'User-Agent': CONFIG.scraper.userAgent },
    }),
    private readonly referer: string = CONFIG.images.referer
  ) {}

  async download(url: string, signal?: AbortSignal): Promise<Buffer> {
    const response = await this.request(url, signal);

    if (response.status < 200 || response.status >= 300) {
      throw new ImageValidationError(`Invalid status code ${response.status} for ${url}`);
    }

    const contentType = String(response.headers['content-type'] ?? '');
    if (!contentType.startsWith('image/')) {
      throw new ImageValidationError(`Invalid content type "${contentType}" for ${url}`);
    }

    return Buffer.from(response.data);
  }

  private async request(url: string, signal?: AbortSignal): Promise<AxiosResponse<ArrayBuffer>> {
    try {
      return await this.http.get<ArrayBuffer>(url, {
        responseType: 'arraybuffer',
        headers: { Accept: 'image/*', Referer: this.referer },
        validateStatus: () => true,
        signal,
      });
    } catch (error) {
      // A cancelled download is not worth another attempt
      if (axios.isCancel(error)) {
        throw error;
      }
      if (axios.isAxiosError(error) && error.response === undefined) {
        throw new ImageTransientError(`Failed to download ${url}: ${error.message}`, {
          cause: error,
        });
      }
      throw error;
    }
  }
}
