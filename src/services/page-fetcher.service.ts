import axios from 'axios';
import type { AxiosInstance, AxiosResponse } from 'axios';
import { CONFIG } from '../config';
import { FetchFailedError } from '../errors';
import type { FetchedPage } from '../types';

const DNS_ERROR_CODES = new Set(['ENOTFOUND', 'EAI_AGAIN']);
const TIMEOUT_ERROR_CODES = new Set(['ECONNABORTED', 'ETIMEDOUT']);

/**
 * Issues a single GET for a listing page. Non-2xx responses are returned,
 * transport errors are thrown.
 */
export interface PageFetcher {
  fetch(url: string, signal?: AbortSignal): Promise<FetchedPage>;
}

export class AxiosPageFetcher implements PageFetcher {
  constructor(
    private readonly http: AxiosInstance = axios.create({
      timeout: CONFIG.scraper.timeoutMs,
      headers: {
        'User-Agent': CONFIG.scraper.userAgent,
        Accept: 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8',
        'Accept-Language': 'ja,en-US;q=0.7,en;q=0.3',
      },
    })
  ) {}

  async fetch(url: string, signal?: AbortSignal): Promise<FetchedPage> {
    const response = await this.http.get<string>(url, {
      responseType: 'text',
      validateStatus: () => true,
      signal,
    });

    return {
      status: response.status,
      url: resolveFinalUrl(response, url),
      html: response.data,
    };
  }
}

/**
 * The Node adapter follows redirects and leaves the last hop on the
 * underlying response
 */
export function resolveFinalUrl(response: AxiosResponse, requestedUrl: string): string {
  const request: unknown = response.request;
  if (typeof request === 'object' && request !== null && 'res' in request) {
    const res: unknown = request.res;
    if (
      typeof res === 'object' &&
      res !== null &&
      'responseUrl' in res &&
      typeof res.responseUrl === 'string'
    ) {
      return res.responseUrl;
    }
  }
  return requestedUrl;
}

export function failureForStatus(status: number, url: string): FetchFailedError {
  if (status === 404) {
    return new FetchFailedError('not_found', url, `Listing not found (404): ${url}`, status);
  }
  return new FetchFailedError('http', url, `HTTP error ${status} on ${url}`, status);
}

export function classifyFetchError(error: unknown, url: string): FetchFailedError {
  if (error instanceof FetchFailedError) {
    return error;
  }

  if (axios.isAxiosError(error)) {
    if (error.response) {
      return failureForStatus(error.response.status, url);
    }

    const code = error.code ?? '';
    if (DNS_ERROR_CODES.has(code)) {
      return new FetchFailedError('dns', url, `Could not resolve host for ${url}`, undefined, {
        cause: error,
      });
    }
    if (TIMEOUT_ERROR_CODES.has(code)) {
      return new FetchFailedError('timeout', url, `Request timed out for ${url}`, undefined, {
        cause: error,
      });
    }
  }

  const message = error instanceof Error ? error.message : String(error);
  return new FetchFailedError('network', url, `Request failed for ${url}: ${message}`, undefined, {
    cause: error,
  });
}
