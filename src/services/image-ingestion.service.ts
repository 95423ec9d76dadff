import { setTimeout as sleep } from 'node:timers/promises';
import pLimit from 'p-limit';
import { CONFIG } from '../config';
import { ImageTransientError } from '../errors';
import type { IngestionReport } from '../types';
import { blobNameFor } from '../utils/blob-name';
import type { ImageDownloader } from './image-downloader.service';
import type { ImageNormalizer } from './image-normalizer.service';
import type { ObjectStore } from './object-store.service';

export interface ImageIngestionOptions {
  folder: string;
  concurrency: number;
  maxRetries: number;
  retryDelayMs: number;
}

type ImageOutcome =
  | { kind: 'existing'; location: string }
  | { kind: 'uploaded'; location: string }
  | { kind: 'failed'; reason: string };

export interface IngestionSummary {
  level: 'log' | 'error';
  message: string;
}

/**
 * One line per batch, or null when every image was already stored
 */
export function summarizeIngestion(
  propertyId: string,
  report: IngestionReport
): IngestionSummary | null {
  const { existing, uploaded } = report;
  const failed = report.failed.length;
  const total = existing + uploaded + failed;

  if (total === 0 || (uploaded === 0 && failed === 0)) {
    return null;
  }
  if (failed === 0) {
    return existing === 0
      ? { level: 'log', message: `Uploaded ${uploaded} new images for property ${propertyId}` }
      : {
          level: 'log',
          message: `Stored ${uploaded} new images for property ${propertyId} (${existing} already existed)`,
        };
  }
  if (existing + uploaded === 0) {
    return { level: 'error', message: `Failed to ingest all ${failed} images for property ${propertyId}` };
  }
  return {
    level: 'log',
    message:
      `Partial update for property ${propertyId}: ${existing} of ${total} already existed, ` +
      `${uploaded} uploaded, ${failed} failed`,
  };
}

/**
 * ImageIngestionService
 * Copies a property's source images into the object store. Images already
 * stored under their blob name are not downloaded again.
 */
export class ImageIngestionService {
  constructor(
    private readonly objectStore: ObjectStore,
    private readonly downloader: ImageDownloader,
    private readonly normalizer: ImageNormalizer,
    private readonly options: ImageIngestionOptions = {
      folder: CONFIG.storage.folder,
      concurrency: CONFIG.images.concurrency,
      maxRetries: CONFIG.images.maxRetries,
      retryDelayMs: CONFIG.images.retryDelayMs,
    }
  ) {}

  /**
   * Object-store locations for `imageUrls`, in input order, without the
   * images that could not be stored. A URL repeated in the input keeps its
   * place each time.
   */
  async ingest(propertyId: string, imageUrls: string[], signal?: AbortSignal): Promise<string[]> {
    const report = await this.ingestWithReport(propertyId, imageUrls, signal);
    return report.locations;
  }

  async ingestWithReport(
    propertyId: string,
    imageUrls: string[],
    signal?: AbortSignal
  ): Promise<IngestionReport> {
    // URLs that resolve to the same blob are fetched once per batch and
    // share one outcome
    const batch: { url: string; blobName: string }[] = [];
    const slotByBlobName = new Map<string, number>();
    const slots = imageUrls.map((url) => {
      const blobName = blobNameFor(url, this.options.folder);
      let slot = slotByBlobName.get(blobName);
      if (slot === undefined) {
        slot = batch.push({ url, blobName }) - 1;
        slotByBlobName.set(blobName, slot);
      }
      return slot;
    });

    const limit = pLimit(this.options.concurrency);
    const outcomes = await Promise.all(
      batch.map(({ url, blobName }) => limit(() => this.resolve(url, blobName, signal)))
    );
    signal?.throwIfAborted();

    const report: IngestionReport = { locations: [], existing: 0, uploaded: 0, failed: [] };
    slots.forEach((slot, index) => {
      const outcome = outcomes[slot];
      if (outcome.kind === 'failed') {
        report.failed.push({ url: imageUrls[index], reason: outcome.reason });
        return;
      }
      report.locations.push(outcome.location);
      if (outcome.kind === 'existing') {
        report.existing++;
      } else {
        report.uploaded++;
      }
    });

    const summary = summarizeIngestion(propertyId, report);
    if (summary) {
      console[summary.level](summary.message);
    }

    return report;
  }

  private async resolve(
    url: string,
    blobName: string,
    signal?: AbortSignal
  ): Promise<ImageOutcome> {
    if (await this.isStored(blobName)) {
      return { kind: 'existing', location: this.objectStore.locationOf(blobName) };
    }

    try {
      const downloaded = await this.downloadWithRetry(url, signal);
      const normalized = await this.normalizer.normalize(downloaded);
      signal?.throwIfAborted();
      const location = await this.objectStore.put(blobName, normalized);
      return { kind: 'uploaded', location };
    } catch (error) {
      return { kind: 'failed', reason: error instanceof Error ? error.message : String(error) };
    }
  }

  // A failed existence check means the image gets uploaded again
  private async isStored(blobName: string): Promise<boolean> {
    try {
      return await this.objectStore.exists(blobName);
    } catch (error) {
      console.warn(`⚠️  Existence check failed for ${blobName}:`, error);
      return false;
    }
  }

  private async downloadWithRetry(url: string, signal?: AbortSignal): Promise<Buffer> {
    for (let attempt = 0; ; attempt++) {
      signal?.throwIfAborted();
      try {
        return await this.downloader.download(url, signal);
      } catch (error) {
        if (!(error instanceof ImageTransientError) || attempt >= this.options.maxRetries) {
          throw error;
        }
        await sleep(this.options.retryDelayMs * (attempt + 1), undefined, { signal });
      }
    }
  }
}
