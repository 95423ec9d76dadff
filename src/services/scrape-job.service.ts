import { z } from 'zod';
import { CONFIG } from '../config';
import { FetchFailedError, InvalidJobDataError } from '../errors';
import type { PersistedWorkUnit, ScrapeJobData, ScrapeJobResult } from '../types';
import { withJobTimeout } from '../utils/timeout';
import type { ImageIngestionService } from './image-ingestion.service';
import { ListingSpider } from './listing-spider.service';
import type { PageFetcher } from './page-fetcher.service';
import type { UpsertPipeline } from './upsert-pipeline.service';

export const scrapeJobSchema = z.object({
  url: z
    .string()
    .url()
    .refine((url) => /^https?:\/\//i.test(url), { message: 'URL must use http or https' }),
  lineUserId: z.string().startsWith('U', { message: 'LINE user id must start with "U"' }),
  checkOnly: z.boolean().optional(),
  timestamp: z.union([z.string(), z.number()]).optional(),
});

export function parseJobData(data: unknown): ScrapeJobData {
  const result = scrapeJobSchema.safeParse(data);
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join('.') || 'payload'}: ${issue.message}`)
      .join('; ');
    throw new InvalidJobDataError(`Invalid scrape job data: ${details}`);
  }
  return result.data;
}

export interface ScrapeJobDependencies {
  pipeline: Pick<UpsertPipeline, 'process' | 'upsertProperty'>;
  images: Pick<ImageIngestionService, 'ingest'>;
  fetcher?: PageFetcher;
  now?: () => Date;
  timeoutMs?: number;
}

/**
 * ScrapeJobService
 * Runs one queued scrape: spider, then persistence, then images
 */
export class ScrapeJobService {
  private readonly now: () => Date;
  private readonly timeoutMs: number;

  constructor(private readonly deps: ScrapeJobDependencies) {
    this.now = deps.now ?? (() => new Date());
    this.timeoutMs = deps.timeoutMs ?? CONFIG.queue.jobTimeoutMs;
  }

  async run(data: unknown): Promise<ScrapeJobResult> {
    const job = parseJobData(data);
    return withJobTimeout((signal) => this.execute(job, signal), this.timeoutMs, job.url);
  }

  private async execute(job: ScrapeJobData, signal: AbortSignal): Promise<ScrapeJobResult> {
    const spider = new ListingSpider(job.url, job.lineUserId, {
      fetcher: this.deps.fetcher,
      now: this.now,
    });

    const unit = await spider.crawl(signal);
    signal.throwIfAborted();
    if (!unit) {
      throw (
        spider.lastFailure ??
        new FetchFailedError('network', job.url, `Request failed for ${job.url}: no response`)
      );
    }

    if (job.checkOnly) {
      console.log(`Check-only job for ${job.url}: ${unit.property.name}`);
      return {
        status: 'checked',
        url: job.url,
        propertyName: unit.property.name,
        imageCount: unit.property.image_urls?.length ?? 0,
      };
    }

    const persisted = await this.deps.pipeline.process(unit, signal);
    const imageCount = await this.storeImages(persisted, signal);

    return {
      status: 'stored',
      url: job.url,
      propertyId: persisted.propertyId.toHexString(),
      propertyName: persisted.property.name,
      imageCount,
    };
  }

  /**
   * Replaces the property's image list with object-store locations. The
   * stored list is left alone when nothing could be ingested.
   */
  private async storeImages(unit: PersistedWorkUnit, signal: AbortSignal): Promise<number> {
    const sourceUrls = unit.property.image_urls ?? [];
    if (sourceUrls.length === 0) {
      return 0;
    }

    signal.throwIfAborted();
    const locations = await this.deps.images.ingest(
      unit.propertyId.toHexString(),
      sourceUrls,
      signal
    );
    signal.throwIfAborted();
    if (locations.length > 0) {
      await this.deps.pipeline.upsertProperty({ ...unit.property, image_urls: locations });
    }

    return locations.length;
  }
}
