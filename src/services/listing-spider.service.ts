import { load } from 'cheerio';
import type { CheerioAPI } from 'cheerio';
import type { FetchFailedError } from '../errors';
import type { FetchedPage, WorkUnit } from '../types';
import { nextAggregationAt } from '../utils/schedule';
import { OverviewExtractorService } from './overview-extractor.service';
import { AxiosPageFetcher, classifyFetchError, failureForStatus } from './page-fetcher.service';
import type { PageFetcher } from './page-fetcher.service';
import { FixedMarkerLocator, NameSuffixLocator } from './listing-strategies/section-locators';
import {
  ELEMENT_KEYS,
  UNKNOWN_PROPERTY_NAME,
  translateCommonOverview,
  translatePropertyOverview,
} from './listing-strategies/suumo.translations';

export type SpiderState = 'init' | 'fetching' | 'parsed' | 'failed';

const IMAGE_LINK_SELECTOR = '#js-lightbox > li > div > a';
const LIBRARY_PATH_MARKER = '/library/';

export interface ListingSpiderOptions {
  fetcher?: PageFetcher;
  extractor?: OverviewExtractorService;
  now?: () => Date;
}

/**
 * ListingSpider
 * Fetches exactly one listing page and turns it into a work unit.
 * A spider instance runs once: INIT -> FETCHING -> PARSED | FAILED.
 */
export class ListingSpider {
  private state: SpiderState = 'init';
  private failure: FetchFailedError | null = null;
  private readonly fetcher: PageFetcher;
  private readonly extractor: OverviewExtractorService;
  private readonly now: () => Date;

  constructor(
    readonly url: string,
    readonly lineUserId: string,
    options: ListingSpiderOptions = {}
  ) {
    if (!url) {
      throw new Error('Listing spider requires a URL');
    }
    if (!lineUserId) {
      throw new Error('Listing spider requires a subscriber id');
    }

    this.fetcher = options.fetcher ?? new AxiosPageFetcher();
    this.extractor = options.extractor ?? new OverviewExtractorService();
    this.now = options.now ?? (() => new Date());
  }

  get currentState(): SpiderState {
    return this.state;
  }

  get lastFailure(): FetchFailedError | null {
    return this.failure;
  }

  /**
   * Resolves to the work unit, or null when the fetch failed. The failure
   * is logged and kept on `lastFailure`. An aborted `signal` rejects with
   * its reason instead.
   */
  async crawl(signal?: AbortSignal): Promise<WorkUnit | null> {
    if (this.state !== 'init') {
      throw new Error(`Spider for ${this.url} has already run (state: ${this.state})`);
    }

    this.state = 'fetching';

    let page: FetchedPage;
    try {
      page = await this.fetcher.fetch(this.url, signal);
    } catch (error) {
      if (signal?.aborted) {
        this.state = 'failed';
        signal.throwIfAborted();
      }
      return this.fail(classifyFetchError(error, this.url));
    }

    if (page.status < 200 || page.status >= 300) {
      return this.fail(failureForStatus(page.status, this.url));
    }

    console.log(`Successful response from ${page.url}`);
    const unit = this.parse(page);
    this.state = 'parsed';
    return unit;
  }

  private fail(error: FetchFailedError): null {
    console.error(`❌ ${error.message}`);
    this.failure = error;
    this.state = 'failed';
    return null;
  }

  private parse(page: FetchedPage): WorkUnit {
    const $ = load(page.html);
    const currentTime = this.now();

    const extractedName = this.extractor.extractFieldValue($, ELEMENT_KEYS.PROPERTY_NAME);
    if (extractedName === null) {
      console.warn(`⚠️  Property name not found on ${page.url}`);
    }
    const name = extractedName ?? UNKNOWN_PROPERTY_NAME;
    const redirectedToLibrary = page.url.includes(LIBRARY_PATH_MARKER);

    const propertyOverview = translatePropertyOverview(
      this.extractor.extract($, new NameSuffixLocator(name))
    );
    const commonOverview = translateCommonOverview(
      this.extractor.extract($, new FixedMarkerLocator())
    );

    return {
      property: {
        name,
        url: this.url,
        is_active: extractedName !== null && !redirectedToLibrary,
        image_urls: this.extractImageUrls($),
        created_at: currentTime,
        updated_at: currentTime,
      },
      user_property: {
        line_user_id: this.lineUserId,
        last_aggregated_at: currentTime,
        next_aggregated_at: nextAggregationAt(currentTime),
        first_succeeded_at: currentTime,
        last_succeeded_at: currentTime,
        created_at: currentTime,
        updated_at: currentTime,
      },
      property_overview: {
        ...propertyOverview,
        created_at: currentTime,
        updated_at: currentTime,
      },
      common_overview: {
        ...commonOverview,
        created_at: currentTime,
        updated_at: currentTime,
      },
    };
  }

  private extractImageUrls($: CheerioAPI): string[] {
    return $(IMAGE_LINK_SELECTOR)
      .toArray()
      .map((link) => $(link).attr('data-src'))
      .filter((src): src is string => typeof src === 'string' && src.length > 0);
  }
}
