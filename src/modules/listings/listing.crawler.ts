/**
 * Listing Crawler
 * Walks the abstracts site by numeric project id
 */

import { env } from '../../config/env';
import { BaseCrawlDriver, CrawlDriverDependencies } from '../../lib/crawling/crawl-driver';
import { CrawlDriverConfig, CrawlRunOptions, CrawlState, CrawlSummary, ItemOutcome } from '../../lib/crawling/crawling.types';
import type { ListingPageParser } from '../../lib/extraction/extraction.types';
import { ConfigurationError, ScrapingErrorType, describeFetchError, isBlockingFetchError } from '../../lib/scraping/errors';
import { AbstractsPageParser } from './abstracts.parser';

export interface ListingRunOptions extends CrawlRunOptions {
  startId: number;
  endId: number;
}

export interface ListingCrawlerOptions {
  parser?: ListingPageParser;
  urlTemplate?: string;
  config?: Partial<CrawlDriverConfig>;
}

export function listingUrl(id: number, template: string = env.LISTING_URL_TEMPLATE): string {
  return template.replace('{id}', String(id));
}

function* idRange(startId: number, endId: number): Generator<number> {
  for (let id = startId; id <= endId; id++) {
    yield id;
  }
}

export class ListingCrawler extends BaseCrawlDriver<number> {
  protected readonly name = 'ListingCrawler';
  private readonly parser: ListingPageParser;
  private readonly urlTemplate: string;

  constructor(dependencies: CrawlDriverDependencies, options: ListingCrawlerOptions = {}) {
    super(dependencies, options.config);
    this.parser = options.parser ?? new AbstractsPageParser();
    this.urlTemplate = options.urlTemplate ?? env.LISTING_URL_TEMPLATE;
  }

  async run(options: ListingRunOptions): Promise<CrawlSummary> {
    const { startId, endId } = options;
    if (!Number.isInteger(startId) || !Number.isInteger(endId) || endId < startId) {
      throw new ConfigurationError(`Invalid id range ${startId}..${endId}`);
    }

    await this.prepare();
    console.log(`[ListingCrawler] Scraping ids ${startId}..${endId} with ${this.parser.name} parser`);

    const summary = await this.runItems(idRange(startId, endId), options, endId - startId + 1);
    console.log(`[ListingCrawler] Done: ${this.dataset.listings.size} listings stored`);
    return summary;
  }

  protected cursorOf(id: number): string {
    return String(id);
  }

  protected async processItem(id: number): Promise<ItemOutcome> {
    const cursorId = this.cursorOf(id);
    const url = listingUrl(id, this.urlTemplate);

    this.transition(cursorId, CrawlState.FETCHING);
    const result = await this.fetchWithRetry(url);
    if (!result.ok) {
      return {
        status: 'failed',
        reason: describeFetchError(result.error),
        fetched: false,
        blocked: isBlockingFetchError(result.error),
      };
    }

    this.transition(cursorId, CrawlState.EXTRACTING);
    const parsed = this.parser.parse(result.body, id, url);
    if (!parsed.ok) {
      if (parsed.error.type === ScrapingErrorType.NO_LISTING) {
        return { status: 'empty', reason: parsed.error.message };
      }
      return {
        status: 'failed',
        reason: parsed.error.message,
        fetched: true,
        blocked: parsed.error.type === ScrapingErrorType.BLOCKED,
      };
    }

    return { status: 'parsed', items: [{ kind: 'listing', record: parsed.record }] };
  }

  protected async persistDataset(): Promise<void> {
    await this.repository.saveListings(this.dataset);
  }
}
