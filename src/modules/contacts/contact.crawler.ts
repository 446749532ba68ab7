/**
 * Contact Crawler
 * Runs a handful of searches per award-winning listing and stores what
 * they turn up as contact candidates
 */

import { env } from '../../config/env';
import { BaseCrawlDriver, CrawlDriverDependencies } from '../../lib/crawling/crawl-driver';
import { CrawlDriverConfig, CrawlRunOptions, CrawlState, CrawlSummary, ItemOutcome } from '../../lib/crawling/crawling.types';
import type { IncomingItem, ListingRecord } from '../../lib/dataset/dataset.types';
import type { ListingPageParser, SearchResultParser } from '../../lib/extraction/extraction.types';
import { displayName, parsePersonName } from '../../lib/extraction/name.utils';
import { ScrapingErrorType, describeFetchError, isBlockingFetchError } from '../../lib/scraping/errors';
import { AbstractsPageParser } from '../listings/abstracts.parser';
import { listingUrl } from '../listings/listing.crawler';
import { buildEmailQueries, buildProfileQuery, searchUrl } from './contact.queries';
import { guessCandidates } from './email-guesser';
import { SearchEngineResultParser } from './search-result.parser';

export interface ContactRunOptions extends CrawlRunOptions {
  /** Only listings from this year on; unset means every year */
  minYear?: number;
}

export interface ContactCrawlerOptions {
  searchParser?: SearchResultParser;
  listingParser?: ListingPageParser;
  searchUrlTemplate?: string;
  listingUrlTemplate?: string;
  queryLimit?: number;
  guessingEnabled?: boolean;
  competitionName?: string;
  config?: Partial<CrawlDriverConfig>;
}

/**
 * Listings with at least one award, in id order, optionally from `minYear` on
 */
export function selectWinners(listings: Iterable<ListingRecord>, minYear?: number): ListingRecord[] {
  return [...listings]
    .filter((listing) => listing.awards.length > 0)
    .filter((listing) => {
      if (minYear === undefined) return true;
      const year = listing.year ? parseInt(listing.year, 10) : NaN;
      return !isNaN(year) && year >= minYear;
    })
    .sort((a, b) => a.id - b.id);
}

export class ContactCrawler extends BaseCrawlDriver<ListingRecord> {
  protected readonly name = 'ContactCrawler';
  private readonly searchParser: SearchResultParser;
  private readonly listingParser: ListingPageParser;
  private readonly searchUrlTemplate: string;
  private readonly listingUrlTemplate: string;
  private readonly queryLimit: number;
  private readonly guessingEnabled: boolean;
  private readonly competitionName: string;
  private listingsChanged = false;

  constructor(dependencies: CrawlDriverDependencies, options: ContactCrawlerOptions = {}) {
    super(dependencies, options.config);
    this.searchParser = options.searchParser ?? new SearchEngineResultParser();
    this.listingParser = options.listingParser ?? new AbstractsPageParser();
    this.searchUrlTemplate = options.searchUrlTemplate ?? env.SEARCH_URL_TEMPLATE;
    this.listingUrlTemplate = options.listingUrlTemplate ?? env.LISTING_URL_TEMPLATE;
    this.queryLimit = options.queryLimit ?? env.EMAIL_QUERY_LIMIT;
    this.guessingEnabled = options.guessingEnabled ?? env.EMAIL_GUESSING_ENABLED;
    this.competitionName = options.competitionName ?? env.COMPETITION_NAME;
  }

  async run(options: ContactRunOptions = {}): Promise<CrawlSummary> {
    await this.prepare();
    this.listingsChanged = false;

    const minYear = options.minYear ?? env.EMAIL_MIN_YEAR;
    const winners = selectWinners(this.dataset.listings.values(), minYear);
    console.log(
      `[ContactCrawler] ${winners.length} winners to search` + (minYear !== undefined ? ` (from ${minYear})` : '')
    );

    return this.runItems(winners, options, winners.length);
  }

  protected cursorOf(listing: ListingRecord): string {
    return String(listing.id);
  }

  protected async processItem(listing: ListingRecord): Promise<ItemOutcome> {
    const cursorId = this.cursorOf(listing);
    const items: IncomingItem[] = [];
    let fetched = false;
    let studentName = listing.studentName ?? null;

    if (!studentName) {
      this.transition(cursorId, CrawlState.FETCHING);
      const url = listingUrl(listing.id, this.listingUrlTemplate);
      const page = await this.fetchWithRetry(url);
      if (!page.ok) {
        return {
          status: 'failed',
          reason: describeFetchError(page.error),
          fetched: false,
          blocked: isBlockingFetchError(page.error),
        };
      }
      fetched = true;

      this.transition(cursorId, CrawlState.EXTRACTING);
      const parsed = this.listingParser.parse(page.body, listing.id, url);
      if (!parsed.ok && parsed.error.type === ScrapingErrorType.BLOCKED) {
        return { status: 'failed', reason: parsed.error.message, fetched, blocked: true };
      }
      studentName = parsed.ok ? parsed.record.studentName ?? null : null;
      if (!parsed.ok || !studentName) {
        return { status: 'empty', reason: 'no student name on the listing page' };
      }
      items.push({ kind: 'listing', record: parsed.record });
    }

    const person = parsePersonName(studentName);
    const name = displayName(studentName);
    const subject = { name, title: listing.title, year: listing.year, competition: this.competitionName };
    const queries = [...buildEmailQueries(subject, this.queryLimit), buildProfileQuery(name)];
    const failures: string[] = [];

    for (const query of queries) {
      this.transition(cursorId, CrawlState.FETCHING);
      const result = await this.fetchWithRetry(searchUrl(query, this.searchUrlTemplate));
      if (!result.ok) {
        if (isBlockingFetchError(result.error)) {
          return { status: 'failed', reason: describeFetchError(result.error), fetched, blocked: true };
        }
        failures.push(describeFetchError(result.error));
        continue;
      }
      fetched = true;

      this.transition(cursorId, CrawlState.EXTRACTING);
      const parsed = this.searchParser.parse(result.body, { ownerId: listing.id, name, query });
      if (!parsed.ok) {
        return { status: 'failed', reason: parsed.error.message, fetched, blocked: true };
      }
      for (const candidate of parsed.candidates) {
        items.push({ kind: 'contact', candidate });
      }
    }

    if (failures.length === queries.length) {
      return { status: 'failed', reason: failures.join('; '), fetched, blocked: false };
    }

    if (this.guessingEnabled) {
      for (const candidate of guessCandidates(listing.id, name, person, listing.awards)) {
        items.push({ kind: 'contact', candidate });
      }
    }

    if (items.some((item) => item.kind === 'listing')) {
      this.listingsChanged = true;
    }
    return { status: 'parsed', items };
  }

  protected async persistDataset(): Promise<void> {
    if (this.listingsChanged) {
      await this.repository.saveListings(this.dataset);
    }
    await this.repository.saveContacts(this.dataset);
  }
}
