/**
 * Crawl Driver
 * Shared run loop: skip finished items, fetch with retries, merge, flush in
 * batches, stop early when the source keeps refusing us
 */

import { env } from '../../config/env';
import { mergeDataset } from '../dataset/dataset.merger';
import { DatasetRepository } from '../dataset/dataset.repository';
import { Dataset, emptyDataset } from '../dataset/dataset.types';
import type { FetchResult, PageFetcher } from '../fetcher/fetcher.types';
import { ProgressStatus, ProgressStore } from '../progress/progress.types';
import {
  calculateRetryDelay,
  describeFetchError,
  isRetryableFetchError,
} from '../scraping/errors';
import { retryWithBackoff, sleep } from '../utils/retry';
import { CrawlingStatisticsTracker } from './crawling-statistics';
import { CrawlDriverConfig, CrawlRunOptions, CrawlState, CrawlSummary, ItemOutcome } from './crawling.types';

export interface CrawlDriverDependencies {
  fetcher: PageFetcher;
  progress: ProgressStore;
  repository: DatasetRepository;
}

export function defaultCrawlDriverConfig(): CrawlDriverConfig {
  return {
    batchSize: env.BATCH_SIZE,
    maxRetries: env.MAX_RETRIES,
    retryBaseDelay: env.RETRY_BACKOFF_BASE,
    blockThreshold: env.BLOCK_THRESHOLD,
    sleep,
  };
}

export abstract class BaseCrawlDriver<TItem> {
  protected abstract readonly name: string;
  protected readonly fetcher: PageFetcher;
  protected readonly progress: ProgressStore;
  protected readonly repository: DatasetRepository;
  protected readonly config: CrawlDriverConfig;
  protected dataset: Dataset = emptyDataset();
  private listener: CrawlRunOptions['onTransition'];

  constructor(dependencies: CrawlDriverDependencies, config: Partial<CrawlDriverConfig> = {}) {
    this.fetcher = dependencies.fetcher;
    this.progress = dependencies.progress;
    this.repository = dependencies.repository;
    this.config = { ...defaultCrawlDriverConfig(), ...config };
  }

  getDataset(): Dataset {
    return this.dataset;
  }

  protected abstract cursorOf(item: TItem): string;

  /**
   * Fetch and extract one item. Fetch and parse failures are returned as
   * outcomes; only unexpected errors throw.
   */
  protected abstract processItem(item: TItem): Promise<ItemOutcome>;

  /** Write the files this driver owns */
  protected abstract persistDataset(): Promise<void>;

  /**
   * Load the stored dataset and progress before a run
   */
  protected async prepare(): Promise<void> {
    this.dataset = await this.repository.load();
    await this.progress.load();
  }

  protected transition(cursorId: string, state: CrawlState): void {
    this.listener?.(cursorId, state);
  }

  protected async runItems(items: Iterable<TItem>, options: CrawlRunOptions, total: number | null): Promise<CrawlSummary> {
    const stats = new CrawlingStatisticsTracker();
    const force = options.force ?? false;
    const requested = options.limit ?? total;
    const unflushed: string[] = [];
    let processedSinceFlush = 0;
    let consecutiveBlocks = 0;
    let stopReason: string | undefined;

    this.listener = options.onTransition;

    try {
      for (const item of items) {
        if (options.limit !== undefined && stats.getCompleted() >= options.limit) {
          break;
        }

        const cursorId = this.cursorOf(item);
        if (!force && this.progress.get(cursorId) === ProgressStatus.DONE) {
          stats.recordSkipped();
          continue;
        }

        this.transition(cursorId, CrawlState.NOT_STARTED);
        this.progress.mark(cursorId, ProgressStatus.PENDING, { force });

        let outcome: ItemOutcome;
        try {
          outcome = await this.processItem(item);
        } catch (error) {
          console.error(`[${this.name}] ${cursorId} threw, saving finished items before stopping`);
          await this.flush(unflushed);
          throw error;
        }
        stats.recordCompleted();

        switch (outcome.status) {
          case 'parsed':
            stats.recordFetched();
            stats.recordParsed();
            this.transition(cursorId, CrawlState.MERGING);
            this.dataset = mergeDataset(this.dataset, outcome.items);
            this.progress.mark(cursorId, ProgressStatus.DONE, { force });
            unflushed.push(cursorId);
            consecutiveBlocks = 0;
            break;
          case 'empty':
            stats.recordFetched();
            stats.recordEmpty();
            console.log(`[${this.name}] ${cursorId}: ${outcome.reason}`);
            this.progress.mark(cursorId, ProgressStatus.DONE, { force });
            unflushed.push(cursorId);
            consecutiveBlocks = 0;
            break;
          case 'failed':
            if (outcome.fetched) {
              stats.recordFetched();
            }
            stats.recordFailed();
            console.warn(`[${this.name}] ${cursorId} failed: ${outcome.reason}`);
            this.progress.mark(cursorId, ProgressStatus.FAILED, { force });
            this.transition(cursorId, CrawlState.FAILED);
            consecutiveBlocks = outcome.blocked ? consecutiveBlocks + 1 : 0;
            break;
        }

        processedSinceFlush++;
        if (processedSinceFlush >= this.config.batchSize) {
          await this.flush(unflushed);
          processedSinceFlush = 0;
          console.log(`[${this.name}] Checkpoint after ${stats.getCompleted()} items`);
        }

        if (consecutiveBlocks >= this.config.blockThreshold) {
          stopReason = `${consecutiveBlocks} consecutive blocked responses`;
          console.error(`[${this.name}] Stopping early: ${stopReason}`);
          break;
        }
      }

      await this.flush(unflushed);
    } finally {
      this.listener = undefined;
    }

    const summary = stats.getSummary({ requested, stoppedEarly: stopReason !== undefined, stopReason });
    return summary;
  }

  /**
   * Fetch with retries for timeouts, network errors and 5xx. Block pages
   * served with 200 are left to the parsers, which know the page layout.
   */
  protected async fetchWithRetry(url: string): Promise<FetchResult> {
    for (let attempt = 0; ; attempt++) {
      const result = await this.fetcher.fetch(url);

      if (result.ok || !isRetryableFetchError(result.error) || attempt >= this.config.maxRetries) {
        return result;
      }

      const delay = calculateRetryDelay(attempt, this.config.retryBaseDelay);
      console.warn(
        `[${this.name}] ${describeFetchError(result.error)}, retrying in ${delay}ms (${attempt + 1}/${this.config.maxRetries})`
      );
      await this.config.sleep(delay);
    }
  }

  /**
   * Dataset first, then progress, so a crash in between re-fetches items
   * instead of losing them. One immediate retry; a second failure is fatal.
   */
  private async flush(unflushed: string[]): Promise<void> {
    await retryWithBackoff(
      async () => {
        await this.persistDataset();
        await this.progress.flush();
      },
      {
        maxAttempts: 2,
        baseDelay: 0,
        onRetry: (error: unknown) => {
          const message = error instanceof Error ? error.message : String(error);
          console.error(`[${this.name}] Flush failed, retrying: ${message}`);
        },
      }
    );

    for (const cursorId of unflushed) {
      this.transition(cursorId, CrawlState.PERSISTED);
    }
    unflushed.length = 0;
  }
}
