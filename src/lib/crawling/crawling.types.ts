/**
 * Crawling Types
 * Type definitions for the resumable crawl drivers
 */

import type { IncomingItem } from '../dataset/dataset.types';
import type { Sleep } from '../utils/retry';

/**
 * Per-item lifecycle. FETCHING and EXTRACTING may end in FAILED.
 */
export enum CrawlState {
  NOT_STARTED = 'not_started',
  FETCHING = 'fetching',
  EXTRACTING = 'extracting',
  MERGING = 'merging',
  PERSISTED = 'persisted',
  FAILED = 'failed',
}

export type TransitionListener = (cursorId: string, state: CrawlState) => void;

export interface CrawlRunOptions {
  /** Stop after this many items were attempted (skipped items do not count) */
  limit?: number;
  /** Revisit items already marked done */
  force?: boolean;
  onTransition?: TransitionListener;
}

export interface CrawlDriverConfig {
  /** Flush dataset and progress after this many processed items */
  batchSize: number;
  /** Retries after the first attempt for timeouts, network errors and 5xx */
  maxRetries: number;
  retryBaseDelay: number;
  /** Consecutive block responses that end the run */
  blockThreshold: number;
  sleep: Sleep;
}

/**
 * What processing one item produced
 */
export type ItemOutcome =
  | { status: 'parsed'; items: IncomingItem[] }
  | { status: 'empty'; reason: string }
  | { status: 'failed'; reason: string; fetched: boolean; blocked: boolean };

export interface CrawlSummary {
  /** Items whose page(s) were fetched */
  fetched: number;
  /** Items that produced records */
  parsed: number;
  failed: number;
  /** Items skipped because progress already marked them done */
  skipped: number;
  /** Items fetched that carried nothing to store */
  empty: number;
  /** Items attempted in this run */
  completed: number;
  /** The item bound, or the number of items in range when unbounded */
  requested: number | null;
  stoppedEarly: boolean;
  stopReason?: string;
  durationMs: number;
}
