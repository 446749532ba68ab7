/**
 * Crawling Statistics Tracker
 * Counts what a run did for the end-of-run summary
 */

import { CrawlSummary } from './crawling.types';

export class CrawlingStatisticsTracker {
  private readonly startTime: number;
  private fetched: number = 0;
  private parsed: number = 0;
  private failed: number = 0;
  private skipped: number = 0;
  private empty: number = 0;
  private completed: number = 0;

  constructor(private readonly now: () => number = Date.now) {
    this.startTime = now();
  }

  recordFetched(): void {
    this.fetched++;
  }

  recordParsed(): void {
    this.parsed++;
  }

  recordFailed(): void {
    this.failed++;
  }

  recordSkipped(): void {
    this.skipped++;
  }

  recordEmpty(): void {
    this.empty++;
  }

  recordCompleted(): void {
    this.completed++;
  }

  getCompleted(): number {
    return this.completed;
  }

  getSummary(outcome: { requested: number | null; stoppedEarly: boolean; stopReason?: string }): CrawlSummary {
    const summary: CrawlSummary = {
      fetched: this.fetched,
      parsed: this.parsed,
      failed: this.failed,
      skipped: this.skipped,
      empty: this.empty,
      completed: this.completed,
      requested: outcome.requested,
      stoppedEarly: outcome.stoppedEarly,
      durationMs: this.now() - this.startTime,
    };
    if (outcome.stopReason !== undefined) {
      summary.stopReason = outcome.stopReason;
    }
    return summary;
  }
}

export function formatSummary(summary: CrawlSummary): string {
  const bound = summary.requested === null ? '' : `/${summary.requested}`;
  const lines = [
    `completed=${summary.completed}${bound}`,
    `fetched=${summary.fetched}`,
    `parsed=${summary.parsed}`,
    `failed=${summary.failed}`,
    `skipped=${summary.skipped}`,
    `empty=${summary.empty}`,
    `duration=${summary.durationMs}ms`,
  ];
  const text = lines.join(', ');
  return summary.stoppedEarly ? `${text} (stopped early: ${summary.stopReason ?? 'unknown'})` : text;
}
