/**
 * Crawling Statistics Tests
 */

import { CrawlingStatisticsTracker, formatSummary } from '../crawling-statistics';

describe('CrawlingStatisticsTracker', () => {
  it('should count outcomes and measure duration', () => {
    let now = 1000;
    const tracker = new CrawlingStatisticsTracker(() => now);

    tracker.recordCompleted();
    tracker.recordFetched();
    tracker.recordParsed();
    tracker.recordCompleted();
    tracker.recordFailed();
    tracker.recordSkipped();
    now = 1250;

    expect(tracker.getSummary({ requested: 5, stoppedEarly: false })).toEqual({
      fetched: 1,
      parsed: 1,
      failed: 1,
      skipped: 1,
      empty: 0,
      completed: 2,
      requested: 5,
      stoppedEarly: false,
      durationMs: 250,
    });
  });

  it('should include the stop reason only when there is one', () => {
    const tracker = new CrawlingStatisticsTracker(() => 0);

    const summary = tracker.getSummary({ requested: null, stoppedEarly: true, stopReason: 'blocked' });

    expect(summary.stopReason).toBe('blocked');
    expect('stopReason' in tracker.getSummary({ requested: null, stoppedEarly: false })).toBe(false);
  });
});

describe('formatSummary', () => {
  it('should render a one-line summary', () => {
    expect(
      formatSummary({
        fetched: 3,
        parsed: 2,
        failed: 1,
        skipped: 0,
        empty: 0,
        completed: 3,
        requested: 3,
        stoppedEarly: false,
        durationMs: 12,
      })
    ).toBe('completed=3/3, fetched=3, parsed=2, failed=1, skipped=0, empty=0, duration=12ms');
  });

  it('should mention an early stop', () => {
    expect(
      formatSummary({
        fetched: 0,
        parsed: 0,
        failed: 3,
        skipped: 0,
        empty: 0,
        completed: 3,
        requested: null,
        stoppedEarly: true,
        stopReason: '3 consecutive blocked responses',
        durationMs: 5,
      })
    ).toBe(
      'completed=3, fetched=0, parsed=0, failed=3, skipped=0, empty=0, duration=5ms (stopped early: 3 consecutive blocked responses)'
    );
  });
});
