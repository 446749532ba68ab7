/**
 * In-memory progress store
 */

import { MarkOptions, ProgressStatus, ProgressStore } from './progress.types';

export class MemoryProgressStore implements ProgressStore {
  protected statuses: Map<string, ProgressStatus>;
  private flushCount = 0;

  constructor(initial: Record<string, ProgressStatus> = {}) {
    this.statuses = new Map(Object.entries(initial));
  }

  async load(): Promise<Map<string, ProgressStatus>> {
    return new Map(this.statuses);
  }

  get(cursorId: string): ProgressStatus | undefined {
    return this.statuses.get(cursorId);
  }

  mark(cursorId: string, status: ProgressStatus, options: MarkOptions = {}): void {
    const current = this.statuses.get(cursorId);
    if (current === ProgressStatus.DONE && status !== ProgressStatus.DONE && !options.force) {
      return;
    }
    this.statuses.set(cursorId, status);
  }

  async flush(): Promise<void> {
    this.flushCount++;
  }

  entries(): Map<string, ProgressStatus> {
    return new Map(this.statuses);
  }

  getFlushCount(): number {
    return this.flushCount;
  }
}
