/**
 * Progress Types
 * Key-status store the crawl drivers resume from
 */

export enum ProgressStatus {
  PENDING = 'pending',
  DONE = 'done',
  FAILED = 'failed',
}

export interface MarkOptions {
  /** Allow a `done` entry to move back to another status */
  force?: boolean;
}

export interface ProgressStore {
  /** Load persisted entries, replacing whatever is held in memory */
  load(): Promise<Map<string, ProgressStatus>>;
  get(cursorId: string): ProgressStatus | undefined;
  /** Record a status; `done` is sticky unless forced */
  mark(cursorId: string, status: ProgressStatus, options?: MarkOptions): void;
  /** Persist everything marked so far */
  flush(): Promise<void>;
  entries(): Map<string, ProgressStatus>;
}

export function isProgressStatus(value: unknown): value is ProgressStatus {
  return value === ProgressStatus.PENDING || value === ProgressStatus.DONE || value === ProgressStatus.FAILED;
}
