/**
 * File-backed progress store
 * Persists `{ "<cursorId>": "<status>" }` through atomic JSON writes
 */

import { PersistenceError, ScrapingErrorType } from '../scraping/errors';
import { JsonFileStorage } from '../storage';
import { MemoryProgressStore } from './memory.progress-store';
import { ProgressStatus, ProgressStore, isProgressStatus } from './progress.types';

export class FileProgressStore extends MemoryProgressStore implements ProgressStore {
  private loadIssue: PersistenceError | null = null;

  constructor(
    private readonly filePath: string,
    private readonly storage: JsonFileStorage = new JsonFileStorage()
  ) {
    super();
  }

  /**
   * A corrupt or unreadable file degrades to an empty store (full rescan)
   */
  async load(): Promise<Map<string, ProgressStatus>> {
    const result = await this.storage.read(this.filePath);
    this.statuses = new Map();
    this.loadIssue = null;

    if (result.status === 'missing') {
      return new Map(this.statuses);
    }

    if (result.status === 'invalid') {
      return this.discard(`unreadable (${result.reason})`);
    }

    const value = result.value;
    if (typeof value !== 'object' || value === null || Array.isArray(value)) {
      return this.discard('expected an object of statuses');
    }

    let dropped = 0;
    for (const [cursorId, status] of Object.entries(value)) {
      if (isProgressStatus(status)) {
        this.statuses.set(cursorId, status);
      } else {
        dropped++;
      }
    }
    if (dropped > 0) {
      console.warn(`[FileProgressStore] Dropped ${dropped} entries with an unknown status`);
    }

    return new Map(this.statuses);
  }

  /**
   * Why the last load fell back to an empty store, if it did
   */
  getLoadIssue(): PersistenceError | null {
    return this.loadIssue;
  }

  async flush(): Promise<void> {
    await this.storage.write(this.filePath, Object.fromEntries(this.statuses));
    await super.flush();
  }

  private discard(reason: string): Map<string, ProgressStatus> {
    this.loadIssue = new PersistenceError(
      ScrapingErrorType.CORRUPT_PROGRESS,
      this.filePath,
      `Progress file ${this.filePath} is ${reason}`
    );
    console.warn(`[FileProgressStore] ${this.loadIssue.message}; starting with an empty store`);
    return new Map(this.statuses);
  }
}
