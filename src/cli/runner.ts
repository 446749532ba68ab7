/**
 * Shared wiring and exit handling for the command-line entry points
 */

import { Command } from 'commander';
import * as path from 'path';
import { env } from '../config/env';
import { CrawlDriverDependencies, CrawlSummary, formatSummary } from '../lib/crawling';
import { DatasetRepository } from '../lib/dataset';
import { HttpFetcher } from '../lib/fetcher';
import { FileProgressStore } from '../lib/progress';
import { ConfigurationError, PersistenceError } from '../lib/scraping';
import { JsonFileStorage } from '../lib/storage';

export const EXIT_OK = 0;
export const EXIT_CONFIGURATION_ERROR = 1;
export const EXIT_PERSISTENCE_ERROR = 2;
export const EXIT_UNEXPECTED_ERROR = 3;

export const PROGRESS_FILES = {
  listings: 'progress.json',
  contacts: 'email_progress.json',
} as const;

export function createDependencies(
  progressFile: (typeof PROGRESS_FILES)[keyof typeof PROGRESS_FILES],
  dataDir: string = env.DATA_DIR
): CrawlDriverDependencies {
  const storage = new JsonFileStorage();
  return {
    fetcher: new HttpFetcher(),
    progress: new FileProgressStore(path.join(dataDir, progressFile), storage),
    repository: new DatasetRepository(dataDir, storage),
  };
}

export function exitCodeFor(error: unknown): number {
  if (error instanceof ConfigurationError) return EXIT_CONFIGURATION_ERROR;
  if (error instanceof PersistenceError) return EXIT_PERSISTENCE_ERROR;
  throw error;
}

export function reportSummary(command: string, summary: CrawlSummary): void {
  console.log(`[${command}] ${formatSummary(summary)}`);
}

/**
 * Run a command body and set the process exit code from its outcome.
 * Unexpected errors propagate.
 */
export async function runCommand(command: string, body: () => Promise<void>): Promise<void> {
  try {
    await body();
    process.exitCode = EXIT_OK;
  } catch (error: unknown) {
    const code = exitCodeFor(error);
    const message = error instanceof Error ? error.message : String(error);
    console.error(`[${command}] ${message}`);
    process.exitCode = code;
  }
}

export function parseProgram(program: Command): void {
  program.parseAsync(process.argv).catch((error: unknown) => {
    console.error(`[${program.name()}] Fatal error:`, error);
    process.exit(EXIT_UNEXPECTED_ERROR);
  });
}
