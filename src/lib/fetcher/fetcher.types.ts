/**
 * Fetcher Types
 */

import type { FetchError } from '../scraping/errors';

export type FetchResult =
  | { ok: true; body: string; statusCode: number; finalUrl: string }
  | { ok: false; error: FetchError };

/**
 * Anything that can fetch a page for a crawl driver
 */
export interface PageFetcher {
  fetch(url: string, timeoutMs?: number): Promise<FetchResult>;
}

/**
 * The subset of the WHATWG Response the fetcher reads
 */
export interface ResponseLike {
  ok: boolean;
  status: number;
  url: string;
  text(): Promise<string>;
}

export interface RequestInitLike {
  method: string;
  headers: Record<string, string>;
  redirect: 'follow';
  signal: AbortSignal;
}

export type FetchImplementation = (url: string, init: RequestInitLike) => Promise<ResponseLike>;

export interface Clock {
  now(): number;
  sleep(ms: number): Promise<void>;
}

export interface HttpFetcherOptions {
  /** Minimum delay between two requests in ms */
  delayMs?: number;
  /** Default per-request timeout in ms */
  timeoutMs?: number;
  userAgent?: string;
  headers?: Record<string, string>;
  fetchImpl?: FetchImplementation;
  clock?: Clock;
}
