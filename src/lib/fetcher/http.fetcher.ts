/**
 * HTTP Fetcher
 * Paced GET requests that report failures as values instead of throwing
 */

import { env } from '../../config/env';
import { ScrapingErrorType, classifyThrownFetchError } from '../scraping/errors';
import { RateGate, systemClock } from './rate-gate';
import type { FetchImplementation, FetchResult, HttpFetcherOptions, PageFetcher } from './fetcher.types';

const defaultFetch: FetchImplementation = (url, init) => fetch(url, init);

export class HttpFetcher implements PageFetcher {
  readonly gate: RateGate;
  private readonly timeoutMs: number;
  private readonly headers: Record<string, string>;
  private readonly fetchImpl: FetchImplementation;

  constructor(options: HttpFetcherOptions = {}) {
    this.gate = new RateGate(options.delayMs ?? env.REQUEST_DELAY_MS, options.clock ?? systemClock);
    this.timeoutMs = options.timeoutMs ?? env.HTTP_TIMEOUT;
    this.fetchImpl = options.fetchImpl ?? defaultFetch;
    this.headers = {
      'User-Agent': options.userAgent ?? env.USER_AGENT,
      Accept: 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8',
      'Accept-Language': 'en-US,en;q=0.5',
      ...options.headers,
    };
  }

  async fetch(url: string, timeoutMs: number = this.timeoutMs): Promise<FetchResult> {
    await this.gate.wait();

    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), timeoutMs);

    try {
      const response = await this.fetchImpl(url, {
        method: 'GET',
        headers: this.headers,
        redirect: 'follow',
        signal: controller.signal,
      });

      if (!response.ok) {
        console.log(`[HttpFetcher] ${url} returned ${response.status}`);
        return {
          ok: false,
          error: {
            type: ScrapingErrorType.HTTP_STATUS,
            url,
            statusCode: response.status,
            message: `HTTP ${response.status}`,
          },
        };
      }

      const body = await response.text();
      return { ok: true, body, statusCode: response.status, finalUrl: response.url || url };
    } catch (error: unknown) {
      const fetchError = classifyThrownFetchError(error, url);
      if (fetchError.type === ScrapingErrorType.TIMEOUT) {
        console.warn(`[HttpFetcher] Timeout after ${timeoutMs}ms for ${url}`);
      } else {
        console.warn(`[HttpFetcher] Request failed for ${url}: ${fetchError.message}`);
      }
      return { ok: false, error: fetchError };
    } finally {
      clearTimeout(timeoutId);
    }
  }
}
