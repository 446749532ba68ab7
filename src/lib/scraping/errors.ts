/**
 * Scraping Error Handling
 * Error taxonomy for fetching, parsing and persisting, plus retry guidance
 */

export enum ScrapingErrorType {
  TIMEOUT = 'timeout',
  HTTP_STATUS = 'http_status',
  NETWORK_ERROR = 'network_error',
  BLOCKED = 'blocked',
  MISSING_REQUIRED_FIELD = 'missing_required_field',
  NO_LISTING = 'no_listing',
  WRITE_FAILED = 'write_failed',
  CORRUPT_PROGRESS = 'corrupt_progress',
  CORRUPT_DATASET = 'corrupt_dataset',
}

export type FetchError =
  | { type: ScrapingErrorType.TIMEOUT; url: string; message: string }
  | { type: ScrapingErrorType.HTTP_STATUS; url: string; message: string; statusCode: number }
  | { type: ScrapingErrorType.NETWORK_ERROR; url: string; message: string };

export type ParseError =
  | { type: ScrapingErrorType.MISSING_REQUIRED_FIELD; field: string; message: string }
  | { type: ScrapingErrorType.NO_LISTING; message: string }
  | { type: ScrapingErrorType.BLOCKED; message: string };

export type PersistenceErrorType =
  | ScrapingErrorType.WRITE_FAILED
  | ScrapingErrorType.CORRUPT_PROGRESS
  | ScrapingErrorType.CORRUPT_DATASET;

export class PersistenceError extends Error {
  readonly type: PersistenceErrorType;
  readonly filePath: string;

  constructor(type: PersistenceErrorType, filePath: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'PersistenceError';
    this.type = type;
    this.filePath = filePath;
  }
}

/**
 * Raised for bad command-line input; maps to exit status 1
 */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

export function missingField(field: string): ParseError {
  return {
    type: ScrapingErrorType.MISSING_REQUIRED_FIELD,
    field,
    message: `Missing required field: ${field}`,
  };
}

export function blockedPage(reason: string): ParseError {
  return { type: ScrapingErrorType.BLOCKED, message: reason };
}

/**
 * Classify something thrown by fetch() into a timeout or a network error
 */
export function classifyThrownFetchError(error: unknown, url: string): FetchError {
  const err = error instanceof Error ? error : new Error(String(error));
  const message = err.message || String(error);

  if (
    err.name === 'AbortError' ||
    err.name === 'TimeoutError' ||
    message.includes('timeout') ||
    message.includes('ETIMEDOUT') ||
    message.includes('ESOCKETTIMEDOUT')
  ) {
    return { type: ScrapingErrorType.TIMEOUT, url, message: 'Request timed out' };
  }

  return { type: ScrapingErrorType.NETWORK_ERROR, url, message: `Network connection failed: ${message}` };
}

export function isRetryableFetchError(error: FetchError): boolean {
  switch (error.type) {
    case ScrapingErrorType.TIMEOUT:
    case ScrapingErrorType.NETWORK_ERROR:
      return true;
    case ScrapingErrorType.HTTP_STATUS:
      return error.statusCode >= 500;
  }
}

/**
 * Auth, forbidden and rate-limit responses mean the source is refusing us
 */
export function isBlockingFetchError(error: FetchError): boolean {
  if (error.type === ScrapingErrorType.HTTP_STATUS) {
    return error.statusCode === 401 || error.statusCode === 403 || error.statusCode === 429;
  }
  return false;
}

/**
 * Exponential backoff for the given (zero-based) attempt, capped at one minute
 */
export function calculateRetryDelay(attemptCount: number, baseDelay: number = 1000): number {
  const exponentialDelay = baseDelay * Math.pow(2, attemptCount);
  return Math.min(exponentialDelay, 60000);
}

/**
 * Check text for common blocking patterns. Returns a description or null.
 * Only page chrome should be passed here: project abstracts and result
 * snippets can mention any of these words.
 */
export function detectBlocking(text: string): string | null {
  const lowerHtml = text.toLowerCase();

  // Cloudflare
  if (lowerHtml.includes('cloudflare') && (lowerHtml.includes('challenge') || lowerHtml.includes('ray id'))) {
    return 'Cloudflare protection detected';
  }

  // CAPTCHA
  if (lowerHtml.includes('recaptcha') || lowerHtml.includes('hcaptcha') || lowerHtml.includes('captcha')) {
    return 'CAPTCHA required';
  }

  // Access denied pages
  if (lowerHtml.includes('access denied') || lowerHtml.includes('permission denied')) {
    return 'Access denied';
  }

  // Bot detection
  if (
    lowerHtml.includes('bot detected') ||
    lowerHtml.includes('automated access') ||
    lowerHtml.includes('unusual traffic')
  ) {
    return 'Bot detected';
  }

  return null;
}

export function describeFetchError(error: FetchError): string {
  return error.type === ScrapingErrorType.HTTP_STATUS
    ? `HTTP ${error.statusCode} for ${error.url}`
    : `${error.message} (${error.url})`;
}
