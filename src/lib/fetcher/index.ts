/**
 * Fetcher
 * Main export file for paced HTTP fetching
 */

export * from './fetcher.types';
export * from './rate-gate';
export * from './http.fetcher';
