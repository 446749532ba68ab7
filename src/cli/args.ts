/**
 * Command-line argument parsing shared by the scrapers
 */

import { ConfigurationError } from '../lib/scraping/errors';

export interface ListingRange {
  startId: number;
  endId: number;
}

export function parseInteger(value: string, label: string): number {
  const trimmed = value.trim();
  if (!/^-?\d+$/.test(trimmed)) {
    throw new ConfigurationError(`${label} must be an integer, got "${value}"`);
  }
  return parseInt(trimmed, 10);
}

export function parsePositiveInteger(value: string, label: string): number {
  const parsed = parseInteger(value, label);
  if (parsed < 1) {
    throw new ConfigurationError(`${label} must be at least 1, got ${parsed}`);
  }
  return parsed;
}

/**
 * Positional `[start_id] [end_id]`; an omitted bound takes its default
 */
export function parseListingRange(
  start: string | undefined,
  end: string | undefined,
  defaults: ListingRange
): ListingRange {
  const startId = start === undefined ? defaults.startId : parseInteger(start, 'start_id');
  const endId = end === undefined ? defaults.endId : parseInteger(end, 'end_id');

  if (endId < startId) {
    throw new ConfigurationError(`end_id (${endId}) must not be less than start_id (${startId})`);
  }
  return { startId, endId };
}

export function parseLimit(value: string | undefined): number | undefined {
  return value === undefined ? undefined : parsePositiveInteger(value, 'limit');
}
