/**
 * Scraping Utilities - Barrel Export
 * Error taxonomy, retry guidance and block page detection shared by fetchers,
 * parsers and storage
 */

export * from './errors';
export * from './block-page';
