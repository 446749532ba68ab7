/**
 * Crawling System
 * Main export file for the resumable crawl drivers
 */

export * from './crawling.types';
export * from './crawling-statistics';
export * from './crawl-driver';
