/**
 * Extraction
 * Main export file for parser interfaces and text heuristics
 */

export * from './extraction.types';
export * from './email.utils';
export * from './name.utils';
export * from './university.utils';
