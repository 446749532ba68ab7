/**
 * Dataset
 * Main export file for records, merging and persistence
 */

export * from './dataset.types';
export * from './dataset.merger';
export * from './dataset.repository';
export * from './winners-table';
