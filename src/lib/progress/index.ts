/**
 * Progress
 * Main export file for resume checkpoints
 */

export * from './progress.types';
export * from './memory.progress-store';
export * from './file.progress-store';
