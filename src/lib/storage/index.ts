export * from './json-file.storage';
