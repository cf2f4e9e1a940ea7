export type { DocumentStore } from './types.js';
export { JsonFileDocumentStore } from './json-file.js';
export type { JsonFileDocumentStoreOptions } from './json-file.js';
export { MemoryDocumentStore } from './memory.js';
export { StoreCorruptedError } from './errors.js';
