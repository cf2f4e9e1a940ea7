import type { DocumentStore } from './types.js';

/** In-process store for tests and dry runs. Holds a deep copy, like a file would. */
export class MemoryDocumentStore<T> implements DocumentStore<T> {
  private document: T;
  writes = 0;

  constructor(initial: T) {
    this.document = structuredClone(initial);
  }

  async read(): Promise<T> {
    return structuredClone(this.document);
  }

  async write(document: T): Promise<void> {
    this.document = structuredClone(document);
    this.writes++;
  }

  snapshot(): T {
    return structuredClone(this.document);
  }
}
