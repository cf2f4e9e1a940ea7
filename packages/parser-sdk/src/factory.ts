import type { SourceAdapter } from './types.js';

/** Identity helper that checks an adapter literal against the contract while keeping its exact type. */
export function defineAdapter<T extends SourceAdapter>(adapter: T): T {
  return adapter;
}
