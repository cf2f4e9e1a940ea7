// Aggregation
export { aggregate, postingKey } from './aggregate.js';

// Individual stages
export { validate } from './validate.js';
export { normalize, normalizeWhitespace, decodeHtmlEntities, stripHtml, normalizeTags, normalizeLocation } from './normalize.js';
export { DedupLedger, dedupLedgerDocumentSchema, dedupLedgerEntrySchema, emptyDedupLedger } from './ledger.js';
export type { DedupLedgerDocument, DedupLedgerStats } from './ledger.js';
export { enrichDescriptions, selectorsFor } from './enrich.js';
export type { EnrichOptions, EnrichResult } from './enrich.js';

// Types
export type {
  AggregateOptions,
  AggregationResult,
  IngestionLogger,
  SourceAggregationResult,
  SourceStageStats,
} from './types.js';
