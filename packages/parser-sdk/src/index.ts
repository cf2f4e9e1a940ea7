export { defineAdapter } from './factory.js';
export { POSTING_CATEGORIES } from './types.js';
export type {
  RawPosting,
  PostingCategory,
  AdapterManifest,
  SourceQuery,
  PacingPolicy,
  SourceLogger,
  FetchContext,
  FetchResult,
  SourceAdapter,
} from './types.js';
export {
  postingCategorySchema,
  rawPostingSchema,
  jobPostingSchema,
  validateRawPostings,
  toJobPosting,
} from './schema.js';
export type { ValidatedRawPosting, JobPosting, ValidateRawPostingsOptions } from './schema.js';
export { CATEGORY_LABELS, categoryLabel, emptyBuckets } from './categories.js';
export { DEFAULT_ROLE_KEYWORDS, DEFAULT_TITLE_WORDS, matchesRoleFamily } from './keywords.js';
export { BROWSER_HEADERS, SourceHttpError, fetchWithRetry, fetchJson, fetchText, sleep } from './http.js';
export type { FetchWithRetryOptions } from './http.js';
export { DEFAULT_PACING, pacingDelayMs, politePause } from './pacing.js';
export { runSourceQueries } from './queries.js';
export type { SourceQueryTask } from './queries.js';
