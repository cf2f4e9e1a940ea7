export const POSTING_CATEGORIES = ['sponsorship_abroad', 'home_country_remote', 'worldwide_remote'] as const;

export type PostingCategory = (typeof POSTING_CATEGORIES)[number];

/**
 * What an adapter emits before the aggregator validates it.
 * `id` is source-qualified (`remotive:123`) and stable across runs.
 */
export interface RawPosting {
  sourceId: string;
  id: string;
  url: string;
  title: string;
  company: string;
  category: PostingCategory;
  location?: string;
  description?: string;
  postedAt?: string;
  salary?: string;
  sponsorship?: boolean;
  tags?: string[];
}

export interface AdapterManifest {
  id: string;
  name: string;
  version: string;
  categories: readonly PostingCategory[];
}

export interface SourceQuery {
  keywords: readonly string[];
  /** Words matched against titles only; `DEFAULT_TITLE_WORDS` when absent. */
  titleWords?: readonly string[];
  maxJobs: number;
}

/**
 * Delay window applied between two consecutive external requests of one adapter.
 */
export interface PacingPolicy {
  minDelayMs: number;
  maxDelayMs: number;
}

export interface SourceLogger {
  info(message: string): void;
  warn(message: string): void;
}

export interface FetchContext {
  query: SourceQuery;
  logger: SourceLogger;
  pacing: PacingPolicy;
  fetchImpl?: typeof fetch;
}

export interface FetchResult {
  jobs: RawPosting[];
  errors: string[];
}

export interface SourceAdapter {
  manifest: AdapterManifest;
  /**
   * Never rejects: a failed query is logged, listed in `errors` and counts as zero results.
   */
  fetch(context: FetchContext): Promise<FetchResult>;
}
