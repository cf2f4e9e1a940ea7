import type { JobPosting, PacingPolicy, PostingCategory } from '@jobhound/parser-sdk';

/**
 * Minimal logger interface. Defaults to console.
 */
export interface IngestionLogger {
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

/**
 * Per-stage counts for one adapter.
 */
export interface SourceStageStats {
  fetched: number;
  validated: number;
  validationDropped: number;
  duplicates: number;
  kept: number;
}

export interface SourceAggregationResult {
  sourceId: string;
  sourceName: string;
  stats: SourceStageStats;
  errors: string[];
  durationMs: number;
}

export interface AggregationResult {
  buckets: Record<PostingCategory, JobPosting[]>;
  sources: SourceAggregationResult[];
  totalFetched: number;
  totalKept: number;
  durationMs: number;
}

export interface AggregateOptions {
  maxJobsPerSource: number;
  keywords?: readonly string[];
  titleWords?: readonly string[];
  pacing?: PacingPolicy;
  fetchImpl?: typeof fetch;
  logger?: IngestionLogger;
  now?: () => Date;
}
