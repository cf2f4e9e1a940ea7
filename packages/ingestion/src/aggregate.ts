import {
  DEFAULT_PACING,
  DEFAULT_ROLE_KEYWORDS,
  emptyBuckets,
  toJobPosting,
  type FetchContext,
  type FetchResult,
  type JobPosting,
  type SourceAdapter,
} from '@jobhound/parser-sdk';
import { normalize } from './normalize.js';
import type {
  AggregateOptions,
  AggregationResult,
  IngestionLogger,
  SourceAggregationResult,
  SourceStageStats,
} from './types.js';
import { validate } from './validate.js';

const defaultLogger: IngestionLogger = {
  info: (msg) => console.log(msg),
  warn: (msg) => console.warn(msg),
  error: (msg) => console.error(msg),
};

/** Run-level dedup key: url, or id when the source gave no url. */
export function postingKey(posting: Pick<JobPosting, 'id' | 'url'>): string {
  return posting.url || posting.id;
}

async function fetchSafely(adapter: SourceAdapter, context: FetchContext, logger: IngestionLogger): Promise<FetchResult> {
  try {
    return await adapter.fetch(context);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    logger.error(`[ingest:${adapter.manifest.id}] Error: ${message}`);
    return { jobs: [], errors: [message] };
  }
}

/**
 * Run every adapter in order and merge their output into category buckets.
 * Adapters are processed sequentially to avoid rate-limiting. A posting whose
 * url (or id) was already kept in this run is dropped, so earlier adapters win.
 */
export async function aggregate(adapters: readonly SourceAdapter[], options: AggregateOptions): Promise<AggregationResult> {
  const logger = options.logger ?? defaultLogger;
  const now = options.now ?? (() => new Date());
  const start = performance.now();
  const buckets = emptyBuckets<JobPosting>();
  const seen = new Set<string>();
  const sources: SourceAggregationResult[] = [];

  const context: FetchContext = {
    query: {
      keywords: options.keywords ?? DEFAULT_ROLE_KEYWORDS,
      titleWords: options.titleWords,
      maxJobs: options.maxJobsPerSource,
    },
    logger,
    pacing: options.pacing ?? DEFAULT_PACING,
    fetchImpl: options.fetchImpl,
  };

  for (const adapter of adapters) {
    const { id, name } = adapter.manifest;
    const sourceStart = performance.now();
    const stats: SourceStageStats = { fetched: 0, validated: 0, validationDropped: 0, duplicates: 0, kept: 0 };

    logger.info(`[ingest:${id}] Fetching jobs from ${name}...`);
    const result = await fetchSafely(adapter, context, logger);
    stats.fetched = result.jobs.length;

    const { valid, invalidCount, issues } = validate(result.jobs);
    const normalized = valid.map(normalize).filter((posting) => posting.title.length > 0);
    stats.validated = normalized.length;
    stats.validationDropped = invalidCount + (valid.length - normalized.length);
    if (stats.validationDropped > 0) {
      logger.warn(`[ingest:${id}] ${stats.validationDropped} jobs failed validation${issues[0] ? ` (${issues[0]})` : ''}`);
    }

    const scrapedAt = now();
    for (const raw of normalized) {
      const posting = toJobPosting(raw, scrapedAt);
      const key = postingKey(posting);
      if (seen.has(key)) {
        stats.duplicates++;
        continue;
      }

      seen.add(key);
      buckets[posting.category].push(posting);
      stats.kept++;
    }

    logger.info(
      `[ingest:${id}] Received ${stats.fetched} jobs, kept ${stats.kept} (${stats.duplicates} duplicates, ${stats.validationDropped} invalid)`,
    );

    sources.push({
      sourceId: id,
      sourceName: name,
      stats,
      errors: result.errors,
      durationMs: performance.now() - sourceStart,
    });
  }

  const totalFetched = sources.reduce((sum, s) => sum + s.stats.fetched, 0);
  const totalKept = sources.reduce((sum, s) => sum + s.stats.kept, 0);

  logger.info(`[ingest] Done. ${totalKept} unique jobs from ${adapters.length} sources.`);

  const failed = sources.filter((s) => s.errors.length > 0);
  if (failed.length > 0) {
    logger.warn(`[ingest] ${failed.length} source(s) reported errors: ${failed.map((s) => s.sourceId).join(', ')}`);
  }

  return {
    buckets,
    sources,
    totalFetched,
    totalKept,
    durationMs: performance.now() - start,
  };
}
