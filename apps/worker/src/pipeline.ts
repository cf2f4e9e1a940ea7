import {
  ApplicationLedger,
  AutoApplyRunner,
  EasyApplyDriver,
  type ApplicationLedgerDocument,
  type ApplicationResult,
} from '@jobhound/apply';
import type { BrowserSession } from '@jobhound/browser';
import {
  aggregate,
  DedupLedger,
  enrichDescriptions,
  type DedupLedgerDocument,
  type SourceAggregationResult,
} from '@jobhound/ingestion';
import {
  MatchScorer,
  synthesizeSkillGaps,
  type CandidateProfile,
  type CompletionClient,
  type ScoredPosting,
} from '@jobhound/matcher';
import {
  emptyBuckets,
  POSTING_CATEGORIES,
  type JobPosting,
  type PostingCategory,
  type SourceAdapter,
} from '@jobhound/parser-sdk';
import type { DocumentStore } from '@jobhound/store';
import type { Logger } from 'pino';
import type { PipelineConfig } from './config.js';
import { createComponentLogger } from './observability/component-logger.js';
import { serializeError } from './observability/with-logger.js';
import { buildRunSnapshot, type RunSnapshot } from './snapshot.js';

export interface OpenBrowserOptions {
  headless: boolean;
}

export interface PipelineDependencies {
  config: PipelineConfig;
  profile: CandidateProfile;
  adapters: readonly SourceAdapter[];
  completion: CompletionClient;
  dedupStore: DocumentStore<DedupLedgerDocument>;
  applicationStore: DocumentStore<ApplicationLedgerDocument>;
  snapshotStores: readonly DocumentStore<RunSnapshot>[];
  openBrowser: (options: OpenBrowserOptions) => Promise<BrowserSession>;
  logger: Logger;
  fetchImpl?: typeof fetch;
  now?: () => Date;
  sleep?: (ms: number) => Promise<void>;
}

export interface PipelineRunResult {
  snapshot: RunSnapshot;
  sources: SourceAggregationResult[];
  enriched: number;
  durationMs: number;
}

async function enrichShortDescriptions(postings: JobPosting[], deps: PipelineDependencies): Promise<{ postings: JobPosting[]; enriched: number }> {
  const { config, logger } = deps;
  let session: BrowserSession;
  try {
    session = await deps.openBrowser({ headless: true });
  } catch (error) {
    logger.warn({ event: 'enrichment_skipped', error: serializeError(error) }, 'Browser unavailable, descriptions left as fetched');
    return { postings, enriched: 0 };
  }

  try {
    const result = await enrichDescriptions(postings, {
      browser: session,
      logger: createComponentLogger(logger, 'enrich'),
      maxPostings: config.enrichment.maxPostings,
      minLength: config.enrichment.minLength,
    });
    return { postings: result.postings, enriched: result.enriched };
  } finally {
    await session.close();
  }
}

async function scoreByCategory(postings: readonly JobPosting[], deps: PipelineDependencies): Promise<Record<PostingCategory, ScoredPosting[]>> {
  const { config } = deps;
  const scorer = new MatchScorer({
    client: deps.completion,
    profile: deps.profile,
    logger: createComponentLogger(deps.logger, 'match'),
    chunkSize: config.ai.chunkSize,
    pauseMs: config.ai.pauseMs,
    sleep: deps.sleep,
  });

  const matched = emptyBuckets<ScoredPosting>();
  for (const category of POSTING_CATEGORIES) {
    const bucket = postings.filter((posting) => posting.category === category);
    if (bucket.length > 0) {
      matched[category] = await scorer.batchScore(bucket, config.minMatchScore);
    }
  }

  return matched;
}

async function autoApply(
  matched: readonly ScoredPosting[],
  applicationLedger: ApplicationLedger,
  deps: PipelineDependencies,
): Promise<ApplicationResult[]> {
  const { config, profile, logger } = deps;
  const runner = new AutoApplyRunner({
    enabled: config.autoApply.enabled,
    maxApplicationsPerRun: config.autoApply.maxApplicationsPerRun,
    eligibility: { platform: 'linkedin', minMatchScore: config.autoApply.minMatchScore },
    pauseMs: config.autoApply.pauseMs,
    ledger: applicationLedger,
    driver: new EasyApplyDriver({
      applicant: {
        phone: profile.personal.phone,
        location: profile.personal.location,
        experienceYears: profile.experienceYears,
      },
      resumePath: config.autoApply.resumePath,
      onTransition: (state) => logger.debug({ event: 'apply_transition', ...state }, 'Apply state changed'),
    }),
    openBrowser: () => deps.openBrowser({ headless: config.autoApply.headless }),
    credentials: config.credentials.linkedin,
    logger: createComponentLogger(logger, 'apply'),
    sleep: deps.sleep,
  });

  return runner.run(matched);
}

/**
 * One full run: fetch, dedup, (enrich), score, apply, skill gaps, snapshot.
 * Source and scoring failures degrade the run; ledger corruption aborts it.
 */
export async function runPipeline(deps: PipelineDependencies): Promise<PipelineRunResult> {
  const { config, logger } = deps;
  const now = deps.now ?? (() => new Date());
  const startedAt = Date.now();

  logger.info(
    { event: 'pipeline_started', sources: deps.adapters.map((adapter) => adapter.manifest.id), minMatchScore: config.minMatchScore },
    'Pipeline started',
  );

  // Every ledger is read before the dedup ledger is written, so a corrupted one
  // aborts the run without marking anything as seen.
  const applicationLedger = new ApplicationLedger(deps.applicationStore, deps.now);
  if (config.autoApply.enabled) {
    await applicationLedger.load();
  }

  const aggregation = await aggregate(deps.adapters, {
    maxJobsPerSource: config.maxJobsPerSource,
    keywords: config.keywords,
    titleWords: config.titleWords,
    fetchImpl: deps.fetchImpl,
    logger: createComponentLogger(logger, 'ingest'),
    now,
  });
  for (const source of aggregation.sources) {
    logger.info({ event: 'source_fetched', sourceId: source.sourceId, ...source.stats, errorsCount: source.errors.length }, 'Source fetched');
  }

  const fetched = POSTING_CATEGORIES.flatMap((category) => aggregation.buckets[category]);
  const ledger = new DedupLedger(deps.dedupStore, now);
  let fresh = await ledger.filterNew(fetched, config.dedupWindowDays);
  logger.info({ event: 'dedup_completed', fetched: fetched.length, fresh: fresh.length }, 'Deduplicated against ledger');

  let enriched = 0;
  if (config.enrichment.enabled && fresh.length > 0) {
    ({ postings: fresh, enriched } = await enrichShortDescriptions(fresh, deps));
  }

  const matched = await scoreByCategory(fresh, deps);
  const allMatched = POSTING_CATEGORIES.flatMap((category) => matched[category]);

  const applications = await autoApply(allMatched, applicationLedger, deps);
  const appliedIds = new Set(applications.filter((r) => r.attempt.status === 'applied').map((r) => r.attempt.jobId));
  if (appliedIds.size > 0) {
    for (const category of POSTING_CATEGORIES) {
      matched[category] = matched[category].map((posting) => (appliedIds.has(posting.id) ? { ...posting, autoApplied: true } : posting));
    }
  }

  const skillGap = await synthesizeSkillGaps(allMatched, {
    client: deps.completion,
    profile: deps.profile,
    logger: createComponentLogger(logger, 'skill-gap'),
  });

  const snapshot = buildRunSnapshot({
    generatedAt: now(),
    totalScraped: aggregation.totalFetched,
    totalNew: fresh.length,
    matched,
    skillGap,
    applications,
    sources: aggregation.sources,
  });
  for (const store of deps.snapshotStores) {
    await store.write(snapshot);
  }

  const durationMs = Date.now() - startedAt;
  logger.info(
    {
      event: 'pipeline_completed',
      totalScraped: snapshot.totalScraped,
      totalNew: snapshot.totalNew,
      totalMatched: snapshot.totalMatched,
      enriched,
      applied: appliedIds.size,
      durationMs,
    },
    'Pipeline completed',
  );

  return { snapshot, sources: aggregation.sources, enriched, durationMs };
}
