import { join } from 'node:path';
import type { ApplicationResult } from '@jobhound/apply';
import type { SourceAggregationResult } from '@jobhound/ingestion';
import type { ScoredPosting, SkillGapReport } from '@jobhound/matcher';
import { POSTING_CATEGORIES, type PostingCategory } from '@jobhound/parser-sdk';
import { JsonFileDocumentStore, type DocumentStore } from '@jobhound/store';
import { z } from 'zod';

const EXCELLENT_SCORE = 80;
const GOOD_SCORE = 60;

export interface SnapshotApplication {
  jobId: string;
  title: string;
  company: string;
  url: string;
  status: string;
  steps: number;
  error?: string;
}

export interface SnapshotSource {
  id: string;
  fetched: number;
  kept: number;
  errors: string[];
}

export interface RunSnapshot {
  generatedAt: string;
  totalScraped: number;
  totalNew: number;
  totalMatched: number;
  /** Every matched posting across categories, best first. */
  jobs: ScoredPosting[];
  skillGap: SkillGapReport;
  applications: SnapshotApplication[];
  sources: SnapshotSource[];
  stats: {
    excellent: number;
    good: number;
    byCategory: Record<PostingCategory, number>;
  };
}

export interface RunSnapshotInput {
  generatedAt: Date;
  totalScraped: number;
  totalNew: number;
  matched: Record<PostingCategory, ScoredPosting[]>;
  skillGap: SkillGapReport;
  applications: readonly ApplicationResult[];
  sources: readonly SourceAggregationResult[];
}

export function buildRunSnapshot(input: RunSnapshotInput): RunSnapshot {
  const jobs = POSTING_CATEGORIES.flatMap((category) => input.matched[category]).sort(
    (a, b) => b.matchScore - a.matchScore,
  );

  return {
    generatedAt: input.generatedAt.toISOString(),
    totalScraped: input.totalScraped,
    totalNew: input.totalNew,
    totalMatched: jobs.length,
    jobs,
    skillGap: input.skillGap,
    applications: input.applications.map(({ posting, attempt }) => ({
      jobId: attempt.jobId,
      title: posting.title,
      company: posting.company,
      url: posting.url,
      status: attempt.status,
      steps: attempt.steps,
      ...(attempt.error === undefined ? {} : { error: attempt.error }),
    })),
    sources: input.sources.map((source) => ({
      id: source.sourceId,
      fetched: source.stats.fetched,
      kept: source.stats.kept,
      errors: source.errors,
    })),
    stats: {
      excellent: jobs.filter((job) => job.matchScore >= EXCELLENT_SCORE).length,
      good: jobs.filter((job) => job.matchScore >= GOOD_SCORE && job.matchScore < EXCELLENT_SCORE).length,
      byCategory: {
        sponsorship_abroad: input.matched.sponsorship_abroad.length,
        home_country_remote: input.matched.home_country_remote.length,
        worldwide_remote: input.matched.worldwide_remote.length,
      },
    },
  };
}

// Snapshots are only ever written by this process; reading one back is a shape check.
const runSnapshotSchema = z.custom<RunSnapshot>(
  (value) => typeof value === 'object' && value !== null && 'generatedAt' in value && 'jobs' in value,
);

function emptySnapshot(): RunSnapshot {
  return buildRunSnapshot({
    generatedAt: new Date(0),
    totalScraped: 0,
    totalNew: 0,
    matched: { sponsorship_abroad: [], home_country_remote: [], worldwide_remote: [] },
    skillGap: {
      critical_skills_to_learn: [],
      trending_in_qa: [],
      certifications_recommended: [],
      quick_wins: [],
      career_advice: '',
    },
    applications: [],
    sources: [],
  });
}

/** `runs/latest.json` plus one file per day, overwritten by later runs that day. */
export function createSnapshotStores(dataDir: string, date: Date): DocumentStore<RunSnapshot>[] {
  const day = date.toISOString().slice(0, 10);
  return [join(dataDir, 'runs', 'latest.json'), join(dataDir, 'runs', `${day}.json`)].map(
    (path) => new JsonFileDocumentStore({ path, schema: runSnapshotSchema, empty: emptySnapshot }),
  );
}
