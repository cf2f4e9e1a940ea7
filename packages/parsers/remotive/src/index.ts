import {
  defineAdapter,
  fetchJson,
  runSourceQueries,
  type FetchContext,
  type FetchResult,
  type RawPosting,
  type SourceQueryTask,
} from '@jobhound/parser-sdk';

const API_URL = 'https://remotive.com/api/remote-jobs';
const SEARCHES = ['qa', 'test', 'sdet', 'quality assurance'];
const PAGE_LIMIT = 20;

interface RemotiveJob {
  id: number;
  url: string;
  title: string;
  company_name: string;
  tags: string[];
  publication_date: string;
  candidate_required_location: string;
  salary: string;
  description: string;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

function asString(value: unknown): string {
  return typeof value === 'string' ? value : '';
}

function toRemotiveJob(value: unknown): RemotiveJob | null {
  if (!isRecord(value) || typeof value.id !== 'number' || typeof value.title !== 'string') {
    return null;
  }

  return {
    id: value.id,
    url: asString(value.url),
    title: value.title,
    company_name: asString(value.company_name),
    tags: Array.isArray(value.tags) ? value.tags.filter((tag): tag is string => typeof tag === 'string') : [],
    publication_date: asString(value.publication_date),
    candidate_required_location: asString(value.candidate_required_location),
    salary: asString(value.salary),
    description: asString(value.description),
  };
}

function toRawPosting(job: RemotiveJob): RawPosting {
  return {
    sourceId: 'remotive',
    id: `remotive:${job.id}`,
    url: job.url,
    title: job.title,
    company: job.company_name,
    category: 'worldwide_remote',
    location: job.candidate_required_location || 'Worldwide',
    description: job.description,
    postedAt: job.publication_date || undefined,
    salary: job.salary || undefined,
    tags: job.tags.length > 0 ? job.tags : undefined,
  };
}

export function parseRemotiveResponse(payload: unknown): RawPosting[] {
  if (!isRecord(payload)) {
    throw new Error('Remotive API returned invalid payload');
  }

  const jobs = Array.isArray(payload.jobs) ? payload.jobs : [];
  return jobs
    .map(toRemotiveJob)
    .filter((job): job is RemotiveJob => job !== null && job.title.length > 0 && job.company_name.length > 0)
    .map(toRawPosting);
}

function searchTask(search: string): SourceQueryTask {
  return {
    label: `search "${search}"`,
    run: async (fetchImpl) => {
      const url = `${API_URL}?category=qa&search=${encodeURIComponent(search)}&limit=${PAGE_LIMIT}`;
      const payload = await fetchJson(url, { label: 'Remotive API', fetchImpl });
      return parseRemotiveResponse(payload);
    },
  };
}

export async function fetchRemotive(context: FetchContext): Promise<FetchResult> {
  return runSourceQueries('remotive', SEARCHES.map(searchTask), context);
}

export const remotiveAdapter = defineAdapter({
  manifest: {
    id: 'remotive',
    name: 'Remotive',
    version: '0.1.0',
    categories: ['worldwide_remote'],
  },
  fetch: fetchRemotive,
});
