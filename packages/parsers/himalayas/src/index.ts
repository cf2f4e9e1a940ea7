import {
  defineAdapter,
  fetchJson,
  runSourceQueries,
  type FetchContext,
  type FetchResult,
  type RawPosting,
  type SourceQueryTask,
} from '@jobhound/parser-sdk';

const SEARCH_URL = 'https://himalayas.app/jobs/api/search';
const SEARCHES = ['QA automation engineer', 'SDET', 'test automation engineer', 'software test engineer'];
const PAGE_LIMIT = 20;

interface HimalayasJob {
  guid: string;
  title: string;
  companyName: string;
  minSalary: number | null;
  maxSalary: number | null;
  currency: string;
  locationRestrictions: string[];
  categories: string[];
  description: string;
  pubDate: number;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

function asStringList(value: unknown): string[] {
  return Array.isArray(value) ? value.filter((item): item is string => typeof item === 'string') : [];
}

function asNumberOrNull(value: unknown): number | null {
  return typeof value === 'number' && Number.isFinite(value) ? value : null;
}

function toHimalayasJob(value: unknown): HimalayasJob | null {
  if (!isRecord(value)) {
    return null;
  }

  if (typeof value.guid !== 'string' || typeof value.title !== 'string' || typeof value.companyName !== 'string') {
    return null;
  }

  return {
    guid: value.guid,
    title: value.title,
    companyName: value.companyName,
    minSalary: asNumberOrNull(value.minSalary),
    maxSalary: asNumberOrNull(value.maxSalary),
    currency: typeof value.currency === 'string' ? value.currency : '',
    locationRestrictions: asStringList(value.locationRestrictions),
    categories: asStringList(value.categories),
    description: typeof value.description === 'string' ? value.description : '',
    pubDate: asNumberOrNull(value.pubDate) ?? 0,
  };
}

function extractSlug(guid: string): string {
  try {
    const url = new URL(guid);
    return url.pathname.replace(/^\//, '').replace(/\/$/, '') || guid;
  } catch {
    return guid;
  }
}

function parseDateFromEpoch(epochSeconds: number): string | undefined {
  if (!Number.isFinite(epochSeconds) || epochSeconds <= 0) {
    return undefined;
  }

  const parsed = new Date(epochSeconds * 1000);
  return Number.isNaN(parsed.getTime()) ? undefined : parsed.toISOString().slice(0, 10);
}

function formatSalary(job: HimalayasJob): string | undefined {
  if (job.minSalary === null && job.maxSalary === null) {
    return undefined;
  }

  const range = [job.minSalary, job.maxSalary].filter((value): value is number => value !== null).join(' - ');
  return job.currency ? `${range} ${job.currency}` : range;
}

function toRawPosting(job: HimalayasJob): RawPosting {
  return {
    sourceId: 'himalayas',
    id: `himalayas:${extractSlug(job.guid)}`,
    url: job.guid,
    title: job.title,
    company: job.companyName,
    category: 'worldwide_remote',
    location: job.locationRestrictions[0] ?? 'Worldwide',
    description: job.description,
    postedAt: parseDateFromEpoch(job.pubDate),
    salary: formatSalary(job),
    tags: job.categories.length > 0 ? job.categories : undefined,
  };
}

export function parseHimalayasResponse(payload: unknown): RawPosting[] {
  if (!isRecord(payload)) {
    throw new Error('Himalayas API returned invalid payload');
  }

  const jobs = Array.isArray(payload.jobs) ? payload.jobs : [];
  return jobs
    .map(toHimalayasJob)
    .filter((job): job is HimalayasJob => job !== null && job.title.length > 0 && job.companyName.length > 0)
    .map(toRawPosting);
}

function searchTask(search: string): SourceQueryTask {
  return {
    label: `search "${search}"`,
    run: async (fetchImpl) => {
      const url = `${SEARCH_URL}?q=${encodeURIComponent(search)}&limit=${PAGE_LIMIT}`;
      const payload = await fetchJson(url, { label: 'Himalayas API', fetchImpl });
      return parseHimalayasResponse(payload);
    },
  };
}

export async function fetchHimalayas(context: FetchContext): Promise<FetchResult> {
  return runSourceQueries('himalayas', SEARCHES.map(searchTask), context);
}

export const himalayasAdapter = defineAdapter({
  manifest: {
    id: 'himalayas',
    name: 'Himalayas',
    version: '0.1.0',
    categories: ['worldwide_remote'],
  },
  fetch: fetchHimalayas,
});
