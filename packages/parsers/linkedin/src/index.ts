import { parse, type HTMLElement } from 'node-html-parser';
import {
  defineAdapter,
  fetchText,
  politePause,
  POSTING_CATEGORIES,
  runSourceQueries,
  type FetchContext,
  type FetchResult,
  type PostingCategory,
  type RawPosting,
  type SourceQueryTask,
} from '@jobhound/parser-sdk';

const GUEST_SEARCH_URL = 'https://www.linkedin.com/jobs-guest/jobs/api/seeMoreJobPostings/search';
const PAST_DAY = 'r86400';
const SEARCHES_PER_CATEGORY = 3;
const CARDS_PER_SEARCH = 20;

export interface LinkedInSearch {
  keywords: string;
  location: string;
  remote: boolean;
}

export const LINKEDIN_SEARCHES: Readonly<Record<PostingCategory, readonly LinkedInSearch[]>> = {
  sponsorship_abroad: [
    { keywords: 'QA Automation Engineer visa sponsorship', location: 'United States', remote: false },
    { keywords: 'SDET visa sponsorship relocation', location: 'United Kingdom', remote: false },
    { keywords: 'Test Automation Engineer sponsorship', location: 'Germany', remote: false },
    { keywords: 'QA Engineer sponsorship', location: 'Canada', remote: false },
    { keywords: 'QA Automation Engineer relocation', location: 'Australia', remote: false },
  ],
  home_country_remote: [
    { keywords: 'QA Automation Engineer remote', location: 'India', remote: true },
    { keywords: 'SDET remote work from home', location: 'India', remote: true },
    { keywords: 'Test Automation Engineer remote India', location: 'India', remote: true },
    { keywords: 'QA Engineer remote', location: 'Bangalore, Karnataka, India', remote: true },
  ],
  worldwide_remote: [
    { keywords: 'QA Automation Engineer', location: '', remote: true },
    { keywords: 'SDET remote worldwide', location: '', remote: true },
    { keywords: 'Test Automation Engineer remote', location: '', remote: true },
    { keywords: 'QA Lead remote', location: '', remote: true },
  ],
};

export function buildSearchUrl(search: LinkedInSearch): string {
  const params = new URLSearchParams({ keywords: search.keywords });
  if (search.location) {
    params.set('location', search.location);
  }
  if (search.remote) {
    params.set('f_WT', '2');
  }
  params.set('f_TPR', PAST_DAY);
  params.set('sortBy', 'DD');
  params.set('start', '0');
  return `${GUEST_SEARCH_URL}?${params.toString()}`;
}

/** Drops tracking parameters so the same posting always has the same URL. */
export function canonicalJobUrl(href: string): string {
  return (href.split('?')[0] ?? href).trim();
}

export function jobIdFromUrl(url: string): string {
  const digits = /(\d+)\/?$/.exec(url);
  if (digits?.[1]) {
    return digits[1];
  }

  const segments = url.split('/').filter((segment) => segment.length > 0);
  return segments[segments.length - 1] ?? url;
}

function cardText(card: HTMLElement, selector: string): string {
  return card.querySelector(selector)?.text.trim() ?? '';
}

export function parseSearchCards(html: string, category: PostingCategory): RawPosting[] {
  const root = parse(html);
  const postings: RawPosting[] = [];

  for (const card of root.querySelectorAll('.job-search-card, .base-card').slice(0, CARDS_PER_SEARCH)) {
    const title = cardText(card, '.base-search-card__title, h3.job-search-card__title');
    const href = card.querySelector("a.base-card__full-link, a[href*='/jobs/view/']")?.getAttribute('href') ?? '';
    const url = canonicalJobUrl(href);

    if (!title || !url) {
      continue;
    }

    postings.push({
      sourceId: 'linkedin',
      id: `linkedin:${jobIdFromUrl(url)}`,
      url,
      title,
      company: cardText(card, '.base-search-card__subtitle, h4.base-search-card__subtitle'),
      category,
      location: cardText(card, '.job-search-card__location, .base-search-card__metadata span') || undefined,
      postedAt: card.querySelector('time')?.getAttribute('datetime') || undefined,
    });
  }

  return postings;
}

function searchTask(search: LinkedInSearch, category: PostingCategory): SourceQueryTask {
  return {
    label: `search "${search.keywords}" in ${search.location || 'worldwide'}`,
    run: async (fetchImpl) => {
      const html = await fetchText(buildSearchUrl(search), { label: 'LinkedIn guest search', fetchImpl });
      return parseSearchCards(html, category);
    },
  };
}

/**
 * Runs the first few searches of every category. `maxJobs` applies per
 * category, so one busy category cannot starve the others.
 */
export async function fetchLinkedIn(context: FetchContext): Promise<FetchResult> {
  const jobs: RawPosting[] = [];
  const errors: string[] = [];
  for (const [index, category] of POSTING_CATEGORIES.entries()) {
    if (index > 0) {
      await politePause(context.pacing);
    }

    const tasks = LINKEDIN_SEARCHES[category]
      .slice(0, SEARCHES_PER_CATEGORY)
      .map((search) => searchTask(search, category));
    const result = await runSourceQueries('linkedin', tasks, context);
    jobs.push(...result.jobs);
    errors.push(...result.errors);
  }

  return { jobs, errors };
}

export const linkedInAdapter = defineAdapter({
  manifest: {
    id: 'linkedin',
    name: 'LinkedIn',
    version: '0.1.0',
    categories: ['sponsorship_abroad', 'home_country_remote', 'worldwide_remote'],
  },
  fetch: fetchLinkedIn,
});
