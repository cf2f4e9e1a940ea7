import { parse } from 'node-html-parser';
import {
  defineAdapter,
  fetchText,
  runSourceQueries,
  type FetchContext,
  type FetchResult,
  type RawPosting,
  type SourceQueryTask,
} from '@jobhound/parser-sdk';

const BASE_URL = 'https://relocate.me';
const SEARCHES = ['qa-automation-engineer', 'software-tester', 'sdet'];
const CARDS_PER_PAGE = 20;

const CARD_SELECTOR = ".job-card, [data-testid='job-card'], article.job";
const TITLE_SELECTOR = "h2, h3, .job-title, [class*='title']";
const COMPANY_SELECTOR = ".company-name, [class*='company']";
const LOCATION_SELECTOR = ".location, [class*='location']";

function absoluteUrl(href: string): string {
  return href.startsWith('http') ? href : `${BASE_URL}${href.startsWith('/') ? '' : '/'}${href}`;
}

function slugFromHref(href: string): string {
  const path = href.split('?')[0] ?? href;
  const segments = path.split('/').filter((segment) => segment.length > 0);
  return segments[segments.length - 1] ?? path;
}

/**
 * Read job cards from a relocate.me search page. Every listing there comes
 * with visa or relocation support.
 */
export function parseRelocateSearch(html: string): RawPosting[] {
  const root = parse(html);
  const postings: RawPosting[] = [];

  for (const card of root.querySelectorAll(CARD_SELECTOR).slice(0, CARDS_PER_PAGE)) {
    const title = card.querySelector(TITLE_SELECTOR)?.text.trim() ?? '';
    const href = card.querySelector('a[href]')?.getAttribute('href')?.trim() ?? '';

    if (!title || !href) {
      continue;
    }

    postings.push({
      sourceId: 'relocateme',
      id: `relocateme:${slugFromHref(href)}`,
      url: absoluteUrl(href),
      title,
      company: card.querySelector(COMPANY_SELECTOR)?.text.trim() ?? '',
      category: 'sponsorship_abroad',
      location: card.querySelector(LOCATION_SELECTOR)?.text.trim() || undefined,
      sponsorship: true,
    });
  }

  return postings;
}

function searchTask(search: string): SourceQueryTask {
  return {
    label: `search "${search}"`,
    run: async (fetchImpl) => {
      const html = await fetchText(`${BASE_URL}/search?q=${encodeURIComponent(search)}`, {
        label: 'Relocate.me search',
        fetchImpl,
      });
      return parseRelocateSearch(html);
    },
  };
}

export async function fetchRelocateMe(context: FetchContext): Promise<FetchResult> {
  return runSourceQueries('relocateme', SEARCHES.map(searchTask), context);
}

export const relocateMeAdapter = defineAdapter({
  manifest: {
    id: 'relocateme',
    name: 'Relocate.me',
    version: '0.1.0',
    categories: ['sponsorship_abroad'],
  },
  fetch: fetchRelocateMe,
});
