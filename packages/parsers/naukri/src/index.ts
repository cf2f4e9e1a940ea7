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

const SEARCHES = [
  'QA automation engineer remote',
  'test automation engineer work from home',
  'SDET remote',
  'software tester remote',
];
const TUPLES_PER_PAGE = 20;
const ID_MAX_LENGTH = 30;

const TUPLE_SELECTOR = "article.jobTuple, [class*='jobTupleHeader'], .job-container";
const TITLE_SELECTOR = "a.title, [class*='jobTitle'] a, .designation a";
const COMPANY_SELECTOR = ".companyInfo a, [class*='companyName']";
const LOCATION_SELECTOR = ".location, [class*='location']";

export function searchUrl(search: string): string {
  const slug = search.trim().split(/\s+/).join('-');
  return `https://www.naukri.com/${encodeURIComponent(slug)}-jobs?jobType=work+from+home&wfhType=wfh`;
}

function idFromUrl(url: string): string {
  const path = url.split('?')[0] ?? url;
  const segments = path.split('/').filter((segment) => segment.length > 0);
  return (segments[segments.length - 1] ?? path).slice(0, ID_MAX_LENGTH);
}

/** Work-from-home listings from a Naukri search page. */
export function parseNaukriSearch(html: string): RawPosting[] {
  const root = parse(html);
  const postings: RawPosting[] = [];

  for (const tuple of root.querySelectorAll(TUPLE_SELECTOR).slice(0, TUPLES_PER_PAGE)) {
    const titleLink = tuple.querySelector(TITLE_SELECTOR);
    const title = titleLink?.text.trim() ?? '';
    const url = titleLink?.getAttribute('href')?.trim() ?? '';

    if (!title || !url) {
      continue;
    }

    const place = tuple.querySelector(LOCATION_SELECTOR)?.text.trim() || 'India';

    postings.push({
      sourceId: 'naukri',
      id: `naukri:${idFromUrl(url)}`,
      url,
      title,
      company: tuple.querySelector(COMPANY_SELECTOR)?.text.trim() ?? '',
      category: 'home_country_remote',
      location: `India - Remote (${place})`,
    });
  }

  return postings;
}

function searchTask(search: string): SourceQueryTask {
  return {
    label: `search "${search}"`,
    run: async (fetchImpl) => {
      const html = await fetchText(searchUrl(search), { label: 'Naukri search', fetchImpl });
      return parseNaukriSearch(html);
    },
  };
}

export async function fetchNaukri(context: FetchContext): Promise<FetchResult> {
  return runSourceQueries('naukri', SEARCHES.map(searchTask), context);
}

export const naukriAdapter = defineAdapter({
  manifest: {
    id: 'naukri',
    name: 'Naukri',
    version: '0.1.0',
    categories: ['home_country_remote'],
  },
  fetch: fetchNaukri,
});
