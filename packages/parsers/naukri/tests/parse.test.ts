import { readFileSync } from 'node:fs';
import { resolve, dirname } from 'node:path';
import { fileURLToPath } from 'node:url';
import { describe, it, expect, vi } from 'vitest';
import { DEFAULT_ROLE_KEYWORDS, type FetchContext } from '@jobhound/parser-sdk';
import { fetchNaukri, parseNaukriSearch, searchUrl } from '../src/index.js';

const __dirname = dirname(fileURLToPath(import.meta.url));
const fixture = readFileSync(resolve(__dirname, '../fixtures/search.html'), 'utf-8');

describe('Naukri adapter', () => {
  it('builds hyphenated work-from-home search urls', () => {
    expect(searchUrl('SDET remote')).toBe('https://www.naukri.com/SDET-remote-jobs?jobType=work+from+home&wfhType=wfh');
  });

  it('maps tuples and skips those without a link', () => {
    const postings = parseNaukriSearch(fixture);

    expect(postings).toEqual([
      {
        sourceId: 'naukri',
        id: 'naukri:job-listings-qa-automation-eng',
        url: 'https://www.naukri.com/job-listings-qa-automation-engineer-saffron-tech-pune-3-to-6-years-180226001234',
        title: 'QA Automation Engineer',
        company: 'Saffron Tech',
        category: 'home_country_remote',
        location: 'India - Remote (Pune)',
      },
      {
        sourceId: 'naukri',
        id: 'naukri:job-listings-sdet-ii-monsoon-l',
        url: 'https://www.naukri.com/job-listings-sdet-ii-monsoon-labs-180226005678?src=jobsearch',
        title: 'SDET II',
        company: 'Monsoon Labs',
        category: 'home_country_remote',
        location: 'India - Remote (India)',
      },
    ]);
  });

  it('runs all four searches and collects relevant postings', async () => {
    const fetchImpl = vi
      .fn<typeof fetch>()
      .mockImplementation(() => Promise.resolve(new Response(fixture)));
    const context: FetchContext = {
      query: { keywords: DEFAULT_ROLE_KEYWORDS, maxJobs: 3 },
      logger: { info: vi.fn(), warn: vi.fn() },
      pacing: { minDelayMs: 0, maxDelayMs: 0 },
      fetchImpl,
    };

    const result = await fetchNaukri(context);

    expect(fetchImpl).toHaveBeenCalledTimes(2);
    expect(result.jobs.map((p) => p.title)).toEqual(['QA Automation Engineer', 'SDET II', 'QA Automation Engineer']);
    expect(result.errors).toEqual([]);
  });
});
