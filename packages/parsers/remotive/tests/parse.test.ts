import { readFileSync } from 'node:fs';
import { resolve, dirname } from 'node:path';
import { fileURLToPath } from 'node:url';
import { describe, it, expect, vi } from 'vitest';
import { DEFAULT_ROLE_KEYWORDS, rawPostingSchema, type FetchContext } from '@jobhound/parser-sdk';
import { fetchRemotive, parseRemotiveResponse } from '../src/index.js';

const __dirname = dirname(fileURLToPath(import.meta.url));
const fixture: unknown = JSON.parse(readFileSync(resolve(__dirname, '../fixtures/response.json'), 'utf-8'));

interface MockResponse {
  status: number;
  body?: unknown;
}

function mockFetchSequence(responses: MockResponse[]) {
  let idx = 0;
  return vi.fn<typeof fetch>().mockImplementation(() => {
    const next = responses[Math.min(idx, responses.length - 1)]!;
    idx += 1;
    return Promise.resolve(new Response(JSON.stringify(next.body ?? {}), { status: next.status }));
  });
}

function createContext(fetchImpl: typeof fetch): FetchContext {
  return {
    query: { keywords: DEFAULT_ROLE_KEYWORDS, maxJobs: 50 },
    logger: { info: vi.fn(), warn: vi.fn() },
    pacing: { minDelayMs: 0, maxDelayMs: 0 },
    fetchImpl,
  };
}

describe('Remotive adapter', () => {
  describe('parsing', () => {
    it('drops jobs without a company', () => {
      const postings = parseRemotiveResponse(fixture);
      expect(postings.map((p) => p.id)).toEqual(['remotive:1901001', 'remotive:1901002']);
    });

    it('maps fields correctly', () => {
      const [posting] = parseRemotiveResponse(fixture);

      expect(posting).toEqual({
        sourceId: 'remotive',
        id: 'remotive:1901001',
        url: 'https://remotive.com/remote-jobs/qa/senior-qa-automation-engineer-1901001',
        title: 'Senior QA Automation Engineer',
        company: 'Lattice Forge',
        category: 'worldwide_remote',
        location: 'Europe',
        description: '<p>Own our Selenium and Java regression suite.</p>',
        postedAt: '2026-02-20T10:00:00',
        salary: '$90,000 - $120,000',
        tags: ['selenium', 'java', 'ci'],
      });
    });

    it('defaults an empty location to Worldwide', () => {
      const postings = parseRemotiveResponse(fixture);
      expect(postings[1]!.location).toBe('Worldwide');
    });

    it('every posting passes the raw posting schema', () => {
      for (const posting of parseRemotiveResponse(fixture)) {
        expect(rawPostingSchema.safeParse(posting).success).toBe(true);
      }
    });

    it('rejects a non-object payload', () => {
      expect(() => parseRemotiveResponse('nope')).toThrow('Remotive API returned invalid payload');
    });
  });

  describe('fetch', () => {
    it('runs every search and keeps role-family postings only', async () => {
      const fetchImpl = mockFetchSequence([
        { status: 200, body: fixture },
        { status: 200, body: fixture },
        { status: 200, body: { jobs: [] } },
        { status: 200, body: { jobs: [] } },
      ]);

      const result = await fetchRemotive(createContext(fetchImpl));

      expect(result.errors).toEqual([]);
      expect(result.jobs.map((job) => job.id)).toEqual([
        'remotive:1901001',
        'remotive:1901002',
        'remotive:1901001',
        'remotive:1901002',
      ]);
      expect(fetchImpl).toHaveBeenCalledTimes(4);
      expect(fetchImpl.mock.calls[0]![0]).toBe('https://remotive.com/api/remote-jobs?category=qa&search=qa&limit=20');
      expect(fetchImpl.mock.calls[3]![0]).toBe(
        'https://remotive.com/api/remote-jobs?category=qa&search=quality%20assurance&limit=20',
      );
    });

    it('treats a failed search as zero results', async () => {
      const fetchImpl = mockFetchSequence([
        { status: 200, body: fixture },
        { status: 404 },
        { status: 200, body: { jobs: [] } },
        { status: 200, body: { jobs: [] } },
      ]);

      const result = await fetchRemotive(createContext(fetchImpl));

      expect(result.jobs).toHaveLength(2);
      expect(result.errors).toEqual(['search "test": Remotive API returned 404']);
    });
  });
});
