import { describe, it, expect } from 'vitest';
import type { JobPosting } from '@jobhound/parser-sdk';
import { MemoryDocumentStore } from '@jobhound/store';
import { DedupLedger, emptyDedupLedger, type DedupLedgerDocument } from '../src/ledger.js';

const NOW = new Date('2026-03-01T08:00:00.000Z');
const DAY_MS = 24 * 60 * 60 * 1000;

function daysAgo(days: number): string {
  return new Date(NOW.getTime() - days * DAY_MS).toISOString();
}

function makePosting(id: string, overrides: Partial<JobPosting> = {}): JobPosting {
  return {
    id,
    url: `https://jobs.example.com/${id}`,
    title: 'SDET',
    company: 'Acme',
    location: '',
    description: '',
    source: 'remotive',
    category: 'worldwide_remote',
    type: 'Remote Worldwide',
    datePosted: '2026-03-01',
    scrapedAt: NOW.toISOString(),
    salary: '',
    sponsorship: false,
    tags: [],
    autoApplied: false,
    ...overrides,
  };
}

function createLedger(initial: DedupLedgerDocument = emptyDedupLedger()) {
  const store = new MemoryDocumentStore(initial);
  return { store, ledger: new DedupLedger(store, () => NOW) };
}

describe('DedupLedger', () => {
  it('keeps unseen postings and records them', async () => {
    const { store, ledger } = createLedger();

    const fresh = await ledger.filterNew([makePosting('a'), makePosting('b')], 7);

    expect(fresh.map((p) => p.id)).toEqual(['a', 'b']);
    expect(store.snapshot()).toEqual({
      jobs: {
        a: { title: 'SDET', company: 'Acme', seen_at: NOW.toISOString(), category: 'worldwide_remote' },
        b: { title: 'SDET', company: 'Acme', seen_at: NOW.toISOString(), category: 'worldwide_remote' },
      },
      last_updated: NOW.toISOString(),
    });
    expect(store.writes).toBe(1);
  });

  it('returns nothing on an immediate second pass', async () => {
    const { ledger } = createLedger();
    const postings = [makePosting('a'), makePosting('b')];

    await ledger.filterNew(postings, 7);

    expect(await ledger.filterNew(postings, 7)).toEqual([]);
  });

  it('suppresses entries seen inside the window and resurfaces older ones', async () => {
    const { store, ledger } = createLedger({
      jobs: {
        recent: { title: 'SDET', company: 'Acme', seen_at: daysAgo(6), category: 'worldwide_remote' },
        stale: { title: 'SDET', company: 'Acme', seen_at: daysAgo(8), category: 'worldwide_remote' },
      },
      last_updated: daysAgo(6),
    });

    const fresh = await ledger.filterNew([makePosting('recent'), makePosting('stale')], 7);

    expect(fresh.map((p) => p.id)).toEqual(['stale']);
    expect(store.snapshot().jobs.stale?.seen_at).toBe(NOW.toISOString());
    expect(store.snapshot().jobs.recent?.seen_at).toBe(daysAgo(6));
  });

  it('uses the url when the id is empty and keeps postings with neither', async () => {
    const { store, ledger } = createLedger();

    const fresh = await ledger.filterNew(
      [makePosting('', { url: 'https://jobs.example.com/x' }), makePosting('', { url: '' })],
      7,
    );

    expect(fresh).toHaveLength(2);
    expect(Object.keys(store.snapshot().jobs)).toEqual(['https://jobs.example.com/x']);
  });

  it('keeps only the first of two postings sharing an id within one call', async () => {
    const { ledger } = createLedger();

    const fresh = await ledger.filterNew([makePosting('a', { title: 'First' }), makePosting('a', { title: 'Second' })], 7);

    expect(fresh.map((p) => p.title)).toEqual(['First']);
  });

  it('treats an unreadable timestamp as expired', async () => {
    const { ledger } = createLedger({
      jobs: { a: { title: 'SDET', company: 'Acme', seen_at: 'yesterday', category: 'worldwide_remote' } },
      last_updated: null,
    });

    expect(await ledger.filterNew([makePosting('a')], 7)).toHaveLength(1);
  });

  it('reports stats', async () => {
    const { ledger } = createLedger();
    expect(await ledger.stats()).toEqual({ totalTracked: 0, lastUpdated: null });

    await ledger.filterNew([makePosting('a')], 7);

    expect(await ledger.stats()).toEqual({ totalTracked: 1, lastUpdated: NOW.toISOString() });
  });
});
