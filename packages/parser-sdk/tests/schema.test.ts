import { describe, expect, it } from 'vitest';
import { jobPostingSchema, toJobPosting, validateRawPostings } from '../src/schema.js';

const scrapedAt = new Date('2026-03-02T08:30:00.000Z');

describe('validateRawPostings', () => {
  it('keeps valid postings and reports invalid ones', () => {
    const invalid: unknown[] = [];
    const valid = validateRawPostings(
      [
        {
          sourceId: 'remotive',
          id: 'remotive:1',
          url: 'https://remotive.com/remote-jobs/qa/1',
          title: 'QA Engineer',
          company: 'Acme',
          category: 'worldwide_remote',
        },
        {
          sourceId: 'remotive',
          id: 'remotive:2',
          url: 'https://remotive.com/remote-jobs/qa/2',
          title: 'QA Engineer',
          company: 'Acme',
          category: 'mars_remote',
        },
        { id: '' },
      ],
      { onInvalid: (_issues, posting) => invalid.push(posting) },
    );

    expect(valid.map((p) => p.id)).toEqual(['remotive:1']);
    expect(invalid).toHaveLength(2);
  });

  it('accepts an empty url', () => {
    const valid = validateRawPostings([
      { sourceId: 'naukri', id: 'naukri:abc', url: '', title: 'SDET', company: 'Acme', category: 'home_country_remote' },
    ]);

    expect(valid).toHaveLength(1);
  });
});

describe('toJobPosting', () => {
  it('fills every optional field with its default', () => {
    const posting = toJobPosting(
      {
        sourceId: 'weworkremotely',
        id: 'weworkremotely:acme-sdet',
        url: 'https://weworkremotely.com/remote-jobs/acme-sdet',
        title: 'SDET',
        company: 'Acme',
        category: 'worldwide_remote',
      },
      scrapedAt,
    );

    expect(posting).toEqual({
      id: 'weworkremotely:acme-sdet',
      url: 'https://weworkremotely.com/remote-jobs/acme-sdet',
      title: 'SDET',
      company: 'Acme',
      location: '',
      description: '',
      source: 'weworkremotely',
      category: 'worldwide_remote',
      type: 'Remote Worldwide',
      datePosted: '2026-03-02',
      scrapedAt: '2026-03-02T08:30:00.000Z',
      salary: '',
      sponsorship: false,
      tags: [],
      autoApplied: false,
    });
  });

  it('keeps source values when present', () => {
    const posting = toJobPosting(
      {
        sourceId: 'relocateme',
        id: 'relocateme:qa-berlin',
        url: 'https://relocate.me/berlin/acme/qa-berlin',
        title: 'QA Automation Engineer',
        company: 'Acme',
        category: 'sponsorship_abroad',
        location: 'Berlin, Germany',
        postedAt: '2026-02-27',
        sponsorship: true,
        tags: ['selenium'],
      },
      scrapedAt,
    );

    expect(posting.type).toBe('Outside Home Country (Sponsorship)');
    expect(posting.datePosted).toBe('2026-02-27');
    expect(posting.sponsorship).toBe(true);
    expect(posting.tags).toEqual(['selenium']);
    expect(jobPostingSchema.safeParse(posting).success).toBe(true);
  });
});
