import { vi } from 'vitest';
import type { ScoredPosting } from '@jobhound/matcher';

export function makeScored(id: string, overrides: Partial<ScoredPosting> = {}): ScoredPosting {
  return {
    id,
    url: `https://www.linkedin.com/jobs/view/${id}`,
    title: 'Senior QA Automation Engineer',
    company: 'Copperline',
    location: 'Berlin, Germany',
    description: '',
    source: 'linkedin',
    category: 'sponsorship_abroad',
    type: 'Outside Home Country (Sponsorship)',
    datePosted: '2026-03-01',
    scrapedAt: '2026-03-01T08:00:00.000Z',
    salary: '',
    sponsorship: false,
    tags: [],
    autoApplied: false,
    matchScore: 82,
    matchReasons: [],
    missingSkills: [],
    niceToHavePresent: [],
    recommendation: 'APPLY',
    recommendationReason: '',
    seniorityMatch: true,
    remoteType: 'onsite',
    scoredBy: 'ai',
    ...overrides,
  };
}

export function createLogger() {
  return { info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}
