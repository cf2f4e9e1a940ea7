import { vi } from 'vitest';
import type { JobPosting } from '@jobhound/parser-sdk';
import { candidateProfileSchema, type CandidateProfile } from '../src/profile.js';

export function makeProfile(overrides: { experienceYears?: number; testFrameworks?: string[]; programmingLanguages?: string[] } = {}): CandidateProfile {
  return candidateProfileSchema.parse({
    personal: { name: 'Test Candidate', email: 'candidate@example.com', phone: '+10000000000', location: 'Pune, India' },
    experienceYears: overrides.experienceYears ?? 5,
    currentLevel: 'senior',
    techSkills: {
      testFrameworks: overrides.testFrameworks ?? ['Selenium'],
      programmingLanguages: overrides.programmingLanguages ?? [],
    },
  });
}

export function makePosting(id: string, overrides: Partial<JobPosting> = {}): JobPosting {
  return {
    id,
    url: `https://jobs.example.com/${id}`,
    title: 'QA Automation Engineer',
    company: 'Acme',
    location: 'Remote',
    description: '',
    source: 'remotive',
    category: 'worldwide_remote',
    type: 'Remote Worldwide',
    datePosted: '2026-03-01',
    scrapedAt: '2026-03-01T08:00:00.000Z',
    salary: '',
    sponsorship: false,
    tags: [],
    autoApplied: false,
    ...overrides,
  };
}

export function createLogger() {
  return { info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}
