import { mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import type { CandidateProfile } from '@jobhound/matcher';
import { MemoryDocumentStore } from '@jobhound/store';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { ConfigurationError } from '../src/config.js';
import { createProfileStore, importResume } from '../src/resume.js';
import { silentLogger } from './test-helpers.js';

const REPLY = JSON.stringify({
  personal: { name: 'Alex Example', email: 'alex@example.com', phone: '+10000000000', location: 'Pune, India' },
  experienceYears: 6,
  currentLevel: 'senior',
  techSkills: { testFrameworks: ['Selenium', 'TestNG'], programmingLanguages: ['Java'] },
});

describe('importResume', () => {
  it('extracts the text, asks the model and writes the profile', async () => {
    const store = new MemoryDocumentStore<CandidateProfile | null>(null);
    const completion = { complete: vi.fn(async (_prompt: string) => REPLY) };
    const extractText = vi.fn(async (_path: string) => '\n  Alex Example, Senior QA Automation Engineer  \n');

    const profile = await importResume({
      resumePath: 'resumes/alex.pdf',
      completion,
      store,
      logger: silentLogger(),
      extractText,
    });

    expect(extractText).toHaveBeenCalledWith('resumes/alex.pdf');
    expect(completion.complete.mock.calls[0]![0]).toContain('RESUME:\nAlex Example, Senior QA Automation Engineer\n');
    expect(profile.experienceYears).toBe(6);
    expect(profile.techSkills.testFrameworks).toEqual(['Selenium', 'TestNG']);
    expect(store.writes).toBe(1);
    expect(store.snapshot()).toEqual(profile);
  });

  it('stops before the model when the PDF has no text', async () => {
    const store = new MemoryDocumentStore<CandidateProfile | null>(null);
    const completion = { complete: vi.fn(async (_prompt: string) => REPLY) };

    await expect(
      importResume({
        resumePath: 'resumes/scan.pdf',
        completion,
        store,
        logger: silentLogger(),
        extractText: async () => '   ',
      }),
    ).rejects.toThrow('No text found in resume at resumes/scan.pdf');
    await expect(
      importResume({
        resumePath: 'resumes/scan.pdf',
        completion,
        store,
        logger: silentLogger(),
        extractText: async () => '',
      }),
    ).rejects.toThrow(ConfigurationError);
    expect(completion.complete).not.toHaveBeenCalled();
    expect(store.writes).toBe(0);
  });

  it('leaves the stored profile alone when the reply is unusable', async () => {
    const store = new MemoryDocumentStore<CandidateProfile | null>(null);

    await expect(
      importResume({
        resumePath: 'resumes/alex.pdf',
        completion: { complete: async () => 'Sorry, no.' },
        store,
        logger: silentLogger(),
        extractText: async () => 'Alex Example',
      }),
    ).rejects.toThrow('Resume reply is not JSON');
    expect(store.writes).toBe(0);
  });
});

describe('createProfileStore', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'jobhound-profile-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('reads null before a profile exists and the profile after it is written', async () => {
    const store = createProfileStore(join(dir, 'config', 'profile.json'));
    const profile = await importResume({
      resumePath: 'resumes/alex.pdf',
      completion: { complete: async () => REPLY },
      store,
      logger: silentLogger(),
      extractText: async () => 'Alex Example',
    });

    expect(await createProfileStore(join(dir, 'missing.json')).read()).toBeNull();
    expect(await store.read()).toEqual(profile);
  });
});
