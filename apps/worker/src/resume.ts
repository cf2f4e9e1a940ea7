import { readFile } from 'node:fs/promises';
import { candidateProfileSchema, parseResumeProfile, type CandidateProfile, type CompletionClient } from '@jobhound/matcher';
import { JsonFileDocumentStore, type DocumentStore } from '@jobhound/store';
import { PDFParse } from 'pdf-parse';
import type { Logger } from 'pino';
import { ConfigurationError } from './config.js';

export type ProfileStore = DocumentStore<CandidateProfile | null>;

export function createProfileStore(path: string): ProfileStore {
  return new JsonFileDocumentStore({
    path,
    schema: candidateProfileSchema.nullable(),
    empty: () => null,
  });
}

export async function extractPdfText(path: string): Promise<string> {
  const parser = new PDFParse({ data: new Uint8Array(await readFile(path)) });
  try {
    const result = await parser.getText();
    return result.text;
  } finally {
    await parser.destroy();
  }
}

export interface ImportResumeOptions {
  resumePath: string;
  completion: CompletionClient;
  store: ProfileStore;
  logger: Logger;
  extractText?: (path: string) => Promise<string>;
}

/** Resume PDF to candidate profile, written through `store`. Run once, then edit the JSON by hand if needed. */
export async function importResume(options: ImportResumeOptions): Promise<CandidateProfile> {
  const { resumePath, logger } = options;
  const extractText = options.extractText ?? extractPdfText;

  const text = (await extractText(resumePath)).trim();
  if (!text) {
    throw new ConfigurationError(`No text found in resume at ${resumePath}`);
  }
  logger.info({ event: 'resume_extracted', resumePath, chars: text.length }, 'Resume text extracted');

  const profile = await parseResumeProfile(text, options.completion);
  await options.store.write(profile);

  logger.info(
    {
      event: 'profile_written',
      name: profile.personal.name,
      experienceYears: profile.experienceYears,
      currentLevel: profile.currentLevel,
      testFrameworks: profile.techSkills.testFrameworks.length,
    },
    'Candidate profile written',
  );
  return profile;
}
