import type { ScoredPosting } from '@jobhound/matcher';
import type { DocumentStore } from '@jobhound/store';
import { z } from 'zod';
import { APPLICATION_STATUSES, type ApplicationAttempt } from './types.js';

export const applicationRecordSchema = z.object({
  title: z.string().default(''),
  company: z.string().default(''),
  url: z.string().default(''),
  applied_at: z.string(),
  status: z.enum(APPLICATION_STATUSES),
  match_score: z.number().default(0),
  error: z.string().optional(),
});

export const applicationLedgerDocumentSchema = z.record(applicationRecordSchema);

export type ApplicationRecord = z.infer<typeof applicationRecordSchema>;
export type ApplicationLedgerDocument = z.infer<typeof applicationLedgerDocumentSchema>;

export function emptyApplicationLedger(): ApplicationLedgerDocument {
  return {};
}

/**
 * Every terminal application status, keyed by job id. Loaded once per batch,
 * written back once at the end.
 */
export class ApplicationLedger {
  private document: ApplicationLedgerDocument | undefined;

  constructor(
    private readonly store: DocumentStore<ApplicationLedgerDocument>,
    private readonly now: () => Date = () => new Date(),
  ) {}

  async load(): Promise<void> {
    this.document = await this.store.read();
  }

  /** Reads the store unless an earlier `load()` already did. */
  async ensureLoaded(): Promise<void> {
    if (!this.document) {
      await this.load();
    }
  }

  has(jobId: string): boolean {
    return jobId in this.loaded();
  }

  get(jobId: string): ApplicationRecord | undefined {
    return this.loaded()[jobId];
  }

  get size(): number {
    return Object.keys(this.loaded()).length;
  }

  record(posting: ScoredPosting, attempt: ApplicationAttempt): ApplicationRecord {
    const entry: ApplicationRecord = {
      title: posting.title,
      company: posting.company,
      url: posting.url,
      applied_at: this.now().toISOString(),
      status: attempt.status,
      match_score: posting.matchScore,
      ...(attempt.error === undefined ? {} : { error: attempt.error }),
    };
    this.loaded()[attempt.jobId] = entry;
    return entry;
  }

  async flush(): Promise<void> {
    await this.store.write(this.loaded());
  }

  private loaded(): ApplicationLedgerDocument {
    if (!this.document) {
      throw new Error('Application ledger used before load()');
    }
    return this.document;
  }
}
