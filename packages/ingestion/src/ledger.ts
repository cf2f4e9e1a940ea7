import type { JobPosting } from '@jobhound/parser-sdk';
import type { DocumentStore } from '@jobhound/store';
import { z } from 'zod';

const DAY_MS = 24 * 60 * 60 * 1000;

export const dedupLedgerEntrySchema = z.object({
  title: z.string().default(''),
  company: z.string().default(''),
  seen_at: z.string(),
  category: z.string().default(''),
});

export const dedupLedgerDocumentSchema = z.object({
  jobs: z.record(dedupLedgerEntrySchema).default({}),
  last_updated: z.string().nullable().default(null),
});

export type DedupLedgerDocument = z.infer<typeof dedupLedgerDocumentSchema>;

export function emptyDedupLedger(): DedupLedgerDocument {
  return { jobs: {}, last_updated: null };
}

export interface DedupLedgerStats {
  totalTracked: number;
  lastUpdated: string | null;
}

/**
 * Remembers which postings were already surfaced so they stay quiet for a
 * rolling window. Entries older than the window resurface and are re-stamped.
 */
export class DedupLedger {
  constructor(
    private readonly store: DocumentStore<DedupLedgerDocument>,
    private readonly now: () => Date = () => new Date(),
  ) {}

  async filterNew(postings: readonly JobPosting[], windowDays: number): Promise<JobPosting[]> {
    const document = await this.store.read();
    const now = this.now();
    const nowIso = now.toISOString();
    const cutoff = now.getTime() - windowDays * DAY_MS;
    const fresh: JobPosting[] = [];

    for (const posting of postings) {
      const key = posting.id || posting.url;
      if (!key) {
        fresh.push(posting);
        continue;
      }

      const entry = document.jobs[key];
      const seenAt = entry ? Date.parse(entry.seen_at) : Number.NaN;
      if (seenAt > cutoff) {
        continue;
      }

      document.jobs[key] = {
        title: posting.title,
        company: posting.company,
        seen_at: nowIso,
        category: posting.category,
      };
      fresh.push(posting);
    }

    document.last_updated = nowIso;
    await this.store.write(document);
    return fresh;
  }

  async stats(): Promise<DedupLedgerStats> {
    const document = await this.store.read();
    return {
      totalTracked: Object.keys(document.jobs).length,
      lastUpdated: document.last_updated,
    };
  }
}
