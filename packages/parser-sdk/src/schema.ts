import { z } from 'zod';
import { categoryLabel } from './categories.js';
import { POSTING_CATEGORIES } from './types.js';

export const postingCategorySchema = z.enum(POSTING_CATEGORIES);

export const rawPostingSchema = z.object({
  sourceId: z.string().min(1),
  id: z.string().min(1),
  url: z.string().url().or(z.literal('')),
  title: z.string().min(1),
  company: z.string(),
  category: postingCategorySchema,
  location: z.string().optional(),
  description: z.string().optional(),
  postedAt: z.string().optional(),
  salary: z.string().optional(),
  sponsorship: z.boolean().optional(),
  tags: z.array(z.string()).optional(),
});

export type ValidatedRawPosting = z.infer<typeof rawPostingSchema>;

/**
 * Canonical posting. Every optional field is present with a default so
 * downstream stages never branch on field existence.
 */
export const jobPostingSchema = z.object({
  id: z.string().min(1),
  url: z.string().default(''),
  title: z.string().min(1),
  company: z.string().default(''),
  location: z.string().default(''),
  description: z.string().default(''),
  source: z.string().min(1),
  category: postingCategorySchema,
  type: z.string(),
  datePosted: z.string(),
  scrapedAt: z.string(),
  salary: z.string().default(''),
  sponsorship: z.boolean().default(false),
  tags: z.array(z.string()).default([]),
  autoApplied: z.boolean().default(false),
});

export type JobPosting = z.infer<typeof jobPostingSchema>;

export interface ValidateRawPostingsOptions {
  onInvalid?: (issues: z.ZodIssue[], posting: unknown) => void;
}

export function validateRawPostings(postings: unknown[], options?: ValidateRawPostingsOptions): ValidatedRawPosting[] {
  const valid: ValidatedRawPosting[] = [];

  for (const posting of postings) {
    const result = rawPostingSchema.safeParse(posting);
    if (result.success) {
      valid.push(result.data);
    } else {
      options?.onInvalid?.(result.error.issues, posting);
    }
  }

  return valid;
}

/**
 * Lift a validated adapter posting into the canonical shape.
 * `scrapedAt` doubles as the posting date when the source gives none.
 */
export function toJobPosting(raw: ValidatedRawPosting, scrapedAt: Date): JobPosting {
  const scrapedIso = scrapedAt.toISOString();

  return jobPostingSchema.parse({
    id: raw.id,
    url: raw.url,
    title: raw.title,
    company: raw.company,
    location: raw.location,
    description: raw.description,
    source: raw.sourceId,
    category: raw.category,
    type: categoryLabel(raw.category),
    datePosted: raw.postedAt || scrapedIso.slice(0, 10),
    scrapedAt: scrapedIso,
    salary: raw.salary,
    sponsorship: raw.sponsorship,
    tags: raw.tags,
  });
}
