import type { BrowserSession } from '@jobhound/browser';
import type { JobPosting } from '@jobhound/parser-sdk';
import { normalizeWhitespace } from './normalize.js';
import type { IngestionLogger } from './types.js';

const GENERIC_SELECTORS = ['article', 'main', '[role="main"]', 'body'];

const SOURCE_SELECTORS: Record<string, string[]> = {
  linkedin: ['.description__text', '.show-more-less-html__markup'],
  relocateme: ['.job-description', '.vacancy__description'],
  naukri: ['.job-desc', '[class*="job-desc"]'],
};

export interface EnrichOptions {
  browser: BrowserSession;
  logger: IngestionLogger;
  maxPostings: number;
  minLength?: number;
  navigationTimeoutMs?: number;
  /** Overrides the built-in per-source selectors. */
  selectors?: Record<string, string[]>;
}

export interface EnrichResult {
  postings: JobPosting[];
  enriched: number;
  attempted: number;
}

export function selectorsFor(source: string, overrides?: Record<string, string[]>): string[] {
  const specific = overrides?.[source] ?? SOURCE_SELECTORS[source] ?? [];
  return [...specific, ...GENERIC_SELECTORS];
}

/**
 * Fill in short descriptions by reading the posting page. Best effort: a page
 * that fails to load leaves its posting as it was.
 */
export async function enrichDescriptions(postings: readonly JobPosting[], options: EnrichOptions): Promise<EnrichResult> {
  const minLength = options.minLength ?? 100;
  const result = [...postings];
  let attempted = 0;
  let enriched = 0;

  const targets = result
    .map((posting, index) => ({ posting, index }))
    .filter(({ posting }) => posting.url && posting.description.length < minLength)
    .slice(0, options.maxPostings);

  if (targets.length === 0) {
    return { postings: result, enriched, attempted };
  }

  const page = await options.browser.newPage();
  try {
    for (const { posting, index } of targets) {
      attempted++;
      try {
        await page.goto(posting.url, { timeoutMs: options.navigationTimeoutMs });

        for (const selector of selectorsFor(posting.source, options.selectors)) {
          const element = await page.querySelector(selector);
          const text = element ? normalizeWhitespace(await element.innerText()) : '';
          if (text.length >= minLength) {
            result[index] = { ...posting, description: text };
            enriched++;
            break;
          }
        }
      } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        options.logger.warn(`[enrich:${posting.source}] ${posting.id}: ${message}`);
      }
    }
  } finally {
    await page.close();
  }

  options.logger.info(`[enrich] ${enriched}/${attempted} descriptions filled in`);
  return { postings: result, enriched, attempted };
}
