import type { ValidatedRawPosting } from '@jobhound/parser-sdk';

const MAX_LOCATION_LENGTH = 255;

/**
 * Trim whitespace and collapse multiple spaces.
 */
export function normalizeWhitespace(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

/**
 * Decode a small set of common HTML entities.
 */
export function decodeHtmlEntities(text: string): string {
  return text
    .replace(/&lt;/g, '<')
    .replace(/&gt;/g, '>')
    .replace(/&quot;/g, '"')
    .replace(/&#0?39;/g, "'")
    .replace(/&apos;/g, "'")
    .replace(/&nbsp;/g, ' ')
    .replace(/&amp;/g, '&');
}

/**
 * Strip HTML tags from a string. Converts block-level elements to newlines
 * to preserve document structure, then removes remaining tags.
 */
export function stripHtml(html: string): string {
  let text = html;

  // Preserve block-level breaks
  text = text.replace(/<br\s*\/?>/gi, '\n');
  text = text.replace(/<\/(p|li|div|h[1-6])>/gi, '\n');

  text = text.replace(/<[^>]+>/g, '');
  text = decodeHtmlEntities(text);

  // 3+ newlines → 2
  text = text.replace(/\n{3,}/g, '\n\n');

  return text
    .split('\n')
    .map((line) => line.replace(/[ \t]+/g, ' ').trim())
    .join('\n')
    .trim();
}

/**
 * Normalize tags: lowercase, trim, deduplicate, filter empty.
 */
export function normalizeTags(tags: string[]): string[] {
  const seen = new Set<string>();
  const result: string[] = [];
  for (const tag of tags) {
    const normalized = tag.toLowerCase().trim();
    if (normalized && !seen.has(normalized)) {
      seen.add(normalized);
      result.push(normalized);
    }
  }
  return result;
}

/**
 * Basic location cleanup. Trims whitespace, normalizes "Remote, ..." prefix.
 */
export function normalizeLocation(location: string): string {
  let loc = normalizeWhitespace(location);

  // "Remote, USA" → "USA (Remote)"
  const match = loc.match(/^Remote[,\s-]+(.+)$/i);
  if (match?.[1]) {
    loc = `${match[1].trim()} (Remote)`;
  }

  if (loc.length > MAX_LOCATION_LENGTH) {
    loc = loc.slice(0, MAX_LOCATION_LENGTH).trim();
  }

  return loc;
}

/**
 * Apply all normalizations to a validated posting.
 * Pure function, no I/O.
 */
export function normalize(posting: ValidatedRawPosting): ValidatedRawPosting {
  return {
    ...posting,
    url: posting.url.trim(),
    title: normalizeWhitespace(decodeHtmlEntities(posting.title)),
    company: normalizeWhitespace(decodeHtmlEntities(posting.company)),
    description: posting.description === undefined ? undefined : stripHtml(posting.description),
    location: posting.location ? normalizeLocation(posting.location) : undefined,
    salary: posting.salary ? normalizeWhitespace(posting.salary) : undefined,
    tags: posting.tags ? normalizeTags(posting.tags) : undefined,
  };
}
