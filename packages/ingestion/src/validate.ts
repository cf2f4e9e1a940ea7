import type { RawPosting, ValidatedRawPosting } from '@jobhound/parser-sdk';
import { validateRawPostings } from '@jobhound/parser-sdk';

export interface ValidationResult {
  valid: ValidatedRawPosting[];
  invalidCount: number;
  /** First issue of each dropped posting, for logs. */
  issues: string[];
}

/**
 * Validate adapter output using the parser-sdk Zod schema.
 * Returns valid postings and a count of dropped ones.
 */
export function validate(postings: RawPosting[]): ValidationResult {
  const issues: string[] = [];
  const valid = validateRawPostings(postings, {
    onInvalid: (zodIssues) => {
      const [first] = zodIssues;
      issues.push(first ? `${first.path.join('.')}: ${first.message}` : 'invalid posting');
    },
  });

  return {
    valid,
    invalidCount: postings.length - valid.length,
    issues,
  };
}
