import type { ScoredPosting } from '@jobhound/matcher';

export interface EligibilityPolicy {
  /** Source id of the one platform the driver can apply on. */
  platform: string;
  minMatchScore: number;
}

export const DEFAULT_ELIGIBILITY: EligibilityPolicy = { platform: 'linkedin', minMatchScore: 75 };

export function selectEligible(
  postings: readonly ScoredPosting[],
  ledger: { has(jobId: string): boolean },
  policy: EligibilityPolicy = DEFAULT_ELIGIBILITY,
): ScoredPosting[] {
  return postings.filter(
    (posting) =>
      posting.source === policy.platform &&
      posting.recommendation === 'APPLY' &&
      posting.matchScore >= policy.minMatchScore &&
      !ledger.has(posting.id),
  );
}
