import type { JobPosting } from '@jobhound/parser-sdk';
import { z } from 'zod';

export const RECOMMENDATIONS = ['APPLY', 'MAYBE', 'SKIP'] as const;
export const REMOTE_TYPES = ['fully_remote', 'hybrid', 'onsite', 'not_specified'] as const;

export type Recommendation = (typeof RECOMMENDATIONS)[number];
export type RemoteType = (typeof REMOTE_TYPES)[number];
export type ScoredBy = 'ai' | 'heuristic_fallback';

export interface MatchAssessment {
  matchScore: number;
  matchReasons: string[];
  missingSkills: string[];
  niceToHavePresent: string[];
  recommendation: Recommendation;
  recommendationReason: string;
  seniorityMatch: boolean;
  remoteType: RemoteType;
  scoredBy: ScoredBy;
}

export type ScoredPosting = JobPosting & MatchAssessment;

export type FallbackReason = 'short_description' | 'completion_failed' | 'unparsable_reply';

export type MatchOutcome = { kind: 'ai' } | { kind: 'heuristic'; reason: FallbackReason };

export function clampScore(value: number): number {
  return Math.min(100, Math.max(0, Math.trunc(value)));
}

const stringListSchema = z.array(z.coerce.string()).catch([]);

// A number, or a string that spells one. Null, empty strings and arrays are rejected.
const scoreSchema = z
  .union([
    z.number(),
    z
      .string()
      .trim()
      .regex(/^-?\d+(\.\d+)?$/)
      .transform(Number),
  ])
  .pipe(z.number().finite())
  .transform(clampScore);

/**
 * The JSON object the model is asked for. Only `match_score` is required;
 * everything else degrades to a neutral value.
 */
export const matchReplySchema = z.object({
  match_score: scoreSchema,
  match_reasons: stringListSchema,
  missing_skills: stringListSchema,
  nice_to_have_present: stringListSchema,
  recommendation: z
    .string()
    .transform((value) => value.trim().toUpperCase())
    .pipe(z.enum(RECOMMENDATIONS))
    .catch('MAYBE'),
  recommendation_reason: z.string().catch(''),
  seniority_match: z.boolean().catch(false),
  remote_type: z
    .string()
    .transform((value) => value.trim().toLowerCase())
    .pipe(z.enum(REMOTE_TYPES))
    .catch('not_specified'),
});

export type MatchReply = z.infer<typeof matchReplySchema>;

export function assessmentFromReply(reply: MatchReply): MatchAssessment {
  return {
    matchScore: reply.match_score,
    matchReasons: reply.match_reasons,
    missingSkills: reply.missing_skills,
    niceToHavePresent: reply.nice_to_have_present,
    recommendation: reply.recommendation,
    recommendationReason: reply.recommendation_reason,
    seniorityMatch: reply.seniority_match,
    remoteType: reply.remote_type,
    scoredBy: 'ai',
  };
}
