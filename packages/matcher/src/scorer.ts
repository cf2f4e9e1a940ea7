import { sleep, type JobPosting } from '@jobhound/parser-sdk';
import {
  assessmentFromReply,
  type FallbackReason,
  matchReplySchema,
  type MatchAssessment,
  type MatchOutcome,
  type ScoredPosting,
} from './assessment.js';
import type { CompletionClient } from './completion.js';
import { scoreByTitle } from './heuristic.js';
import { parseJsonReply } from './parse.js';
import type { CandidateProfile } from './profile.js';
import { buildMatchPrompt } from './prompts.js';
import type { MatcherLogger } from './types.js';

export interface MatchScorerOptions {
  client: CompletionClient;
  profile: CandidateProfile;
  logger: MatcherLogger;
  /** Shorter descriptions skip the model and go straight to the title heuristic. */
  minDescriptionLength?: number;
  descriptionBudget?: number;
  /** Postings per chunk before the scorer pauses for the model's rate limit. */
  chunkSize?: number;
  pauseMs?: number;
  sleep?: (ms: number) => Promise<void>;
}

export interface AssessResult {
  assessment: MatchAssessment;
  outcome: MatchOutcome;
}

export class MatchScorer {
  private readonly client: CompletionClient;
  private readonly profile: CandidateProfile;
  private readonly logger: MatcherLogger;
  private readonly minDescriptionLength: number;
  private readonly descriptionBudget: number;
  private readonly chunkSize: number;
  private readonly pauseMs: number;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(options: MatchScorerOptions) {
    this.client = options.client;
    this.profile = options.profile;
    this.logger = options.logger;
    this.minDescriptionLength = options.minDescriptionLength ?? 100;
    this.descriptionBudget = options.descriptionBudget ?? 2000;
    this.chunkSize = options.chunkSize ?? 10;
    this.pauseMs = options.pauseMs ?? 3000;
    this.sleep = options.sleep ?? sleep;
  }

  async assess(posting: JobPosting): Promise<AssessResult> {
    if (posting.description.trim().length < this.minDescriptionLength) {
      return this.fallback(posting, 'short_description');
    }

    let reply: string;
    try {
      reply = await this.client.complete(buildMatchPrompt(this.profile, posting, this.descriptionBudget));
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      this.logger.warn(`[match] ${posting.id}: completion failed (${message.slice(0, 80)}), using title heuristic`);
      return this.fallback(posting, 'completion_failed');
    }

    const json = parseJsonReply(reply);
    if (!json.ok) {
      this.logger.warn(`[match] ${posting.id}: unreadable reply (${json.error.slice(0, 80)}), using title heuristic`);
      return this.fallback(posting, 'unparsable_reply');
    }

    const parsed = matchReplySchema.safeParse(json.value);
    if (!parsed.success) {
      this.logger.warn(`[match] ${posting.id}: reply failed validation, using title heuristic`);
      return this.fallback(posting, 'unparsable_reply');
    }

    return { assessment: assessmentFromReply(parsed.data), outcome: { kind: 'ai' } };
  }

  /** Annotates `posting` in place and returns it. Never filters. */
  async score(posting: JobPosting): Promise<ScoredPosting> {
    const { assessment } = await this.assess(posting);
    return Object.assign(posting, assessment);
  }

  /**
   * Score every posting in order, keep those at or above `minScore`, best first.
   * Ties keep their input order. Like `score`, every posting is annotated in
   * place, including the ones left out of the result.
   */
  async batchScore(postings: readonly JobPosting[], minScore: number): Promise<ScoredPosting[]> {
    const kept: ScoredPosting[] = [];
    let heuristic = 0;

    this.logger.info(`[match] Scoring ${postings.length} jobs`);

    for (const [index, posting] of postings.entries()) {
      const { assessment, outcome } = await this.assess(posting);
      if (outcome.kind === 'heuristic') {
        heuristic++;
      }

      const scored = Object.assign(posting, assessment);
      if (scored.matchScore >= minScore) {
        kept.push(scored);
      }

      const done = index + 1;
      if (done % this.chunkSize === 0 && done < postings.length) {
        await this.sleep(this.pauseMs);
      }
    }

    kept.sort((a, b) => b.matchScore - a.matchScore);

    this.logger.info(`[match] ${kept.length}/${postings.length} jobs scored ${minScore} or higher`);
    if (heuristic > 0) {
      this.logger.info(`[match] ${heuristic} jobs used title-based fallback scoring`);
    }

    return kept;
  }

  private fallback(posting: JobPosting, reason: FallbackReason): AssessResult {
    return { assessment: scoreByTitle(posting, this.profile), outcome: { kind: 'heuristic', reason } };
  }
}
