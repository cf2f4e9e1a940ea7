export { candidateProfileSchema, candidateLevelSchema, coreSkills } from './profile.js';
export type { CandidateProfile, CandidateLevel } from './profile.js';
export { GeminiCompletionClient } from './completion.js';
export type { CompletionClient, GeminiCompletionOptions } from './completion.js';
export { parseJsonReply, stripCodeFences, extractFirstJsonObject } from './parse.js';
export type { JsonReply } from './parse.js';
export { RECOMMENDATIONS, REMOTE_TYPES, clampScore, matchReplySchema, assessmentFromReply } from './assessment.js';
export type {
  MatchAssessment,
  ScoredPosting,
  Recommendation,
  RemoteType,
  ScoredBy,
  FallbackReason,
  MatchOutcome,
  MatchReply,
} from './assessment.js';
export { scoreByTitle, HEURISTIC_TITLE_KEYWORDS, HEURISTIC_SCORE_CAP, HEURISTIC_APPLY_THRESHOLD } from './heuristic.js';
export { buildMatchPrompt, buildSkillGapPrompt, profileSummary } from './prompts.js';
export { MatchScorer } from './scorer.js';
export type { MatchScorerOptions, AssessResult } from './scorer.js';
export { synthesizeSkillGaps, countMissingSkills, skillGapReportSchema, STATIC_SKILL_GAP_REPORT } from './skill-gap.js';
export type { SkillGapReport, SkillGapOptions } from './skill-gap.js';
export type { MatcherLogger } from './types.js';
export { buildResumePrompt, parseResumeProfile, ResumeParseError, RESUME_TEXT_BUDGET } from './resume.js';
