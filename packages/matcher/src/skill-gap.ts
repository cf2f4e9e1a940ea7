import { z } from 'zod';
import type { MatchAssessment } from './assessment.js';
import type { CompletionClient } from './completion.js';
import { parseJsonReply } from './parse.js';
import type { CandidateProfile } from './profile.js';
import { buildSkillGapPrompt } from './prompts.js';
import type { MatcherLogger } from './types.js';

const RELEVANCE_THRESHOLD = 30;
const MAX_POSTINGS = 20;
const TOP_SKILLS = 15;

const DEFAULT_MISSING_COUNTS: ReadonlyArray<[string, number]> = [
  ['Cypress', 5],
  ['Playwright', 4],
  ['K6', 3],
  ['Docker', 3],
  ['AWS', 2],
  ['GitHub Actions', 2],
];

const stringList = z.array(z.coerce.string()).catch([]);

export const skillGapReportSchema = z.object({
  critical_skills_to_learn: z
    .array(
      z.object({
        skill: z.string(),
        reason: z.string().catch(''),
        learning_time: z.string().catch(''),
        resources: stringList,
      }),
    )
    .catch([]),
  trending_in_qa: stringList,
  certifications_recommended: z
    .array(z.object({ cert: z.string(), reason: z.string().catch(''), url: z.string().catch('') }))
    .catch([]),
  quick_wins: stringList,
  career_advice: z.string().catch(''),
});

export type SkillGapReport = z.infer<typeof skillGapReportSchema>;

export const STATIC_SKILL_GAP_REPORT: SkillGapReport = {
  critical_skills_to_learn: [
    { skill: 'Cypress', reason: 'Modern JS testing framework in high demand', learning_time: '2-4 weeks', resources: ['docs.cypress.io'] },
    { skill: 'Playwright', reason: 'Cross-browser automation with first-class API testing', learning_time: '2-3 weeks', resources: ['playwright.dev'] },
    { skill: 'K6', reason: 'Performance testing, often listed as a plus', learning_time: '1 week', resources: ['grafana.com/docs/k6'] },
  ],
  trending_in_qa: ['AI-assisted testing', 'Shift-left testing', 'API contract testing with Pact'],
  certifications_recommended: [{ cert: 'ISTQB Advanced', reason: 'Valued for senior roles', url: 'istqb.org' }],
  quick_wins: ['Add Docker basics to your profile', 'Learn GitHub Actions for CI/CD'],
  career_advice: 'Broaden beyond a single framework: adding Playwright or Cypress next to your current stack opens up most of the remote QA market.',
};

/**
 * Most frequent missing skills across relevant postings, ties in first-seen order.
 */
export function countMissingSkills(postings: ReadonlyArray<Pick<MatchAssessment, 'matchScore' | 'missingSkills'>>): Array<[string, number]> {
  const relevant = postings.filter((posting) => posting.matchScore >= RELEVANCE_THRESHOLD);
  if (relevant.length === 0) {
    return DEFAULT_MISSING_COUNTS.map(([skill, count]): [string, number] => [skill, count]);
  }

  const counts = new Map<string, number>();
  for (const posting of relevant.slice(0, MAX_POSTINGS)) {
    for (const skill of posting.missingSkills) {
      counts.set(skill, (counts.get(skill) ?? 0) + 1);
    }
  }

  return [...counts.entries()].sort((a, b) => b[1] - a[1]).slice(0, TOP_SKILLS);
}

export interface SkillGapOptions {
  client: CompletionClient;
  profile: CandidateProfile;
  logger: MatcherLogger;
}

/** Never rejects; any failure yields the static report. */
export async function synthesizeSkillGaps(
  postings: ReadonlyArray<Pick<MatchAssessment, 'matchScore' | 'missingSkills'>>,
  options: SkillGapOptions,
): Promise<SkillGapReport> {
  const missingCounts = countMissingSkills(postings);

  try {
    const reply = await options.client.complete(buildSkillGapPrompt(options.profile, missingCounts));
    const json = parseJsonReply(reply);
    if (!json.ok) {
      throw new Error(json.error);
    }
    return skillGapReportSchema.parse(json.value);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    options.logger.warn(`[skill-gap] analysis failed (${message.slice(0, 80)}), using static report`);
    return STATIC_SKILL_GAP_REPORT;
  }
}
