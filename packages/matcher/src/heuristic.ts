import type { JobPosting } from '@jobhound/parser-sdk';
import type { MatchAssessment } from './assessment.js';
import { coreSkills, type CandidateProfile } from './profile.js';

export const HEURISTIC_TITLE_KEYWORDS: readonly string[] = [
  'qa automation',
  'test automation',
  'sdet',
  'quality assurance',
  'selenium',
  'playwright',
  'cypress',
  'appium',
  'software tester',
  'automation engineer',
  'quality engineer',
  'test engineer',
  'qa engineer',
  'qa analyst',
  'automation tester',
  'software testing',
];

export const HEURISTIC_SCORE_CAP = 85;
export const HEURISTIC_APPLY_THRESHOLD = 50;
const SENIOR_EXPERIENCE_YEARS = 4;
const JUNIOR_EXPERIENCE_YEARS = 3;

const SENIOR_MARKERS = ['senior', 'lead', 'principal'];
const JUNIOR_MARKERS = ['junior', 'associate'];
const ANY_LEVEL_MARKERS = ['senior', 'lead', 'junior', 'principal'];

const TRENDING_SKILLS: ReadonlyArray<{ skill: string; label: string }> = [
  { skill: 'cypress', label: 'Cypress (popular JS framework)' },
  { skill: 'playwright', label: 'Playwright' },
  { skill: 'k6', label: 'K6 performance testing' },
];

function containsAny(text: string, needles: readonly string[]): boolean {
  return needles.some((needle) => text.includes(needle));
}

/**
 * Deterministic title-only scoring used when the model cannot be asked or
 * its answer cannot be read. Never scores above the cap.
 */
export function scoreByTitle(posting: Pick<JobPosting, 'title'>, profile: CandidateProfile): MatchAssessment {
  const title = posting.title.toLowerCase();
  const experience = profile.experienceYears;
  const reasons: string[] = [];
  let score = 0;

  if (containsAny(title, HEURISTIC_TITLE_KEYWORDS)) {
    score += 50;
    reasons.push('Job title matches the QA/testing role family');
  }

  if (experience >= SENIOR_EXPERIENCE_YEARS && containsAny(title, SENIOR_MARKERS)) {
    score += 20;
    reasons.push('Seniority level matches your experience');
  } else if (experience <= JUNIOR_EXPERIENCE_YEARS && containsAny(title, JUNIOR_MARKERS)) {
    score += 20;
    reasons.push('Junior level matches your experience');
  } else if (!containsAny(title, ANY_LEVEL_MARKERS)) {
    score += 20;
    reasons.push('Mid-level position matches your profile');
  }

  const skills = coreSkills(profile);
  const skillInTitle = skills.find((skill) => skill.trim() && title.includes(skill.toLowerCase()));
  if (skillInTitle) {
    score += 10;
    reasons.push(`${skillInTitle} mentioned in job title`);
  }

  const known = new Set(skills.map((skill) => skill.toLowerCase()));
  const missingSkills = TRENDING_SKILLS.filter(({ skill }) => !known.has(skill))
    .map(({ label }) => label)
    .slice(0, 3);

  const matchScore = Math.min(score, HEURISTIC_SCORE_CAP);

  return {
    matchScore,
    matchReasons: reasons.length > 0 ? reasons : ['QA role matching your profile'],
    missingSkills,
    niceToHavePresent: [],
    recommendation: matchScore >= HEURISTIC_APPLY_THRESHOLD ? 'APPLY' : 'MAYBE',
    recommendationReason: 'Title-based match (AI scoring unavailable)',
    seniorityMatch: true,
    remoteType: 'not_specified',
    scoredBy: 'heuristic_fallback',
  };
}
