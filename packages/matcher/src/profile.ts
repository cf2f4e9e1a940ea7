import { z } from 'zod';

const skillListSchema = z.array(z.string()).default([]);

export const candidateLevelSchema = z.enum(['junior', 'mid', 'senior', 'lead', 'principal']);

/**
 * The candidate the pipeline searches for. Unknown skill categories are kept
 * as extra string lists.
 */
export const candidateProfileSchema = z.object({
  personal: z.object({
    name: z.string().min(1),
    email: z.string().email(),
    phone: z.string().default(''),
    location: z.string().default(''),
    linkedin: z.string().optional(),
    github: z.string().optional(),
  }),
  summary: z.string().default(''),
  experienceYears: z.number().nonnegative(),
  currentLevel: candidateLevelSchema.default('mid'),
  jobTitles: skillListSchema,
  techSkills: z
    .object({
      testFrameworks: skillListSchema,
      programmingLanguages: skillListSchema,
      apiTesting: skillListSchema,
      performanceTesting: skillListSchema,
      ciCd: skillListSchema,
      cloud: skillListSchema,
    })
    .catchall(z.array(z.string())),
  certifications: skillListSchema,
  methodologies: skillListSchema,
  domainsTested: skillListSchema,
});

export type CandidateProfile = z.infer<typeof candidateProfileSchema>;
export type CandidateLevel = z.infer<typeof candidateLevelSchema>;

/** Skills the title heuristics look for, in priority order. */
export function coreSkills(profile: CandidateProfile): string[] {
  return [...profile.techSkills.testFrameworks, ...profile.techSkills.programmingLanguages];
}
