import type { CompletionClient } from './completion.js';
import { parseJsonReply } from './parse.js';
import { candidateProfileSchema, type CandidateProfile } from './profile.js';

export const RESUME_TEXT_BUDGET = 12_000;

export class ResumeParseError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ResumeParseError';
  }
}

export function buildResumePrompt(resumeText: string, budget = RESUME_TEXT_BUDGET): string {
  return `You read resumes of QA and test automation engineers and turn them into a structured profile.

RESUME:
${resumeText.trim().slice(0, budget)}

Reply with ONLY this JSON object, no markdown and no commentary. Leave out any field the resume does not state.
{
  "personal": {
    "name": "Full Name",
    "email": "name@example.com",
    "phone": "+10000000000",
    "location": "City, Country",
    "linkedin": "https://www.linkedin.com/in/...",
    "github": "https://github.com/..."
  },
  "summary": "Two or three sentences",
  "experienceYears": 5,
  "currentLevel": "junior | mid | senior | lead | principal",
  "jobTitles": ["QA Automation Engineer", "SDET"],
  "techSkills": {
    "testFrameworks": ["Selenium", "Playwright"],
    "programmingLanguages": ["Java", "TypeScript"],
    "apiTesting": ["Postman", "REST Assured"],
    "performanceTesting": ["JMeter", "K6"],
    "ciCd": ["Jenkins", "GitHub Actions"],
    "cloud": ["AWS"],
    "mobile": ["Appium"]
  },
  "certifications": ["ISTQB Foundation"],
  "methodologies": ["Agile", "BDD"],
  "domainsTested": ["E-commerce", "Banking"]
}`;
}

// Models write `null` for unknown fields; the profile schema wants them absent.
function withoutNulls(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.filter((item) => item !== null).map(withoutNulls);
  }
  if (typeof value === 'object' && value !== null) {
    return Object.fromEntries(
      Object.entries(value)
        .filter(([, item]) => item !== null)
        .map(([key, item]) => [key, withoutNulls(item)]),
    );
  }
  return value;
}

/**
 * Ask the model for a candidate profile. Completion errors propagate; a reply
 * that is not a valid profile raises `ResumeParseError`.
 */
export async function parseResumeProfile(resumeText: string, client: CompletionClient): Promise<CandidateProfile> {
  if (!resumeText.trim()) {
    throw new ResumeParseError('Resume text is empty');
  }

  const reply = parseJsonReply(await client.complete(buildResumePrompt(resumeText)));
  if (!reply.ok) {
    throw new ResumeParseError(`Resume reply is not JSON: ${reply.error}`);
  }

  const parsed = candidateProfileSchema.safeParse(withoutNulls(reply.value));
  if (!parsed.success) {
    const detail = parsed.error.issues
      .slice(0, 3)
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ResumeParseError(`Resume reply is not a valid profile: ${detail}`);
  }

  return parsed.data;
}
