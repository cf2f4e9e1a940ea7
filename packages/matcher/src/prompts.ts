import type { JobPosting } from '@jobhound/parser-sdk';
import { coreSkills, type CandidateProfile } from './profile.js';

export function profileSummary(profile: CandidateProfile): Record<string, unknown> {
  const { testFrameworks, programmingLanguages, apiTesting, performanceTesting, ciCd, cloud } = profile.techSkills;
  return {
    experience_years: profile.experienceYears,
    current_level: profile.currentLevel,
    job_titles: profile.jobTitles,
    test_frameworks: testFrameworks,
    programming_languages: programmingLanguages,
    api_testing: apiTesting,
    performance_testing: performanceTesting,
    ci_cd: ciCd,
    cloud,
    methodologies: profile.methodologies,
    certifications: profile.certifications,
    domains_tested: profile.domainsTested,
  };
}

export function buildMatchPrompt(profile: CandidateProfile, posting: JobPosting, descriptionBudget: number): string {
  return `You are an experienced QA and test automation recruiter. Score how well this candidate fits this job.

CANDIDATE PROFILE:
${JSON.stringify(profileSummary(profile), null, 2)}

JOB POSTING:
Title: ${posting.title}
Company: ${posting.company || 'N/A'}
Location: ${posting.location || 'N/A'}
Description: ${posting.description.trim().slice(0, descriptionBudget)}

RULES:
- A clear QA/testing/automation role for a candidate with QA experience scores at least 50.
- Weigh skill overlap, experience level and title relevance.

Reply with ONLY this JSON object, no markdown and no commentary:
{
  "match_score": 75,
  "match_reasons": ["Selenium is required and present", "Java matches", "Experience fits the senior level"],
  "missing_skills": ["Cypress", "K6"],
  "nice_to_have_present": ["JIRA", "Agile"],
  "recommendation": "APPLY",
  "recommendation_reason": "Strong overlap on core automation skills",
  "seniority_match": true,
  "remote_type": "fully_remote"
}

recommendation: APPLY (60 and above), MAYBE (40-59), SKIP (below 40)
remote_type: fully_remote, hybrid, onsite, not_specified`;
}

export function buildSkillGapPrompt(profile: CandidateProfile, missingCounts: ReadonlyArray<[string, number]>): string {
  return `You are a career coach for QA and test automation engineers. The candidate has ${profile.experienceYears} years of experience.

Current skills: ${coreSkills(profile).join(', ')}

Skills that job postings ask for and the candidate lacks, with how often they came up:
${JSON.stringify(missingCounts, null, 2)}

Reply with ONLY this JSON object, no markdown:
{
  "critical_skills_to_learn": [
    { "skill": "Cypress", "reason": "Widely requested JS testing framework", "learning_time": "2-4 weeks", "resources": ["docs.cypress.io"] }
  ],
  "trending_in_qa": ["AI-assisted testing", "Shift-left testing"],
  "certifications_recommended": [
    { "cert": "ISTQB Advanced Test Automation Engineer", "reason": "Recognised for senior roles", "url": "istqb.org" }
  ],
  "quick_wins": ["Learn k6 basics for performance testing"],
  "career_advice": "Two or three sentences of advice."
}`;
}
