import { describe, it, expect } from 'vitest';
import { scoreByTitle } from '../src/heuristic.js';
import { makeProfile } from './helpers.js';

describe('scoreByTitle', () => {
  it('scores a senior QA title naming a known skill at 80', () => {
    const result = scoreByTitle({ title: 'Senior QA Automation Engineer - Selenium' }, makeProfile());

    expect(result).toEqual({
      matchScore: 80,
      matchReasons: [
        'Job title matches the QA/testing role family',
        'Seniority level matches your experience',
        'Selenium mentioned in job title',
      ],
      missingSkills: ['Cypress (popular JS framework)', 'Playwright', 'K6 performance testing'],
      niceToHavePresent: [],
      recommendation: 'APPLY',
      recommendationReason: 'Title-based match (AI scoring unavailable)',
      seniorityMatch: true,
      remoteType: 'not_specified',
      scoredBy: 'heuristic_fallback',
    });
  });

  it('gives 70 when the title names no skill', () => {
    expect(scoreByTitle({ title: 'Senior QA Automation Engineer' }, makeProfile()).matchScore).toBe(70);
  });

  it('treats titles without a level marker as a mid-level match', () => {
    const result = scoreByTitle({ title: 'QA Engineer' }, makeProfile());

    expect(result.matchScore).toBe(70);
    expect(result.matchReasons[1]).toBe('Mid-level position matches your profile');
  });

  it('rewards junior titles for less experienced candidates', () => {
    const result = scoreByTitle({ title: 'Junior QA Engineer' }, makeProfile({ experienceYears: 2 }));

    expect(result.matchScore).toBe(70);
    expect(result.matchReasons[1]).toBe('Junior level matches your experience');
  });

  it('gives no level bonus to a senior title for a junior candidate', () => {
    expect(scoreByTitle({ title: 'Senior SDET' }, makeProfile({ experienceYears: 2 })).matchScore).toBe(50);
  });

  it('counts only the first skill found in the title', () => {
    const profile = makeProfile({ testFrameworks: ['Selenium', 'Playwright'], programmingLanguages: ['Java'] });

    const result = scoreByTitle({ title: 'Lead SDET (Selenium, Playwright, Java)' }, profile);

    expect(result.matchScore).toBe(80);
    expect(result.missingSkills).toEqual(['Cypress (popular JS framework)', 'K6 performance testing']);
  });

  it('recommends MAYBE below 50 and falls back to a default reason', () => {
    const offTopic = scoreByTitle({ title: 'Office Manager' }, makeProfile());
    expect(offTopic.matchScore).toBe(20);
    expect(offTopic.recommendation).toBe('MAYBE');

    const nothing = scoreByTitle({ title: 'Senior Office Manager' }, makeProfile({ experienceYears: 2 }));
    expect(nothing.matchScore).toBe(0);
    expect(nothing.matchReasons).toEqual(['QA role matching your profile']);
  });

  it('stays within 0..85 and recommends APPLY exactly from 50', () => {
    const titles = [
      'Principal Quality Engineer - Cypress',
      'Associate Software Tester',
      'Head of Growth',
      'Test Automation Lead',
      'SDET II',
      'Staff Engineer',
    ];

    for (const experienceYears of [0, 3, 4, 12]) {
      for (const title of titles) {
        const { matchScore, recommendation } = scoreByTitle(
          { title },
          makeProfile({ experienceYears, testFrameworks: ['Cypress'] }),
        );
        expect(matchScore).toBeGreaterThanOrEqual(0);
        expect(matchScore).toBeLessThanOrEqual(85);
        expect(recommendation).toBe(matchScore >= 50 ? 'APPLY' : 'MAYBE');
      }
    }
  });
});
