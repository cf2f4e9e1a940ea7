import { describe, it, expect } from 'vitest';
import { FakeElement, FakePage, navigationTimeout } from '@jobhound/browser/testing';
import { EASY_APPLY_SELECTORS as S, EasyApplyDriver, isPlatformUrl } from '../src/driver.js';
import type { DriverState } from '../src/types.js';

const POSTING = { id: 'linkedin:4100200300', url: 'https://www.linkedin.com/jobs/view/4100200300' };

function createDriver(transitions: DriverState[] = [], resumePath?: string) {
  return new EasyApplyDriver({
    applicant: { phone: '+10000000000', location: 'Pune, Maharashtra, India', experienceYears: 5 },
    resumePath,
    onTransition: (state) => transitions.push(state),
  });
}

function withApplyButton(rest: (selector: string) => FakeElement[]) {
  const applyButton = new FakeElement({ attributes: { 'aria-label': 'Easy Apply to this job' } });
  return (selector: string) => (selector === S.applyButton ? [applyButton] : rest(selector));
}

describe('isPlatformUrl', () => {
  it('accepts the platform host and its subdomains only', () => {
    expect(isPlatformUrl('https://www.linkedin.com/jobs/view/1', 'linkedin.com')).toBe(true);
    expect(isPlatformUrl('https://linkedin.com.evil.test/jobs/view/1', 'linkedin.com')).toBe(false);
    expect(isPlatformUrl('not a url', 'linkedin.com')).toBe(false);
  });
});

describe('EasyApplyDriver', () => {
  it('needs a human on the first step when the form has no primary action', async () => {
    const transitions: DriverState[] = [];
    const page = new FakePage(withApplyButton(() => []));

    const attempt = await createDriver(transitions).apply(page, POSTING);

    expect(attempt).toEqual({ jobId: POSTING.id, status: 'manual_needed', steps: 1 });
    expect(transitions).toEqual([
      { kind: 'navigating', jobId: POSTING.id },
      { kind: 'form_step', jobId: POSTING.id, step: 1 },
      { kind: 'terminal', jobId: POSTING.id, status: 'manual_needed' },
    ]);
    expect(page.waitedMs).toBe(4000);
  });

  it('gives up after exactly eight steps of an endless form', async () => {
    const next = new FakeElement({ text: 'Next' });
    const page = new FakePage(withApplyButton((selector) => (selector === S.button ? [next] : [])));

    const attempt = await createDriver().apply(page, POSTING);

    expect(attempt).toEqual({ jobId: POSTING.id, status: 'too_many_steps', steps: 8 });
    expect(next.clicks).toBe(8);
  });

  it('fills empty fields and submits', async () => {
    const phone = new FakeElement();
    const city = new FakeElement();
    const resume = new FakeElement();
    const radios = [new FakeElement(), new FakeElement()];
    const emptySelect = new FakeElement({
      children: {
        [S.option]: [
          new FakeElement({ text: 'Select an option', attributes: { value: '' } }),
          new FakeElement({ text: 'Native', attributes: { value: 'native' } }),
          new FakeElement({ text: 'Fluent', attributes: { value: 'fluent' } }),
        ],
      },
    });
    const answeredSelect = new FakeElement({ value: 'fluent' });
    const emptyYears = new FakeElement();
    const answeredYears = new FakeElement({ value: '2' });
    const back = new FakeElement({ text: 'Back' });
    const submit = new FakeElement({ text: 'Submit', attributes: { 'aria-label': 'Submit application' } });

    const dom: Record<string, FakeElement[]> = {
      [S.phone]: [phone],
      [S.city]: [city],
      [S.resume]: [resume],
      [S.yesRadio]: radios,
      [S.select]: [emptySelect, answeredSelect],
      [S.yearsInput]: [emptyYears, answeredYears],
      [S.button]: [back, submit],
    };
    const page = new FakePage(withApplyButton((selector) => dom[selector] ?? []));

    const attempt = await createDriver([], '/tmp/resume.pdf').apply(page, POSTING);

    expect(attempt).toEqual({ jobId: POSTING.id, status: 'applied', steps: 1 });
    expect(phone.value).toBe('+10000000000');
    expect(city.value).toBe('Pune');
    expect(resume.files).toEqual(['/tmp/resume.pdf']);
    expect(radios.map((r) => r.checked)).toEqual([true, true]);
    expect(emptySelect.value).toBe('native');
    expect(answeredSelect.value).toBe('fluent');
    expect(emptyYears.value).toBe('5');
    expect(answeredYears.value).toBe('2');
    expect(back.clicks).toBe(0);
    expect(submit.clicks).toBe(1);
  });

  it('leaves filled fields alone and skips the resume without a path', async () => {
    const phone = new FakeElement({ value: '+19999999999' });
    const resume = new FakeElement();
    const page = new FakePage(
      withApplyButton((selector) => {
        if (selector === S.phone) return [phone];
        if (selector === S.resume) return [resume];
        if (selector === S.button) return [new FakeElement({ text: 'Submit application' })];
        return [];
      }),
    );

    await createDriver().apply(page, POSTING);

    expect(phone.value).toBe('+19999999999');
    expect(resume.files).toEqual([]);
  });

  it('detects a confirmation shown after the last step', async () => {
    let step = 1;
    const next = new FakeElement({ text: 'Review', onClick: () => step++ });
    const confirmation = new FakeElement({ text: 'Your application was sent to Copperline' });
    const page = new FakePage(
      withApplyButton((selector) => {
        if (selector === S.confirmation) return step === 2 ? [confirmation] : [];
        if (selector === S.button) return [next];
        return [];
      }),
    );

    const attempt = await createDriver().apply(page, POSTING);

    expect(attempt).toEqual({ jobId: POSTING.id, status: 'applied', steps: 2 });
    expect(next.clicks).toBe(1);
  });

  it('refuses postings outside the platform without navigating', async () => {
    const page = new FakePage(() => []);

    const attempt = await createDriver().apply(page, { id: 'remotive:1', url: 'https://remotive.com/jobs/1' });

    expect(attempt).toEqual({ jobId: 'remotive:1', status: 'not_supported', steps: 0 });
    expect(page.visited).toEqual([]);
  });

  it('reports postings without an in-platform apply button', async () => {
    const attempt = await createDriver().apply(new FakePage(() => []), POSTING);

    expect(attempt).toEqual({ jobId: POSTING.id, status: 'no_easy_apply', steps: 0 });
  });

  it('maps navigation timeouts to timed_out', async () => {
    const page = new FakePage(() => [], { failNavigation: navigationTimeout });

    const attempt = await createDriver().apply(page, POSTING);

    expect(attempt).toEqual({ jobId: POSTING.id, status: 'timed_out', steps: 0 });
  });

  it('maps other errors to failed with a shortened message', async () => {
    const broken = new FakeElement({
      text: 'Next',
      onClick: () => {
        throw new Error('Element is detached from the DOM and cannot be clicked anymore');
      },
    });
    const page = new FakePage(withApplyButton((selector) => (selector === S.button ? [broken] : [])));

    const attempt = await createDriver().apply(page, POSTING);

    expect(attempt).toEqual({
      jobId: POSTING.id,
      status: 'failed',
      steps: 1,
      error: 'Element is detached from the DOM and cannot be cli',
    });
  });
});
