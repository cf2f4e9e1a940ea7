import { BrowserTimeoutError, type BrowserPage, type PageElement } from '@jobhound/browser';
import type { JobPosting } from '@jobhound/parser-sdk';
import type { ApplicationAttempt, ApplicationStatus, DriverState } from './types.js';

export const EASY_APPLY_SELECTORS = {
  applyButton: "button[aria-label*='Easy Apply'], .jobs-apply-button--top-card",
  confirmation: "[aria-label*='submitted'], .jobs-easy-apply-modal__content h3",
  phone: "input[id*='phone'], input[name*='phone']",
  city: "input[id*='city'], input[name*='location']",
  resume: "input[type='file']",
  yesRadio: "input[type='radio'][value='Yes']",
  select: 'select',
  option: 'option',
  yearsInput: "input[type='text'][id*='year'], input[type='number']",
  button: 'button',
} as const;

const PRIMARY_ACTION_WORDS = ['next', 'review', 'submit'];
const CONFIRMATION_WORDS = ['submitted', 'sent'];
const DEFAULT_EXPERIENCE_YEARS = 3;
const ERROR_DETAIL_LENGTH = 50;

export interface ApplicantDetails {
  phone: string;
  location: string;
  experienceYears?: number;
}

export interface EasyApplyDriverOptions {
  applicant: ApplicantDetails;
  /** Attached wherever the form has a file input. */
  resumePath?: string;
  platformHost?: string;
  maxSteps?: number;
  settleMs?: number;
  navigationTimeoutMs?: number;
  onTransition?: (state: DriverState) => void;
}

interface PrimaryAction {
  element: PageElement;
  label: string;
}

export function isPlatformUrl(url: string, host: string): boolean {
  try {
    const { hostname } = new URL(url);
    return hostname === host || hostname.endsWith(`.${host}`);
  } catch {
    return false;
  }
}

/**
 * Walks a multi-step in-platform application form. Each attempt ends in
 * exactly one terminal status; nothing is thrown to the caller.
 */
export class EasyApplyDriver {
  private readonly applicant: ApplicantDetails;
  private readonly resumePath: string | undefined;
  private readonly platformHost: string;
  private readonly maxSteps: number;
  private readonly settleMs: number;
  private readonly navigationTimeoutMs: number;
  private readonly onTransition: ((state: DriverState) => void) | undefined;

  constructor(options: EasyApplyDriverOptions) {
    this.applicant = options.applicant;
    this.resumePath = options.resumePath;
    this.platformHost = options.platformHost ?? 'linkedin.com';
    this.maxSteps = options.maxSteps ?? 8;
    this.settleMs = options.settleMs ?? 2000;
    this.navigationTimeoutMs = options.navigationTimeoutMs ?? 20_000;
    this.onTransition = options.onTransition;
  }

  async apply(page: BrowserPage, posting: Pick<JobPosting, 'id' | 'url'>): Promise<ApplicationAttempt> {
    const jobId = posting.id;
    let steps = 0;

    if (!isPlatformUrl(posting.url, this.platformHost)) {
      return this.finish(jobId, 'not_supported', steps);
    }

    this.onTransition?.({ kind: 'navigating', jobId });

    try {
      await page.goto(posting.url, { timeoutMs: this.navigationTimeoutMs });
      await page.waitForTimeout(this.settleMs);

      const applyButton = await page.querySelector(EASY_APPLY_SELECTORS.applyButton);
      if (!applyButton) {
        return this.finish(jobId, 'no_easy_apply', steps);
      }
      await applyButton.click();
      await page.waitForTimeout(this.settleMs);

      while (steps < this.maxSteps) {
        steps++;
        this.onTransition?.({ kind: 'form_step', jobId, step: steps });

        if (await this.isConfirmed(page)) {
          return this.finish(jobId, 'applied', steps);
        }

        await this.fillKnownFields(page);

        const action = await this.findPrimaryAction(page);
        if (!action) {
          return this.finish(jobId, 'manual_needed', steps);
        }

        await action.element.click();
        await page.waitForTimeout(this.settleMs);

        if (action.label.includes('submit')) {
          return this.finish(jobId, 'applied', steps);
        }
      }

      return this.finish(jobId, 'too_many_steps', steps);
    } catch (err) {
      if (err instanceof BrowserTimeoutError) {
        return this.finish(jobId, 'timed_out', steps);
      }
      const message = err instanceof Error ? err.message : String(err);
      return this.finish(jobId, 'failed', steps, message.slice(0, ERROR_DETAIL_LENGTH));
    }
  }

  private finish(jobId: string, status: ApplicationStatus, steps: number, error?: string): ApplicationAttempt {
    this.onTransition?.({ kind: 'terminal', jobId, status });
    return error === undefined ? { jobId, status, steps } : { jobId, status, steps, error };
  }

  private async isConfirmed(page: BrowserPage): Promise<boolean> {
    const element = await page.querySelector(EASY_APPLY_SELECTORS.confirmation);
    if (!element) {
      return false;
    }
    const text = (await element.innerText()).toLowerCase();
    return CONFIRMATION_WORDS.some((word) => text.includes(word));
  }

  // Order matters: later fields may only appear once earlier ones are filled.
  private async fillKnownFields(page: BrowserPage): Promise<void> {
    await this.fillIfEmpty(page, EASY_APPLY_SELECTORS.phone, this.applicant.phone);
    await this.fillIfEmpty(page, EASY_APPLY_SELECTORS.city, this.applicant.location.split(',')[0]?.trim() ?? '');

    if (this.resumePath) {
      const upload = await page.querySelector(EASY_APPLY_SELECTORS.resume);
      if (upload) {
        await upload.setInputFiles(this.resumePath);
        await page.waitForTimeout(1000);
      }
    }

    // Eligibility questions are always answered "Yes".
    for (const radio of await page.querySelectorAll(EASY_APPLY_SELECTORS.yesRadio)) {
      await radio.check();
    }

    for (const select of await page.querySelectorAll(EASY_APPLY_SELECTORS.select)) {
      if (await select.inputValue()) {
        continue;
      }
      for (const option of await select.querySelectorAll(EASY_APPLY_SELECTORS.option)) {
        const value = await option.getAttribute('value');
        if (value) {
          await select.selectOption(value);
          break;
        }
      }
    }

    const years = String(this.applicant.experienceYears ?? DEFAULT_EXPERIENCE_YEARS);
    for (const input of await page.querySelectorAll(EASY_APPLY_SELECTORS.yearsInput)) {
      if (!(await input.inputValue())) {
        await input.fill(years);
      }
    }
  }

  private async fillIfEmpty(page: BrowserPage, selector: string, value: string): Promise<void> {
    if (!value) {
      return;
    }
    const field = await page.querySelector(selector);
    if (field && !(await field.inputValue())) {
      await field.fill(value);
    }
  }

  private async findPrimaryAction(page: BrowserPage): Promise<PrimaryAction | undefined> {
    for (const element of await page.querySelectorAll(EASY_APPLY_SELECTORS.button)) {
      const label = ((await element.getAttribute('aria-label')) || (await element.innerText())).toLowerCase();
      if (PRIMARY_ACTION_WORDS.some((word) => label.includes(word))) {
        return { element, label };
      }
    }
    return undefined;
  }
}
