import type { BrowserSession } from '@jobhound/browser';
import type { ScoredPosting } from '@jobhound/matcher';
import { sleep } from '@jobhound/parser-sdk';
import type { EasyApplyDriver } from './driver.js';
import { DEFAULT_ELIGIBILITY, selectEligible, type EligibilityPolicy } from './eligibility.js';
import type { ApplicationLedger } from './ledger.js';
import { signIn } from './login.js';
import type { ApplicationAttempt, ApplyLogger, PlatformCredentials } from './types.js';

export interface AutoApplyRunnerOptions {
  enabled: boolean;
  maxApplicationsPerRun: number;
  eligibility?: EligibilityPolicy;
  /** Fixed pause between two attempts. */
  pauseMs?: number;
  ledger: ApplicationLedger;
  driver: EasyApplyDriver;
  openBrowser: () => Promise<BrowserSession>;
  credentials?: PlatformCredentials;
  logger: ApplyLogger;
  sleep?: (ms: number) => Promise<void>;
}

export interface ApplicationResult {
  posting: ScoredPosting;
  attempt: ApplicationAttempt;
}

export class AutoApplyRunner {
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(private readonly options: AutoApplyRunnerOptions) {
    this.sleep = options.sleep ?? sleep;
  }

  /**
   * Apply to eligible postings one at a time. The ledger is flushed and the
   * browser closed even when an attempt blows up.
   */
  async run(postings: readonly ScoredPosting[]): Promise<ApplicationResult[]> {
    const { logger, ledger } = this.options;

    if (!this.options.enabled) {
      logger.info('[apply] Auto-apply is disabled');
      return [];
    }

    await ledger.ensureLoaded();
    const eligible = selectEligible(postings, ledger, this.options.eligibility ?? DEFAULT_ELIGIBILITY).slice(
      0,
      this.options.maxApplicationsPerRun,
    );

    if (eligible.length === 0) {
      logger.info('[apply] No eligible jobs for auto-apply');
      return [];
    }

    logger.info(`[apply] Applying to ${eligible.length} jobs`);
    const results: ApplicationResult[] = [];
    const session = await this.options.openBrowser();

    try {
      const page = await session.newPage();
      if (this.options.credentials) {
        await signIn(page, this.options.credentials, logger);
      }

      for (const [index, posting] of eligible.entries()) {
        if (index > 0) {
          await this.sleep(this.options.pauseMs ?? 5000);
        }

        const attempt = await this.options.driver.apply(page, posting);
        ledger.record(posting, attempt);
        results.push({
          posting: attempt.status === 'applied' ? { ...posting, autoApplied: true } : posting,
          attempt,
        });

        if (attempt.status === 'applied') {
          logger.info(`[apply] Applied: ${posting.title} at ${posting.company}`);
        } else {
          logger.warn(`[apply] ${posting.title} at ${posting.company}: ${attempt.status}${attempt.error ? ` (${attempt.error})` : ''}`);
        }
      }
    } finally {
      try {
        await ledger.flush();
      } finally {
        await session.close();
      }
    }

    const applied = results.filter((r) => r.attempt.status === 'applied').length;
    logger.info(`[apply] Done. ${applied}/${results.length} applications submitted`);
    return results;
  }
}
