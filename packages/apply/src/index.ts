export { APPLICATION_STATUSES } from './types.js';
export type { ApplicationAttempt, ApplicationStatus, ApplyLogger, DriverState, PlatformCredentials } from './types.js';
export {
  ApplicationLedger,
  applicationLedgerDocumentSchema,
  applicationRecordSchema,
  emptyApplicationLedger,
} from './ledger.js';
export type { ApplicationLedgerDocument, ApplicationRecord } from './ledger.js';
export { selectEligible, DEFAULT_ELIGIBILITY } from './eligibility.js';
export type { EligibilityPolicy } from './eligibility.js';
export { EasyApplyDriver, EASY_APPLY_SELECTORS, isPlatformUrl } from './driver.js';
export type { ApplicantDetails, EasyApplyDriverOptions } from './driver.js';
export { signIn } from './login.js';
export { AutoApplyRunner } from './runner.js';
export type { AutoApplyRunnerOptions, ApplicationResult } from './runner.js';
