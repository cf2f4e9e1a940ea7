export const APPLICATION_STATUSES = [
  'applied',
  'not_supported',
  'no_easy_apply',
  'manual_needed',
  'too_many_steps',
  'timed_out',
  'failed',
] as const;

export type ApplicationStatus = (typeof APPLICATION_STATUSES)[number];

export interface ApplicationAttempt {
  jobId: string;
  status: ApplicationStatus;
  /** Form steps entered before the terminal state. */
  steps: number;
  error?: string;
}

export type DriverState =
  | { kind: 'navigating'; jobId: string }
  | { kind: 'form_step'; jobId: string; step: number }
  | { kind: 'terminal'; jobId: string; status: ApplicationStatus };

export interface ApplyLogger {
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export interface PlatformCredentials {
  email: string;
  password: string;
}
