import type { Queues } from './queues.js';

const DEFAULT_PIPELINE_CRON = '30 3 * * *';
const PIPELINE_JOB_NAME = 'pipeline-run';

export interface SchedulePipelineOptions {
  cron?: string;
  /** Also queue a one-off run right away, at most once per day. */
  bootstrapRunNow?: boolean;
  now?: () => Date;
}

export interface ScheduleResult {
  cron: string;
  bootstrapJobId?: string;
}

function bootstrapKey(date: Date): string {
  return date.toISOString().slice(0, 10).replaceAll('-', '');
}

// A run writes both ledgers; a failed run waits for the next schedule instead of retrying.
const RUN_JOB_OPTIONS = {
  attempts: 1,
  removeOnComplete: true,
  removeOnFail: 100,
} as const;

export async function schedulePipeline(queues: Queues, options: SchedulePipelineOptions = {}): Promise<ScheduleResult> {
  const cron = options.cron?.trim() || DEFAULT_PIPELINE_CRON;

  await queues.pipelineQueue.add(
    PIPELINE_JOB_NAME,
    { trigger: 'schedule' },
    {
      ...RUN_JOB_OPTIONS,
      jobId: PIPELINE_JOB_NAME,
      repeat: { pattern: cron },
    },
  );

  if (!options.bootstrapRunNow) {
    return { cron };
  }

  const now = options.now ?? (() => new Date());
  const bootstrapJobId = `pipeline-bootstrap-${bootstrapKey(now())}`;
  await queues.pipelineQueue.add(PIPELINE_JOB_NAME, { trigger: 'bootstrap' }, { ...RUN_JOB_OPTIONS, jobId: bootstrapJobId });

  return { cron, bootstrapJobId };
}
