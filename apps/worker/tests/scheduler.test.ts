import { describe, expect, it, vi } from 'vitest';
import type { Queues } from '../src/queues.js';
import { schedulePipeline } from '../src/scheduler.js';
import { stub } from './test-helpers.js';

function createQueuesMock() {
  const add = vi.fn().mockResolvedValue(undefined);
  const queues: Queues = {
    pipelineQueue: stub<Queues['pipelineQueue']>({ add }),
  };
  return { queues, add };
}

describe('schedulePipeline', () => {
  it('registers the daily repeatable run with the default cron', async () => {
    const { queues, add } = createQueuesMock();

    const result = await schedulePipeline(queues);

    expect(result).toEqual({ cron: '30 3 * * *' });
    expect(add).toHaveBeenCalledTimes(1);
    expect(add).toHaveBeenCalledWith(
      'pipeline-run',
      { trigger: 'schedule' },
      {
        attempts: 1,
        removeOnComplete: true,
        removeOnFail: 100,
        jobId: 'pipeline-run',
        repeat: { pattern: '30 3 * * *' },
      },
    );
  });

  it('falls back to the default cron when the configured one is blank', async () => {
    const { queues } = createQueuesMock();

    expect(await schedulePipeline(queues, { cron: '  ' })).toEqual({ cron: '30 3 * * *' });
  });

  it('queues one bootstrap run per day when asked', async () => {
    const { queues, add } = createQueuesMock();

    const result = await schedulePipeline(queues, {
      cron: '0 6 * * 1-5',
      bootstrapRunNow: true,
      now: () => new Date('2026-03-01T10:00:00.000Z'),
    });

    expect(result).toEqual({ cron: '0 6 * * 1-5', bootstrapJobId: 'pipeline-bootstrap-20260301' });
    expect(add).toHaveBeenLastCalledWith(
      'pipeline-run',
      { trigger: 'bootstrap' },
      { attempts: 1, removeOnComplete: true, removeOnFail: 100, jobId: 'pipeline-bootstrap-20260301' },
    );
  });
});
