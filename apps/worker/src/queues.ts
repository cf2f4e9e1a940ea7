import { Queue } from 'bullmq';
import { Redis as IORedis } from 'ioredis';

export const PIPELINE_QUEUE = 'pipeline.run';

export type PipelineTrigger = 'schedule' | 'bootstrap' | 'manual';

export interface PipelineJobData {
  trigger: PipelineTrigger;
  traceId?: string;
}

export interface Queues {
  pipelineQueue: Queue<PipelineJobData>;
}

export function createRedisConnection(redisUrl: string): IORedis {
  // bullmq workers block on Redis and require unlimited retries per request.
  return new IORedis(redisUrl, {
    maxRetriesPerRequest: null,
    enableReadyCheck: true,
  });
}

export function createQueues(connection: IORedis): Queues {
  return {
    pipelineQueue: new Queue<PipelineJobData>(PIPELINE_QUEUE, { connection }),
  };
}

export async function closeQueues(queues: Queues): Promise<void> {
  await queues.pipelineQueue.close();
}
