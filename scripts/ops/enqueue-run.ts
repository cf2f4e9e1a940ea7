import { closeQueues, createQueues, createRedisConnection } from '../../apps/worker/src/queues.js';

async function main(): Promise<void> {
  const redisUrl = process.env.REDIS_URL ?? 'redis://localhost:6379';
  const redis = createRedisConnection(redisUrl);
  const queues = createQueues(redis);

  try {
    const stamp = Date.now();
    await queues.pipelineQueue.add(
      'pipeline-run',
      {
        trigger: 'manual',
        traceId: `manual-${stamp}`,
      },
      {
        jobId: `manual-pipeline-run-${stamp}`,
        attempts: 1,
        removeOnComplete: true,
        removeOnFail: 100,
      },
    );

    console.log('queued pipeline.run');
  } finally {
    await closeQueues(queues);
    await redis.quit();
  }
}

main().catch((error) => {
  console.error(error);
  process.exit(1);
});
