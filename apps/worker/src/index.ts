import type { Job } from 'bullmq';
import { Worker } from 'bullmq';
import type { Redis as IORedis } from 'ioredis';
import { loadCandidateProfile, loadPipelineConfig } from './config.js';
import { createWorkerLogger } from './observability/logger.js';
import { serializeError, withLogger } from './observability/with-logger.js';
import { runPipeline } from './pipeline.js';
import { closeQueues, createQueues, createRedisConnection, PIPELINE_QUEUE, type PipelineJobData, type Queues } from './queues.js';
import { createPipelineDependencies } from './runtime.js';
import { schedulePipeline } from './scheduler.js';

const DEFAULT_REDIS_URL = 'redis://localhost:6379';

interface RuntimeState {
  redis: IORedis | null;
  queues: Queues | null;
  worker: Worker<PipelineJobData> | null;
}

const runtimeState: RuntimeState = {
  redis: null,
  queues: null,
  worker: null,
};

async function cleanupRuntimeState(state: RuntimeState): Promise<void> {
  if (state.worker) {
    await Promise.allSettled([state.worker.close()]);
  }

  if (state.queues) {
    await Promise.allSettled([closeQueues(state.queues)]);
  }

  if (state.redis) {
    await Promise.allSettled([state.redis.quit()]);
  }
}

async function run(): Promise<void> {
  const logger = createWorkerLogger();

  // Configuration problems surface before anything touches Redis.
  const config = await loadPipelineConfig();
  const profile = await loadCandidateProfile(config.profilePath);
  const redisUrl = process.env.REDIS_URL ?? DEFAULT_REDIS_URL;

  const redis = createRedisConnection(redisUrl);
  runtimeState.redis = redis;
  const queues = createQueues(redis);
  runtimeState.queues = queues;

  const worker = new Worker<PipelineJobData>(
    PIPELINE_QUEUE,
    (job: Job<PipelineJobData>) =>
      withLogger({
        logger,
        queue: PIPELINE_QUEUE,
        job,
        context: () => ({ trigger: job.data.trigger }),
        summary: (result) => ({
          totalScraped: result.snapshot.totalScraped,
          totalMatched: result.snapshot.totalMatched,
          applications: result.snapshot.applications.length,
        }),
        run: (jobLogger) => runPipeline(createPipelineDependencies(config, profile, jobLogger)),
      }),
    { connection: redis, concurrency: 1 },
  );
  runtimeState.worker = worker;

  worker.on('error', (error) => {
    logger.error({ event: 'worker_runtime_error', queue: worker.name, error: serializeError(error) }, 'Worker runtime error');
  });

  const schedule = await schedulePipeline(queues, {
    cron: config.schedule.cron,
    bootstrapRunNow: config.schedule.bootstrapRunNow,
  });
  logger.info({ event: 'scheduler_configured', ...schedule }, 'Scheduler configured');

  let shuttingDown = false;
  const shutdown = async (signal: NodeJS.Signals): Promise<void> => {
    if (shuttingDown) {
      return;
    }

    shuttingDown = true;
    logger.info({ event: 'shutdown_requested', signal }, 'Shutdown requested');
    await cleanupRuntimeState(runtimeState);
    logger.info({ event: 'shutdown_completed', signal }, 'Shutdown completed');
    process.exit(0);
  };

  process.on('SIGINT', () => {
    void shutdown('SIGINT');
  });

  process.on('SIGTERM', () => {
    void shutdown('SIGTERM');
  });

  logger.info({ event: 'worker_started', redisUrl }, 'Worker started');
}

run().catch(async (error) => {
  await cleanupRuntimeState(runtimeState);
  const logger = createWorkerLogger();
  logger.error({ event: 'worker_fatal_error', error: serializeError(error) }, 'Worker fatal error');
  process.exit(1);
});
