import type { Job } from 'bullmq';
import type { Logger } from 'pino';
import { traceJob, type TraceableData } from './trace.js';

interface SerializedError {
  name?: string;
  message: string;
  stack?: string;
}

export function serializeError(error: unknown): SerializedError {
  if (error instanceof Error) {
    return { name: error.name, message: error.message, stack: error.stack };
  }

  return { message: String(error) };
}

function waitMsSince(timestamp: number): number | undefined {
  return Number.isFinite(timestamp) && timestamp > 0 ? Math.max(0, Date.now() - timestamp) : undefined;
}

export interface WithLoggerOptions<TData extends TraceableData, TResult> {
  logger: Logger;
  queue: string;
  job: Job<TData>;
  context?: (traceId: string) => Record<string, unknown>;
  summary?: (result: TResult) => Record<string, unknown>;
  /** Receives a child logger bound to the job, so every line of the run carries its trace id. */
  run: (logger: Logger) => Promise<TResult>;
}

/**
 * Bracket a queue job with `job_started` and `job_completed` / `job_failed`
 * events. Errors are logged and rethrown for bullmq to record.
 */
export async function withLogger<TData extends TraceableData, TResult>({
  logger,
  queue,
  job,
  context,
  summary,
  run,
}: WithLoggerOptions<TData, TResult>): Promise<TResult> {
  const traceId = traceJob(job);
  const jobLogger = logger.child({
    queue,
    jobName: job.name,
    jobId: String(job.id ?? 'unknown'),
    attempt: job.attemptsMade + 1,
    traceId,
    ...context?.(traceId),
  });
  const startedAt = performance.now();
  const elapsed = () => Math.round(performance.now() - startedAt);

  jobLogger.info({ event: 'job_started', waitMs: waitMsSince(job.timestamp) }, 'Job started');

  let result: TResult;
  try {
    result = await run(jobLogger);
  } catch (error) {
    jobLogger.error({ event: 'job_failed', durationMs: elapsed(), error: serializeError(error) }, 'Job failed');
    throw error;
  }

  jobLogger.info({ event: 'job_completed', durationMs: elapsed(), ...summary?.(result) }, 'Job completed');
  return result;
}
