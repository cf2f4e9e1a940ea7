import { randomUUID } from 'node:crypto';
import type { Job } from 'bullmq';

export interface TraceableData {
  traceId?: string;
}

export function ensureTraceId(traceId?: string): string {
  return traceId?.trim() ? traceId : randomUUID();
}

/** Stamp the job with a trace id once, so retries log under the same id. */
export function traceJob<TData extends TraceableData>(job: Job<TData>): string {
  const traceId = ensureTraceId(job.data.traceId);
  job.data.traceId = traceId;
  return traceId;
}
