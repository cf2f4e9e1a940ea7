import type { Job } from 'bullmq';
import { describe, expect, it } from 'vitest';
import { ensureTraceId, traceJob } from '../../src/observability/trace.js';

describe('ensureTraceId', () => {
  it('returns existing trace id as-is', () => {
    expect(ensureTraceId('trace-123')).toBe('trace-123');
  });

  it('creates a trace id when value is missing or blank', () => {
    expect(ensureTraceId()).toMatch(/^[0-9a-f-]{36}$/i);
    expect(ensureTraceId('   ')).toMatch(/^[0-9a-f-]{36}$/i);
  });
});

describe('traceJob', () => {
  it('stamps the job once and reuses the id on retries', () => {
    const job = { data: { trigger: 'manual' } } as Job<{ trigger: string; traceId?: string }>;

    const first = traceJob(job);
    const second = traceJob(job);

    expect(job.data.traceId).toBe(first);
    expect(second).toBe(first);
  });
});
