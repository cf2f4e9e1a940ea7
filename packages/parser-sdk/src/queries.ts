import { matchesRoleFamily } from './keywords.js';
import { politePause } from './pacing.js';
import type { FetchContext, FetchResult, RawPosting } from './types.js';

export interface SourceQueryTask {
  /** Human label for logs, e.g. `search "sdet"`. */
  label: string;
  run(fetchImpl: typeof fetch): Promise<RawPosting[]>;
}

/**
 * Run an adapter's queries one after another with polite pacing in between.
 * A failing query is logged and contributes zero results; the rest still run.
 * Results are filtered to the target role family and capped at `maxJobs`.
 */
export async function runSourceQueries(
  sourceId: string,
  tasks: readonly SourceQueryTask[],
  context: FetchContext,
): Promise<FetchResult> {
  const { query, logger, pacing } = context;
  const fetchImpl = context.fetchImpl ?? fetch;
  const jobs: RawPosting[] = [];
  const errors: string[] = [];

  for (const [index, task] of tasks.entries()) {
    if (jobs.length >= query.maxJobs) {
      break;
    }

    if (index > 0) {
      await politePause(pacing);
    }

    try {
      const found = await task.run(fetchImpl);
      const relevant = found.filter((job) =>
        matchesRoleFamily(job.title, job.description, query.keywords, query.titleWords),
      );
      jobs.push(...relevant);
      logger.info(`[source:${sourceId}] ${task.label}: ${relevant.length}/${found.length} relevant`);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      errors.push(`${task.label}: ${message}`);
      logger.warn(`[source:${sourceId}] ${task.label} failed: ${message}`);
    }
  }

  return { jobs: jobs.slice(0, query.maxJobs), errors };
}
