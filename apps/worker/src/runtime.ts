import { join } from 'node:path';
import { applicationLedgerDocumentSchema, emptyApplicationLedger } from '@jobhound/apply';
import { launchBrowserSession } from '@jobhound/browser';
import { dedupLedgerDocumentSchema, emptyDedupLedger } from '@jobhound/ingestion';
import { GeminiCompletionClient, type CandidateProfile, type CompletionClient } from '@jobhound/matcher';
import { JsonFileDocumentStore } from '@jobhound/store';
import type { Logger } from 'pino';
import type { PipelineConfig } from './config.js';
import type { PipelineDependencies } from './pipeline.js';
import { createSnapshotStores } from './snapshot.js';
import { getEnabledAdapters } from './sources.js';

export { ConfigurationError, loadCandidateProfile, loadPipelineConfig } from './config.js';
export type { PipelineConfig } from './config.js';
export { createWorkerLogger } from './observability/logger.js';
export { runPipeline } from './pipeline.js';
export { createProfileStore, importResume } from './resume.js';
export type { PipelineDependencies, PipelineRunResult } from './pipeline.js';
export type { RunSnapshot } from './snapshot.js';

export function createCompletionClient(config: PipelineConfig): CompletionClient {
  return new GeminiCompletionClient({
    apiKey: config.ai.apiKey,
    model: config.ai.model,
    timeoutMs: config.ai.timeoutMs,
  });
}

/** Wire the production collaborators: JSON ledgers in the data dir, Gemini, Chromium. */
export function createPipelineDependencies(
  config: PipelineConfig,
  profile: CandidateProfile,
  logger: Logger,
  now: () => Date = () => new Date(),
): PipelineDependencies {
  return {
    config,
    profile,
    adapters: getEnabledAdapters(config.disabledSources),
    completion: createCompletionClient(config),
    dedupStore: new JsonFileDocumentStore({
      path: join(config.dataDir, 'seen_jobs.json'),
      schema: dedupLedgerDocumentSchema,
      empty: emptyDedupLedger,
    }),
    applicationStore: new JsonFileDocumentStore({
      path: join(config.dataDir, 'applied_jobs.json'),
      schema: applicationLedgerDocumentSchema,
      empty: emptyApplicationLedger,
    }),
    snapshotStores: createSnapshotStores(config.dataDir, now()),
    openBrowser: ({ headless }) =>
      launchBrowserSession({
        headless,
        executablePath: config.browser.executablePath,
        channel: config.browser.channel,
      }),
    logger,
    now,
  };
}
