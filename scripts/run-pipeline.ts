import {
  createPipelineDependencies,
  createWorkerLogger,
  loadCandidateProfile,
  loadPipelineConfig,
  runPipeline,
} from '../apps/worker/src/runtime.js';

async function main(): Promise<void> {
  const logger = createWorkerLogger();
  const config = await loadPipelineConfig();
  const profile = await loadCandidateProfile(config.profilePath);

  const { snapshot } = await runPipeline(createPipelineDependencies(config, profile, logger));

  console.log(
    `scraped ${snapshot.totalScraped}, new ${snapshot.totalNew}, matched ${snapshot.totalMatched} ` +
      `(${snapshot.stats.excellent} excellent, ${snapshot.stats.good} good), applications ${snapshot.applications.length}`,
  );
}

main().catch((error) => {
  console.error(error);
  process.exit(1);
});
