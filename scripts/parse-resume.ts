import {
  ConfigurationError,
  createCompletionClient,
  createProfileStore,
  createWorkerLogger,
  importResume,
  loadPipelineConfig,
} from '../apps/worker/src/runtime.js';

async function main(): Promise<void> {
  const [resumePath] = process.argv.slice(2);
  if (!resumePath) {
    throw new ConfigurationError('Usage: npm run parse-resume -- <resume.pdf>');
  }

  const config = await loadPipelineConfig();
  const profile = await importResume({
    resumePath,
    completion: createCompletionClient(config),
    store: createProfileStore(config.profilePath),
    logger: createWorkerLogger(),
  });

  console.log(`profile for ${profile.personal.name} written to ${config.profilePath}`);
}

main().catch((error) => {
  console.error(error);
  process.exit(1);
});
