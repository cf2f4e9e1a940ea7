import { readFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import { candidateProfileSchema, type CandidateProfile } from '@jobhound/matcher';
import { z } from 'zod';

const DEFAULT_CONFIG_PATH = 'config/config.json';
const PLACEHOLDER_API_KEY = 'YOUR_GEMINI_API_KEY_HERE';

/** Raised before any side effect when the run cannot be configured. */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

const credentialsSchema = z.object({
  email: z.string().min(1),
  password: z.string().min(1),
});

export const pipelineConfigSchema = z.object({
  minMatchScore: z.number().int().min(0).max(100).default(60),
  dedupWindowDays: z.number().int().positive().default(7),
  maxJobsPerSource: z.number().int().positive().default(50),
  /** Role-family keywords; the built-in QA list when absent. */
  keywords: z.array(z.string().min(1)).optional(),
  /** Short words matched in titles only; the built-in QA list when absent. */
  titleWords: z.array(z.string().min(1)).optional(),
  disabledSources: z.array(z.string()).default([]),
  dataDir: z.string().default('data'),
  profilePath: z.string().default('config/profile.json'),
  schedule: z
    .object({
      cron: z.string().default('30 3 * * *'),
      bootstrapRunNow: z.boolean().default(false),
    })
    .default({}),
  ai: z
    .object({
      apiKey: z.string().default(''),
      model: z.string().default('gemini-2.0-flash'),
      timeoutMs: z.number().int().positive().default(30_000),
      chunkSize: z.number().int().positive().default(10),
      pauseMs: z.number().int().nonnegative().default(3000),
    })
    .default({}),
  enrichment: z
    .object({
      enabled: z.boolean().default(false),
      maxPostings: z.number().int().positive().default(20),
      minLength: z.number().int().positive().default(100),
    })
    .default({}),
  browser: z
    .object({
      executablePath: z.string().optional(),
      channel: z.string().optional(),
    })
    .default({}),
  autoApply: z
    .object({
      enabled: z.boolean().default(false),
      maxApplicationsPerRun: z.number().int().positive().default(10),
      minMatchScore: z.number().int().min(0).max(100).default(75),
      resumePath: z.string().optional(),
      pauseMs: z.number().int().nonnegative().default(5000),
      // Visible by default so a human can get past a captcha.
      headless: z.boolean().default(false),
    })
    .default({}),
  credentials: z
    .object({
      linkedin: credentialsSchema.optional(),
    })
    .default({}),
});

export type PipelineConfig = z.infer<typeof pipelineConfigSchema>;

export type Env = Record<string, string | undefined>;

export interface IntRange {
  min?: number;
  max?: number;
}

/** Integers outside `range` (default: 1 and up) fall back. */
export function readIntEnv(env: Env, name: string, fallback: number, range: IntRange = {}): number {
  const raw = env[name]?.trim();
  if (!raw) {
    return fallback;
  }

  const parsed = Number(raw);
  if (!Number.isFinite(parsed)) {
    return fallback;
  }

  const value = Math.floor(parsed);
  const { min = 1, max = Number.MAX_SAFE_INTEGER } = range;
  return value >= min && value <= max ? value : fallback;
}

const SCORE_RANGE: IntRange = { min: 0, max: 100 };

export function readBoolEnv(env: Env, name: string, fallback: boolean): boolean {
  const raw = env[name];
  if (!raw) {
    return fallback;
  }

  const normalized = raw.trim().toLowerCase();
  if (normalized === '1' || normalized === 'true' || normalized === 'yes' || normalized === 'on') {
    return true;
  }

  if (normalized === '0' || normalized === 'false' || normalized === 'no' || normalized === 'off') {
    return false;
  }

  return fallback;
}

function readStringEnv(env: Env, name: string): string | undefined {
  const value = env[name]?.trim();
  return value ? value : undefined;
}

function describeIssues(error: z.ZodError): string {
  return error.issues
    .slice(0, 3)
    .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    .join('; ');
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

async function readJsonFile(path: string, label: string): Promise<unknown | undefined> {
  let raw: string;
  try {
    raw = await readFile(path, 'utf8');
  } catch (error) {
    if (isMissingFile(error)) {
      return undefined;
    }
    throw error;
  }

  try {
    return JSON.parse(raw);
  } catch (error) {
    const detail = error instanceof Error ? error.message : String(error);
    throw new ConfigurationError(`${label} at ${path} is not valid JSON: ${detail}`);
  }
}

function applyEnvOverrides(config: PipelineConfig, env: Env): PipelineConfig {
  const email = readStringEnv(env, 'LINKEDIN_EMAIL');
  const password = readStringEnv(env, 'LINKEDIN_PASSWORD');
  const linkedin = email && password ? { email, password } : config.credentials.linkedin;

  return {
    ...config,
    minMatchScore: readIntEnv(env, 'JOBHOUND_MIN_MATCH_SCORE', config.minMatchScore, SCORE_RANGE),
    dedupWindowDays: readIntEnv(env, 'JOBHOUND_DEDUP_WINDOW_DAYS', config.dedupWindowDays),
    maxJobsPerSource: readIntEnv(env, 'JOBHOUND_MAX_JOBS_PER_SOURCE', config.maxJobsPerSource),
    dataDir: readStringEnv(env, 'JOBHOUND_DATA_DIR') ?? config.dataDir,
    profilePath: readStringEnv(env, 'JOBHOUND_PROFILE') ?? config.profilePath,
    schedule: {
      ...config.schedule,
      cron: readStringEnv(env, 'JOBHOUND_SCHEDULE_CRON') ?? config.schedule.cron,
      bootstrapRunNow: readBoolEnv(env, 'JOBHOUND_BOOTSTRAP_RUN_NOW', config.schedule.bootstrapRunNow),
    },
    ai: {
      ...config.ai,
      apiKey: readStringEnv(env, 'GEMINI_API_KEY') ?? config.ai.apiKey,
      model: readStringEnv(env, 'GEMINI_MODEL') ?? config.ai.model,
    },
    enrichment: {
      ...config.enrichment,
      enabled: readBoolEnv(env, 'JOBHOUND_ENRICH', config.enrichment.enabled),
    },
    browser: {
      ...config.browser,
      executablePath: readStringEnv(env, 'CHROMIUM_PATH') ?? config.browser.executablePath,
    },
    autoApply: {
      ...config.autoApply,
      enabled: readBoolEnv(env, 'JOBHOUND_AUTO_APPLY', config.autoApply.enabled),
      resumePath: readStringEnv(env, 'JOBHOUND_RESUME_PATH') ?? config.autoApply.resumePath,
    },
    credentials: { ...config.credentials, linkedin },
  };
}

export interface LoadPipelineConfigOptions {
  /** Defaults to `JOBHOUND_CONFIG`, then `config/config.json`. */
  path?: string;
  env?: Env;
}

/**
 * Build the run configuration once: JSON file, then environment overrides.
 * A missing default file is fine; a missing explicit one is not.
 */
export async function loadPipelineConfig(options: LoadPipelineConfigOptions = {}): Promise<PipelineConfig> {
  const env = options.env ?? process.env;
  const explicitPath = options.path ?? readStringEnv(env, 'JOBHOUND_CONFIG');
  const path = resolve(explicitPath ?? DEFAULT_CONFIG_PATH);

  const raw = await readJsonFile(path, 'Config file');
  if (raw === undefined && explicitPath) {
    throw new ConfigurationError(`Config file not found at ${path}`);
  }

  const parsed = pipelineConfigSchema.safeParse(raw ?? {});
  if (!parsed.success) {
    throw new ConfigurationError(`Config file at ${path} is invalid: ${describeIssues(parsed.error)}`);
  }

  const config = applyEnvOverrides(parsed.data, env);
  if (!config.ai.apiKey || config.ai.apiKey === PLACEHOLDER_API_KEY) {
    throw new ConfigurationError('Gemini API key is not set (ai.apiKey or GEMINI_API_KEY)');
  }

  return config;
}

export async function loadCandidateProfile(path: string): Promise<CandidateProfile> {
  const absolute = resolve(path);
  const raw = await readJsonFile(absolute, 'Candidate profile');
  if (raw === undefined) {
    throw new ConfigurationError(`Candidate profile not found at ${absolute}`);
  }

  const parsed = candidateProfileSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigurationError(`Candidate profile at ${absolute} is invalid: ${describeIssues(parsed.error)}`);
  }

  return parsed.data;
}
