import pino, { type LevelWithSilent, type Logger } from 'pino';
import type { Env } from '../config.js';

const DEFAULT_LOG_LEVEL: LevelWithSilent = 'info';
const DEFAULT_SERVICE_NAME = 'jobhound-worker';
const LOG_LEVELS: readonly LevelWithSilent[] = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'];

function readLogLevel(env: Env): LevelWithSilent {
  const raw = env.LOG_LEVEL?.trim().toLowerCase();
  return LOG_LEVELS.find((level) => level === raw) ?? DEFAULT_LOG_LEVEL;
}

export function createWorkerLogger(env: Env = process.env): Logger {
  const service = env.LOG_SERVICE_NAME?.trim() || DEFAULT_SERVICE_NAME;

  return pino({
    level: readLogLevel(env),
    base: { service },
    timestamp: () => `,"ts":"${new Date().toISOString()}"`,
    formatters: {
      level: (label) => ({ level: label }),
    },
    messageKey: 'message',
  });
}
