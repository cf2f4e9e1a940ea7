import type { Logger } from 'pino';

/** The `{ info, warn, error }` shape every package logs through. */
export interface ComponentLogger {
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export function createComponentLogger(logger: Logger, component: string): ComponentLogger {
  const child = logger.child({ component });
  return {
    info: (message) => child.info({ event: 'pipeline_stage' }, message),
    warn: (message) => child.warn({ event: 'pipeline_stage' }, message),
    error: (message) => child.error({ event: 'pipeline_stage' }, message),
  };
}
