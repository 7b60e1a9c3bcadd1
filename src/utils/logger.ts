import { pino, type Logger } from 'pino';
import { loadEnvConfig } from '../config/env.js';

export type { Logger };

export const logger: Logger = pino({
  name: 'llm-catalog-translator',
  level: loadEnvConfig().logLevel,
});

export function createLogger(component: string): Logger {
  return logger.child({ component });
}
