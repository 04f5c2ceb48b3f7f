import pino, { type Logger } from 'pino';
import { config } from '../config';

export type { Logger };

export const logger: Logger = pino({
  level: config.logLevel,
  base: { service: 'statute-rag-api' },
  timestamp: pino.stdTimeFunctions.isoTime,
});

/** Child logger tagged with the component that emits it. */
export function componentLogger(component: string): Logger {
  return logger.child({ component });
}
