// packages/core/src/logger.ts
import pino, { type Logger } from 'pino';
import { getConfig } from './config';

export type { Logger };

export const logger: Logger = pino({ name: 'framebridge', level: getConfig().logLevel });

/** Child logger carrying the backend name on every line. */
export function backendLogger(backend: string): Logger {
  return logger.child({ backend });
}
