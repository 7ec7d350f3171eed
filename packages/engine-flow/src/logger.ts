import { pino, type Logger } from 'pino';

export type { Logger };

export interface LoggerOptions {
  level?: string;
  name?: string;
}

/** Root logger. Flows derive a child bound to their proposal id. */
export function createLogger(options: LoggerOptions = {}): Logger {
  return pino({
    name: options.name ?? 'deal-desk',
    level: options.level ?? 'info',
  });
}
