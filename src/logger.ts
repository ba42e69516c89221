import pino, { type DestinationStream, type Logger } from 'pino';
import { loadConfig, type LogLevel } from './config';

export type { Logger } from 'pino';

export interface LoggerOptions {
  /** Module name bound to every line, e.g. 'table' or 'catalog'. */
  component: string;
  /** Defaults to HEAPFORM_LOG_LEVEL. */
  level?: LogLevel;
  /** Extra context bound to every line. */
  base?: Record<string, unknown>;
}

/**
 * Create a pino logger for one heapform component.
 *
 * Structured JSON with ISO timestamps; the service name is always bound so
 * lines from an embedding application can be filtered.
 */
export function createLogger(options: LoggerOptions, destination?: DestinationStream): Logger {
  const level = options.level ?? loadConfig().logLevel;
  const pinoOptions = {
    level,
    base: { service: 'heapform', component: options.component, ...options.base },
    timestamp: pino.stdTimeFunctions.isoTime,
  };
  return destination ? pino(pinoOptions, destination) : pino(pinoOptions);
}

const defaults = new Map<string, Logger>();

/**
 * Shared logger for `component`, created on first use so HEAPFORM_LOG_LEVEL
 * is read once rather than per Table or Catalog.
 */
export function defaultLogger(component: string): Logger {
  let log = defaults.get(component);
  if (log === undefined) {
    log = createLogger({ component });
    defaults.set(component, log);
  }
  return log;
}
