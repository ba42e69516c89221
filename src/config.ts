/**
 * heapform — runtime configuration
 *
 * Read once from the environment and validated with zod:
 *
 *   HEAPFORM_PAGE_SIZE   heap page size in bytes (512 … 65536, default 4096)
 *   HEAPFORM_LOG_LEVEL   pino level or 'silent' (default 'info')
 */

import { z } from 'zod';
import { DEFAULT_PAGE_SIZE, MAX_PAGE_SIZE, MIN_PAGE_SIZE } from './constants';
import { HeapformError } from './errors';

export const LOG_LEVELS = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

const EnvSchema = z.object({
  HEAPFORM_PAGE_SIZE: z.coerce
    .number()
    .int()
    .min(MIN_PAGE_SIZE)
    .max(MAX_PAGE_SIZE)
    .default(DEFAULT_PAGE_SIZE),
  HEAPFORM_LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
});

export interface HeapformConfig {
  readonly pageSize: number;
  readonly logLevel: LogLevel;
}

export function loadConfig(env: Readonly<Record<string, string | undefined>> = process.env): HeapformConfig {
  const result = EnvSchema.safeParse(env);
  if (!result.success) {
    const detail = result.error.issues
      .map(issue => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new HeapformError('CONFIG', `Invalid heapform configuration: ${detail}`, { cause: result.error });
  }
  return Object.freeze({
    pageSize: result.data.HEAPFORM_PAGE_SIZE,
    logLevel: result.data.HEAPFORM_LOG_LEVEL,
  });
}
