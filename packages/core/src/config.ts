/**
 * Environment configuration
 */

import { z } from 'zod';
import { formatZodError } from './validation.js';
import type { ExecutionMethod } from './types.js';

const LogLevel = z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']);

const EnvSchema = z.object({
  OPGRAPH_LOG_LEVEL: LogLevel.default('info'),
  OPGRAPH_EXECUTION_METHOD: z.enum(['sequential', 'parallel']).default('sequential'),
  OPGRAPH_MAX_CONCURRENCY: z.coerce.number().int().positive().default(4),
});

export type LogLevel = z.infer<typeof LogLevel>;

export interface EngineConfig {
  logLevel: LogLevel;
  executionMethod: ExecutionMethod;
  maxConcurrency: number;
}

/**
 * Parse engine settings from environment variables
 * @throws Error listing every invalid variable
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): EngineConfig {
  const parsed = EnvSchema.safeParse({
    OPGRAPH_LOG_LEVEL: env.OPGRAPH_LOG_LEVEL || undefined,
    OPGRAPH_EXECUTION_METHOD: env.OPGRAPH_EXECUTION_METHOD || undefined,
    OPGRAPH_MAX_CONCURRENCY: env.OPGRAPH_MAX_CONCURRENCY || undefined,
  });
  if (!parsed.success) {
    throw new Error(`Invalid configuration: ${formatZodError(parsed.error)}`);
  }
  return {
    logLevel: parsed.data.OPGRAPH_LOG_LEVEL,
    executionMethod: parsed.data.OPGRAPH_EXECUTION_METHOD,
    maxConcurrency: parsed.data.OPGRAPH_MAX_CONCURRENCY,
  };
}
