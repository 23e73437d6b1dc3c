import { z } from 'zod';
import { formatZodError } from '@opgraph/core';

const EnvSchema = z.object({
  OPGRAPH_MANAGER_PORT: z.coerce.number().int().min(0).max(65535).default(4100),
  OPGRAPH_MANAGER_API_PATH: z.string().startsWith('/').default('/api'),
});

export interface ManagerServerConfig {
  port: number;
  apiPath: string;
}

/**
 * Parse HTTP server settings from environment variables
 */
export function loadManagerConfig(env: NodeJS.ProcessEnv = process.env): ManagerServerConfig {
  const parsed = EnvSchema.safeParse({
    OPGRAPH_MANAGER_PORT: env.OPGRAPH_MANAGER_PORT || undefined,
    OPGRAPH_MANAGER_API_PATH: env.OPGRAPH_MANAGER_API_PATH || undefined,
  });
  if (!parsed.success) {
    throw new Error(`Invalid configuration: ${formatZodError(parsed.error)}`);
  }
  return {
    port: parsed.data.OPGRAPH_MANAGER_PORT,
    apiPath: parsed.data.OPGRAPH_MANAGER_API_PATH,
  };
}
