/**
 * Server configuration from environment variables
 */

import { z } from 'zod';
import * as os from 'os';
import * as path from 'path';
import type { LogLevel } from '@graphdoc/shared';
import type { GraphServiceConfig } from './graph-service.js';

export function getDefaultDbPath(): string {
  return path.join(os.homedir(), '.graphdoc', 'graph.db');
}

const EnvSchema = z.object({
  GRAPH_DB_PATH: z.string().min(1).optional(),
  GRAPH_MATERIALIZER: z.enum(['walk', 'query']).default('query'),
  GRAPH_BUSY_TIMEOUT_MS: z.coerce.number().int().nonnegative().default(5000),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('info'),
});

export interface ServerConfig {
  service: GraphServiceConfig;
  logLevel: LogLevel;
}

/**
 * Validate the environment. Throws a ZodError naming the offending variable.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const parsed = EnvSchema.parse(env);

  return {
    service: {
      storage: {
        dbPath: parsed.GRAPH_DB_PATH ?? getDefaultDbPath(),
        busyTimeoutMs: parsed.GRAPH_BUSY_TIMEOUT_MS,
      },
      materializer: parsed.GRAPH_MATERIALIZER,
    },
    logLevel: parsed.LOG_LEVEL,
  };
}
