// ABOUTME: Environment configuration for the analyzer, loaded via dotenv and validated with zod
// ABOUTME: Supplies defaults for top-N, reverse DNS pool sizing/timeouts, log level and HTTP port

import * as dotenv from 'dotenv';
import { z } from 'zod';
import { ConfigurationError } from './errors.js';

dotenv.config();

const LogLevelSchema = z.enum(['error', 'warn', 'info', 'debug']);

export const AppConfigSchema = z.object({
  OGC_USAGE_TOP: z.coerce.number().int().min(0).default(10),
  OGC_USAGE_RESOLVE_CONCURRENCY: z.coerce.number().int().min(1).max(256).default(8),
  OGC_USAGE_RESOLVE_TIMEOUT_MS: z.coerce.number().int().min(1).max(60_000).default(2_000),
  OGC_USAGE_RUN_TIMEOUT_MS: z.coerce.number().int().min(1).max(3_600_000).default(30_000),
  LOG_LEVEL: LogLevelSchema.default('warn'),
  PORT: z.coerce.number().int().min(1).max(65_535).default(3000),
});

export interface AppConfig {
  top: number;
  resolveConcurrency: number;
  resolveTimeoutMs: number;
  runTimeoutMs: number;
  logLevel: z.infer<typeof LogLevelSchema>;
  port: number;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = AppConfigSchema.safeParse(env);

  if (!parsed.success) {
    const issues = parsed.error.issues
      .map(issue => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ConfigurationError(`Invalid environment configuration: ${issues}`);
  }

  const values = parsed.data;
  return {
    top: values.OGC_USAGE_TOP,
    resolveConcurrency: values.OGC_USAGE_RESOLVE_CONCURRENCY,
    resolveTimeoutMs: values.OGC_USAGE_RESOLVE_TIMEOUT_MS,
    runTimeoutMs: values.OGC_USAGE_RUN_TIMEOUT_MS,
    logLevel: values.LOG_LEVEL,
    port: values.PORT,
  };
}
