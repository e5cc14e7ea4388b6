// ABOUTME: Validates analysis requests coming from the CLI or MCP tools with zod
// ABOUTME: Turns raw options into typed pipeline options (dialect, time window, top-N, resolver)

import { z } from 'zod';
import type { AnalyzeFilesOptions } from './analysis-pipeline.js';
import type { AppConfig } from './config.js';
import { ConfigurationError } from './errors.js';
import { IPResolver } from './ip-resolver.js';
import { getDialect } from './service-dialects.js';
import { parseTimeWindow } from './time-window.js';

export const AnalysisRequestSchema = z.object({
  files: z.array(z.string().min(1)).default([]),
  serviceType: z.string().min(1).default('WMS'),
  endpoint: z.string().min(1).optional(),
  time: z.string().min(1).optional(),
  top: z.coerce.number().int().min(0).optional(),
  resolveIps: z.boolean().default(false),
  parallel: z.boolean().default(false),
  format: z.enum(['text', 'json']).default('text'),
});

export type AnalysisRequest = z.infer<typeof AnalysisRequestSchema>;

export function parseAnalysisRequest(input: unknown): AnalysisRequest {
  const parsed = AnalysisRequestSchema.safeParse(input);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map(issue => `${issue.path.join('.') || 'request'}: ${issue.message}`)
      .join('; ');
    throw new ConfigurationError(`Invalid analysis options: ${issues}`);
  }
  return parsed.data;
}

export function toPipelineOptions(request: AnalysisRequest, config: AppConfig): AnalyzeFilesOptions {
  const options: AnalyzeFilesOptions = {
    dialect: getDialect(request.serviceType),
    topN: request.top ?? config.top,
    resolveIps: request.resolveIps,
    parallel: request.parallel,
  };

  if (request.endpoint !== undefined) {
    options.endpoint = request.endpoint;
  }
  if (request.time !== undefined) {
    options.timeWindow = parseTimeWindow(request.time);
  }
  if (request.resolveIps) {
    options.resolver = new IPResolver({
      concurrency: config.resolveConcurrency,
      timeoutMs: config.resolveTimeoutMs,
    });
    options.runTimeoutMs = config.runTimeoutMs;
  }

  return options;
}
