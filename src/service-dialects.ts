// ABOUTME: Process-wide table of supported OGC service dialects (WMS, WFS, WCS, WPS, WMTS, CSW)
// ABOUTME: Loaded once from data/service-dialects.json, validated with zod and frozen for shared read-only use

import { readFileSync } from 'fs';
import { z } from 'zod';
import { ConfigurationError } from './errors.js';
import type { OperationSpec, ServiceDialectSpec } from './types.js';

const OperationSpecSchema = z.object({
  resourceParams: z.array(z.string().min(1)),
  separator: z.string().min(1).nullable(),
});

const ServiceDialectSchema = z.object({
  service: z.string().min(1),
  aliases: z.array(z.string()),
  title: z.string(),
  operations: z.record(OperationSpecSchema),
});

const DialectTableSchema = z.array(ServiceDialectSchema).min(1);

function loadDialects(): readonly ServiceDialectSpec[] {
  const raw: unknown = JSON.parse(
    readFileSync(new URL('./data/service-dialects.json', import.meta.url), 'utf-8')
  );
  const table = DialectTableSchema.parse(raw);

  return Object.freeze(table.map(dialect => {
    const operations: Record<string, OperationSpec> = {};
    for (const [name, op] of Object.entries(dialect.operations)) {
      operations[name] = Object.freeze({
        resourceParams: Object.freeze(op.resourceParams.map(p => p.toUpperCase())),
        separator: op.separator,
      });
    }
    return Object.freeze({
      service: dialect.service.toUpperCase(),
      aliases: Object.freeze(dialect.aliases.map(a => a.toUpperCase())),
      title: dialect.title,
      operations: Object.freeze(operations),
    });
  }));
}

export const SERVICE_DIALECTS: readonly ServiceDialectSpec[] = loadDialects();

/**
 * Look up a dialect by canonical name or alias ("WMS", "wms", "OGC:WMS")
 */
export function findDialect(serviceType: string): ServiceDialectSpec | undefined {
  const wanted = serviceType.trim().toUpperCase();
  return SERVICE_DIALECTS.find(d => d.service === wanted || d.aliases.includes(wanted));
}

export function getDialect(serviceType: string): ServiceDialectSpec {
  const dialect = findDialect(serviceType);
  if (!dialect) {
    const known = SERVICE_DIALECTS.map(d => d.service).join(', ');
    throw new ConfigurationError(`Unknown service type "${serviceType}" (supported: ${known})`);
  }
  return dialect;
}

/**
 * Case-insensitive operation lookup, returning the dialect's canonical spelling
 */
export function findOperation(
  dialect: ServiceDialectSpec,
  requestValue: string
): { name: string; spec: OperationSpec } | undefined {
  const wanted = requestValue.trim().toLowerCase();
  for (const [name, spec] of Object.entries(dialect.operations)) {
    if (name.toLowerCase() === wanted) {
      return { name, spec };
    }
  }
  return undefined;
}
