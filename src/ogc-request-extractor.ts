// ABOUTME: Classifies a parsed log record against an OGC service dialect
// ABOUTME: Reads SERVICE/REQUEST/VERSION and the dialect's resource parameter from the KVP query string

import { findOperation } from './service-dialects.js';
import type {
  ExtractionResult,
  LogRecord,
  OGCRequest,
  ServiceDialectSpec,
  UnmatchedReason,
} from './types.js';

export interface ExtractOptions {
  endpoint?: string;
}

function unmatched(reason: UnmatchedReason): ExtractionResult {
  return { matched: false, reason };
}

/**
 * Split a request target into path and query, e.g. "/ows?SERVICE=WMS" → ["/ows", "SERVICE=WMS"]
 */
export function splitTarget(target: string): { path: string; query: string | null } {
  const index = target.indexOf('?');
  if (index === -1) {
    return { path: target, query: null };
  }
  return { path: target.substring(0, index), query: target.substring(index + 1) };
}

/**
 * Parse a KVP query string into upper-cased parameter names.
 * The first occurrence of a repeated parameter wins.
 */
export function parseKvp(query: string): Map<string, string> {
  const kvp = new Map<string, string>();
  for (const [key, value] of new URLSearchParams(query)) {
    const name = key.trim().toUpperCase();
    if (name.length > 0 && !kvp.has(name)) {
      kvp.set(name, value);
    }
  }
  return kvp;
}

/**
 * Split a resource parameter value on the operation's separator.
 * Tokens are trimmed; empty and repeated tokens are dropped.
 */
export function splitResources(value: string, separator: string | null): string[] {
  const tokens = separator === null ? [value] : value.split(separator);
  const resources: string[] = [];
  for (const token of tokens) {
    const resource = token.trim();
    if (resource.length > 0 && !resources.includes(resource)) {
      resources.push(resource);
    }
  }
  return resources;
}

export function extractOgcRequest(
  record: LogRecord,
  dialect: ServiceDialectSpec,
  options: ExtractOptions = {}
): ExtractionResult {
  const { path, query } = splitTarget(record.target);

  if (options.endpoint !== undefined && path !== options.endpoint) {
    return unmatched('endpoint');
  }

  if (query === null || query.length === 0) {
    // XML-encoded POST requests carry everything in the body
    return unmatched(record.method.toUpperCase() === 'POST' ? 'post-body' : 'no-query');
  }

  const kvp = parseKvp(query);

  const service = kvp.get('SERVICE')?.trim().toUpperCase();
  if (service === undefined || (service !== dialect.service && !dialect.aliases.includes(service))) {
    return unmatched('service');
  }

  const requestValue = kvp.get('REQUEST');
  const operation = requestValue === undefined ? undefined : findOperation(dialect, requestValue);
  if (!operation) {
    return unmatched('operation');
  }

  let resources: string[] = [];
  for (const param of operation.spec.resourceParams) {
    const value = kvp.get(param);
    if (value !== undefined) {
      resources = splitResources(value, operation.spec.separator);
      break;
    }
  }

  const request: OGCRequest = {
    service: dialect.service,
    operation: operation.name,
    resources,
    timestamp: record.timestamp,
    clientAddress: record.clientAddress,
    method: record.method,
    status: record.status,
    size: record.size,
  };

  const version = kvp.get('VERSION') ?? kvp.get('ACCEPTVERSIONS');
  if (version !== undefined && version.length > 0) {
    request.version = version;
  }
  if (record.userAgent !== undefined) {
    request.userAgent = record.userAgent;
  }

  return { matched: true, request };
}
