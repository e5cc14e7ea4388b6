// ABOUTME: Renders analysis reports as plain text or JSON-ready objects
// ABOUTME: Text layout lists visitors, operations, requested data and user agents with "top N of M" headings

import type { AnalysisReport, RankedEntry, ResolvedHost } from './types.js';

function formatTime(ms: number): string {
  return new Date(ms).toISOString().replace('.000Z', 'Z');
}

function section(title: string, shown: number, total: number): string {
  return `${title} (showing top ${shown} of ${total}):`;
}

function entryLines(entries: RankedEntry[], label: (key: string) => string = key => key): string[] {
  return entries.map(entry => `    ${label(entry.key)}: ${entry.count}`);
}

export function formatReport(report: AnalysisReport): string {
  const { result } = report;
  const title = `OGC Usage Analysis (${report.service})`;
  const lines: string[] = [title, '='.repeat(title.length), ''];

  lines.push(`Logfile: ${report.sources.join(', ')}`, '');

  if (result.period) {
    lines.push(`Period: ${formatTime(result.period.start)} - ${formatTime(result.period.end)}`, '');
  }

  lines.push(`Total requests: ${result.totalAccepted}`);
  lines.push(`Total bytes transferred: ${result.totalBytes}`, '');

  const hostnames = new Map<string, ResolvedHost>();
  report.hosts?.forEach(host => hostnames.set(host.address, host));
  const clientLabel = (address: string): string => {
    const host = hostnames.get(address);
    if (!host) {
      return address;
    }
    return `${address} (${host.hostname ?? 'unresolved'})`;
  };

  lines.push(section('Unique visitors', result.clients.length, result.distinctClients));
  lines.push(...entryLines(result.clients, clientLabel), '');

  lines.push(`Requests (${result.totalAccepted}):`);
  lines.push(...entryLines(result.requests), '');

  lines.push(section('Requested data', result.resources.length, result.distinctResources));
  lines.push(...entryLines(result.resources));
  if (result.noResourceRequests > 0) {
    lines.push(`    (no resource): ${result.noResourceRequests}`);
  }
  lines.push('');

  if (result.distinctUserAgents > 0) {
    lines.push(section('User agents', result.userAgents.length, result.distinctUserAgents));
    lines.push(...entryLines(result.userAgents), '');
  }

  lines.push(`Skipped (malformed) lines: ${report.skippedLines}`);
  lines.push(`Unmatched lines: ${report.unmatchedLines}`);
  lines.push(`Outside time window: ${report.outsideWindowLines}`);

  return lines.join('\n');
}

export interface JsonReport {
  service: string;
  sources: string[];
  period: { start: string; end: string } | null;
  totalRequests: number;
  totalRejected: number;
  totalBytes: number;
  noResourceRequests: number;
  skippedLines: number;
  unmatchedLines: number;
  outsideWindowLines: number;
  skipReasons: AnalysisReport['skipReasons'];
  unmatchedReasons: AnalysisReport['unmatchedReasons'];
  clients: Array<RankedEntry & { hostname?: string | null }>;
  distinctClients: number;
  resources: RankedEntry[];
  distinctResources: number;
  requests: RankedEntry[];
  userAgents: RankedEntry[];
}

export function toJsonReport(report: AnalysisReport): JsonReport {
  const { result } = report;
  const hostnames = new Map(report.hosts?.map(host => [host.address, host.hostname] as const));

  return {
    service: report.service,
    sources: report.sources,
    period: result.period
      ? { start: formatTime(result.period.start), end: formatTime(result.period.end) }
      : null,
    totalRequests: result.totalAccepted,
    totalRejected: result.totalRejected,
    totalBytes: result.totalBytes,
    noResourceRequests: result.noResourceRequests,
    skippedLines: report.skippedLines,
    unmatchedLines: report.unmatchedLines,
    outsideWindowLines: report.outsideWindowLines,
    skipReasons: report.skipReasons,
    unmatchedReasons: report.unmatchedReasons,
    clients: result.clients.map(entry =>
      report.hosts ? { ...entry, hostname: hostnames.get(entry.key) ?? null } : { ...entry }
    ),
    distinctClients: result.distinctClients,
    resources: result.resources,
    distinctResources: result.distinctResources,
    requests: result.requests,
    userAgents: result.userAgents,
  };
}
