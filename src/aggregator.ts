// ABOUTME: Accumulates classified OGC requests into per-client, per-resource and per-operation counts
// ABOUTME: Produces deterministic top-N rankings and merges aggregations computed on separate inputs

import type {
  AggregationResult,
  AggregationSnapshot,
  AnalysisPeriod,
  OGCRequest,
  RankedEntry,
} from './types.js';

function increment(counts: Map<string, number>, key: string, by = 1): void {
  counts.set(key, (counts.get(key) ?? 0) + by);
}

function compareKeys(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * Rank counts by count descending, ties broken by ascending key.
 * topN of 0 or undefined keeps every key.
 */
export function rankCounts(counts: ReadonlyMap<string, number>, topN?: number): RankedEntry[] {
  const ranked = Array.from(counts, ([key, count]) => ({ key, count }))
    .sort((a, b) => b.count - a.count || compareKeys(a.key, b.key));

  return topN && topN > 0 ? ranked.slice(0, topN) : ranked;
}

function mergePeriod(a: AnalysisPeriod | null, b: AnalysisPeriod | null): AnalysisPeriod | null {
  if (!a) return b ? { ...b } : null;
  if (!b) return { ...a };
  return { start: Math.min(a.start, b.start), end: Math.max(a.end, b.end) };
}

export function emptySnapshot(): AggregationSnapshot {
  return {
    totalAccepted: 0,
    totalRejected: 0,
    noResourceRequests: 0,
    totalBytes: 0,
    period: null,
    clients: new Map(),
    resources: new Map(),
    requests: new Map(),
    userAgents: new Map(),
  };
}

export class Aggregator {
  private readonly state: AggregationSnapshot = emptySnapshot();

  observe(request: OGCRequest): void {
    const { state } = this;

    state.totalAccepted++;
    state.totalBytes += request.size;
    increment(state.clients, request.clientAddress);
    increment(state.requests, request.operation);

    if (request.resources.length === 0) {
      state.noResourceRequests++;
    }
    for (const resource of request.resources) {
      increment(state.resources, resource);
    }

    if (request.userAgent !== undefined) {
      increment(state.userAgents, request.userAgent);
    }

    state.period = state.period
      ? {
          start: Math.min(state.period.start, request.timestamp),
          end: Math.max(state.period.end, request.timestamp),
        }
      : { start: request.timestamp, end: request.timestamp };
  }

  /**
   * Count a line that parsed but was not accepted (unmatched or outside the time window)
   */
  recordRejected(count = 1): void {
    this.state.totalRejected += count;
  }

  get totalAccepted(): number {
    return this.state.totalAccepted;
  }

  snapshot(): AggregationSnapshot {
    return mergeAggregations(this.state);
  }

  finalize(topN?: number): AggregationResult {
    return finalizeSnapshot(this.state, topN);
  }
}

export function finalizeSnapshot(snapshot: AggregationSnapshot, topN?: number): AggregationResult {
  return {
    totalAccepted: snapshot.totalAccepted,
    totalRejected: snapshot.totalRejected,
    noResourceRequests: snapshot.noResourceRequests,
    totalBytes: snapshot.totalBytes,
    period: snapshot.period ? { ...snapshot.period } : null,
    distinctClients: snapshot.clients.size,
    distinctResources: snapshot.resources.size,
    distinctUserAgents: snapshot.userAgents.size,
    clients: rankCounts(snapshot.clients, topN),
    resources: rankCounts(snapshot.resources, topN),
    // operations are few; always reported in full
    requests: rankCounts(snapshot.requests),
    userAgents: rankCounts(snapshot.userAgents, topN),
  };
}

/**
 * Sum the counters of any number of snapshots into a new one
 */
export function mergeAggregations(...snapshots: AggregationSnapshot[]): AggregationSnapshot {
  const merged = emptySnapshot();

  for (const snapshot of snapshots) {
    merged.totalAccepted += snapshot.totalAccepted;
    merged.totalRejected += snapshot.totalRejected;
    merged.noResourceRequests += snapshot.noResourceRequests;
    merged.totalBytes += snapshot.totalBytes;
    merged.period = mergePeriod(merged.period, snapshot.period);

    for (const [key, count] of snapshot.clients) increment(merged.clients, key, count);
    for (const [key, count] of snapshot.resources) increment(merged.resources, key, count);
    for (const [key, count] of snapshot.requests) increment(merged.requests, key, count);
    for (const [key, count] of snapshot.userAgents) increment(merged.userAgents, key, count);
  }

  return merged;
}
