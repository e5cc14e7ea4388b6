// ABOUTME: TypeScript type definitions for the OGC usage analyzer
// ABOUTME: Log records, service dialects, extracted requests, time windows and aggregation results

export interface LogRecord {
  clientAddress: string;
  timestamp: number;  // epoch ms (UTC instant)
  utcOffsetMinutes: number;
  method: string;
  target: string;     // path + query string as logged
  protocol: string;
  status: number;
  size: number;       // 0 when logged as "-"
  referer?: string;
  userAgent?: string;
}

export type SkipReason = 'empty-line' | 'layout' | 'timestamp' | 'status' | 'size';

export type ParseResult =
  | { ok: true; record: LogRecord }
  | { ok: false; reason: SkipReason; detail: string };

export interface OperationSpec {
  resourceParams: readonly string[];
  separator: string | null;
}

export interface ServiceDialectSpec {
  service: string;
  aliases: readonly string[];
  title: string;
  operations: Readonly<Record<string, OperationSpec>>;
}

export interface OGCRequest {
  service: string;
  operation: string;
  version?: string;
  resources: string[];
  timestamp: number;
  clientAddress: string;
  method: string;
  status: number;
  size: number;
  userAgent?: string;
}

export type UnmatchedReason = 'endpoint' | 'no-query' | 'service' | 'operation' | 'post-body';

export type ExtractionResult =
  | { matched: true; request: OGCRequest }
  | { matched: false; reason: UnmatchedReason };

export interface TimeBound {
  granularity: 'date' | 'datetime';
  // local: compared against the record's wall clock in its own offset
  reference: 'local' | 'absolute';
  lowerMs: number;
  upperMs: number;
}

export interface TimeWindow {
  start?: TimeBound;
  end?: TimeBound;
}

export interface RankedEntry {
  key: string;
  count: number;
}

export interface AnalysisPeriod {
  start: number;
  end: number;
}

export interface AggregationResult {
  totalAccepted: number;
  totalRejected: number;
  noResourceRequests: number;
  totalBytes: number;
  period: AnalysisPeriod | null;
  distinctClients: number;
  distinctResources: number;
  distinctUserAgents: number;
  clients: RankedEntry[];
  resources: RankedEntry[];
  requests: RankedEntry[];
  userAgents: RankedEntry[];
}

// Raw counters, the mergeable form of an aggregation
export interface AggregationSnapshot {
  totalAccepted: number;
  totalRejected: number;
  noResourceRequests: number;
  totalBytes: number;
  period: AnalysisPeriod | null;
  clients: Map<string, number>;
  resources: Map<string, number>;
  requests: Map<string, number>;
  userAgents: Map<string, number>;
}

export interface ResolvedHost {
  address: string;
  hostname: string | null;  // null marks a failed lookup
}

export interface AnalysisReport {
  service: string;
  sources: string[];
  result: AggregationResult;
  skippedLines: number;
  unmatchedLines: number;
  outsideWindowLines: number;
  skipReasons: Partial<Record<SkipReason, number>>;
  unmatchedReasons: Partial<Record<UnmatchedReason, number>>;
  hosts?: ResolvedHost[];
}
