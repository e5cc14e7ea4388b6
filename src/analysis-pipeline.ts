// ABOUTME: Runs log lines through parsing, OGC classification, time filtering and aggregation
// ABOUTME: Produces the final analysis report, optionally decorating top clients with reverse DNS names

import { Aggregator, finalizeSnapshot, mergeAggregations } from './aggregator.js';
import { IPResolver } from './ip-resolver.js';
import { openLogFiles, type LogSource } from './log-reader.js';
import { parseLogLine } from './log-record-parser.js';
import { createLogger } from './logger.js';
import { extractOgcRequest } from './ogc-request-extractor.js';
import { createTimeFilter, type TimeFilter } from './time-window.js';
import type {
  AggregationSnapshot,
  AnalysisReport,
  ServiceDialectSpec,
  SkipReason,
  TimeWindow,
  UnmatchedReason,
} from './types.js';

const log = createLogger('Pipeline');

export interface AnalysisOptions {
  dialect: ServiceDialectSpec;
  endpoint?: string;
  timeWindow?: TimeWindow;
  topN?: number;
  resolveIps?: boolean;
  resolver?: IPResolver;
  // deadline for all reverse lookups together
  runTimeoutMs?: number;
}

export interface PipelineState {
  sources: string[];
  snapshot: AggregationSnapshot;
  skippedLines: number;
  unmatchedLines: number;
  outsideWindowLines: number;
  skipReasons: Partial<Record<SkipReason, number>>;
  unmatchedReasons: Partial<Record<UnmatchedReason, number>>;
}

function bump<K extends string>(counts: Partial<Record<K, number>>, key: K, by = 1): void {
  counts[key] = (counts[key] ?? 0) + by;
}

function addCounts<K extends string>(target: Partial<Record<K, number>>, source: Partial<Record<K, number>>): void {
  for (const key in source) {
    const count = source[key];
    if (count !== undefined) {
      bump(target, key, count);
    }
  }
}

export class AnalysisPipeline {
  private readonly aggregator = new Aggregator();
  private readonly acceptTime: TimeFilter;
  private readonly sources: string[] = [];
  private skippedLines = 0;
  private unmatchedLines = 0;
  private outsideWindowLines = 0;
  private readonly skipReasons: Partial<Record<SkipReason, number>> = {};
  private readonly unmatchedReasons: Partial<Record<UnmatchedReason, number>> = {};

  constructor(private readonly options: AnalysisOptions) {
    this.acceptTime = createTimeFilter(options.timeWindow);
  }

  processLine(line: string): void {
    const parsed = parseLogLine(line);
    if (!parsed.ok) {
      // blank lines are not log records at all
      if (parsed.reason !== 'empty-line') {
        this.skippedLines++;
        bump(this.skipReasons, parsed.reason);
        log.debug(`Skipping line: ${parsed.detail}`);
      }
      return;
    }

    const extracted = extractOgcRequest(parsed.record, this.options.dialect, {
      endpoint: this.options.endpoint,
    });
    if (!extracted.matched) {
      this.unmatchedLines++;
      bump(this.unmatchedReasons, extracted.reason);
      this.aggregator.recordRejected();
      return;
    }

    if (!this.acceptTime(parsed.record)) {
      this.outsideWindowLines++;
      this.aggregator.recordRejected();
      return;
    }

    this.aggregator.observe(extracted.request);
  }

  async processSource(source: LogSource): Promise<void> {
    log.info(`Reading ${source.name}`);
    const before = this.aggregator.totalAccepted;

    for await (const line of source.lines) {
      this.processLine(line);
    }

    this.sources.push(source.name);
    log.info(`${source.name}: ${this.aggregator.totalAccepted - before} ${this.options.dialect.service} requests accepted`);
  }

  state(): PipelineState {
    return {
      sources: [...this.sources],
      snapshot: this.aggregator.snapshot(),
      skippedLines: this.skippedLines,
      unmatchedLines: this.unmatchedLines,
      outsideWindowLines: this.outsideWindowLines,
      skipReasons: { ...this.skipReasons },
      unmatchedReasons: { ...this.unmatchedReasons },
    };
  }

  async report(): Promise<AnalysisReport> {
    return buildReport(this.state(), this.options);
  }
}

/**
 * Combine the states of pipelines that ran over different inputs
 */
export function mergePipelineStates(...states: PipelineState[]): PipelineState {
  const merged: PipelineState = {
    sources: [],
    snapshot: mergeAggregations(...states.map(s => s.snapshot)),
    skippedLines: 0,
    unmatchedLines: 0,
    outsideWindowLines: 0,
    skipReasons: {},
    unmatchedReasons: {},
  };

  for (const state of states) {
    merged.sources.push(...state.sources);
    merged.skippedLines += state.skippedLines;
    merged.unmatchedLines += state.unmatchedLines;
    merged.outsideWindowLines += state.outsideWindowLines;
    addCounts(merged.skipReasons, state.skipReasons);
    addCounts(merged.unmatchedReasons, state.unmatchedReasons);
  }

  return merged;
}

export async function buildReport(state: PipelineState, options: AnalysisOptions): Promise<AnalysisReport> {
  const result = finalizeSnapshot(state.snapshot, options.topN);

  const report: AnalysisReport = {
    service: options.dialect.service,
    sources: state.sources,
    result,
    skippedLines: state.skippedLines,
    unmatchedLines: state.unmatchedLines,
    outsideWindowLines: state.outsideWindowLines,
    skipReasons: state.skipReasons,
    unmatchedReasons: state.unmatchedReasons,
  };

  if (options.resolveIps) {
    const resolver = options.resolver ?? new IPResolver();
    const signal = options.runTimeoutMs !== undefined ? AbortSignal.timeout(options.runTimeoutMs) : undefined;
    try {
      report.hosts = await resolver.resolveAll(result.clients.map(c => c.key), { signal });
    } finally {
      // queries still pending after a per-lookup timeout
      resolver.cancel();
    }
  }

  return report;
}

/**
 * Analyze line sources one after another with a single aggregator
 */
export async function runAnalysis(sources: LogSource[], options: AnalysisOptions): Promise<AnalysisReport> {
  const pipeline = new AnalysisPipeline(options);
  for (const source of sources) {
    await pipeline.processSource(source);
  }
  return pipeline.report();
}

export interface AnalyzeFilesOptions extends AnalysisOptions {
  // one pipeline per file, merged afterwards
  parallel?: boolean;
}

export async function analyzeFiles(filePaths: string[], options: AnalyzeFilesOptions): Promise<AnalysisReport> {
  const sources = await openLogFiles(filePaths);

  try {
    if (!options.parallel) {
      return await runAnalysis(sources, options);
    }

    const states = await Promise.all(sources.map(async source => {
      const pipeline = new AnalysisPipeline(options);
      await pipeline.processSource(source);
      return pipeline.state();
    }));
    return await buildReport(mergePipelineStates(...states), options);
  } finally {
    sources.forEach(source => source.close?.());
  }
}
