// ABOUTME: End-to-end tests for the analysis pipeline over the access-log fixture
// ABOUTME: Covers counts, endpoint and time filters, gzip input, parallel merging and host resolution

import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { mkdtemp, readFile, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { fileURLToPath } from 'url';
import { gzipSync } from 'zlib';
import { AnalysisPipeline, analyzeFiles, runAnalysis } from '../analysis-pipeline.js';
import { InputError } from '../errors.js';
import { IPResolver } from '../ip-resolver.js';
import { sourceFromText } from '../log-reader.js';
import { getDialect } from '../service-dialects.js';
import { parseTimeWindow } from '../time-window.js';

const FIXTURE = fileURLToPath(new URL('./fixtures/access.log', import.meta.url));
const WMS = getDialect('WMS');

let fixtureText = '';
let workDir = '';

beforeAll(async () => {
  fixtureText = await readFile(FIXTURE, 'utf8');
  workDir = await mkdtemp(join(tmpdir(), 'ogc-usage-'));
});

afterAll(async () => {
  await rm(workDir, { recursive: true, force: true });
});

describe('analyzeFiles', () => {
  it('aggregates the accepted WMS requests of the fixture', async () => {
    const report = await analyzeFiles([FIXTURE], { dialect: WMS });
    const { result } = report;

    expect(report.service).toBe('WMS');
    expect(report.sources).toEqual([FIXTURE]);
    expect(result.totalAccepted).toBe(6);
    expect(result.totalRejected).toBe(3);
    expect(result.totalBytes).toBe(110099);
    expect(result.noResourceRequests).toBe(1);
    expect(result.clients).toEqual([
      { key: '198.51.100.7', count: 3 },
      { key: '192.0.2.10', count: 2 },
      { key: '203.0.113.5', count: 1 },
    ]);
    expect(result.resources).toEqual([
      { key: 'rivers', count: 3 },
      { key: 'roads', count: 2 },
      { key: 'lakes', count: 1 },
    ]);
    expect(result.requests).toEqual([
      { key: 'GetMap', count: 4 },
      { key: 'GetCapabilities', count: 1 },
      { key: 'GetLegendGraphic', count: 1 },
    ]);
    expect(result.userAgents).toEqual([
      { key: 'QGIS/3.22', count: 4 },
      { key: 'Mozilla/5.0 (X11; Linux x86_64)', count: 1 },
      { key: 'curl/7.68.0', count: 1 },
    ]);
    expect(result.period).toEqual({
      start: Date.UTC(2018, 0, 23, 13, 9, 45),
      end: Date.UTC(2018, 0, 25, 10, 15, 0),
    });
    expect(report.skippedLines).toBe(2);
    expect(report.skipReasons).toEqual({ layout: 1, timestamp: 1 });
    expect(report.unmatchedLines).toBe(3);
    expect(report.unmatchedReasons).toEqual({ service: 1, 'no-query': 1, 'post-body': 1 });
    expect(report.outsideWindowLines).toBe(0);
    expect(report.hosts).toBeUndefined();
  });

  it('applies the top-N limit to clients and resources', async () => {
    const { result } = await analyzeFiles([FIXTURE], { dialect: WMS, topN: 1 });

    expect(result.clients).toEqual([{ key: '198.51.100.7', count: 3 }]);
    expect(result.resources).toEqual([{ key: 'rivers', count: 3 }]);
    expect(result.distinctClients).toBe(3);
    expect(result.requests).toHaveLength(3);
  });

  it('only accepts requests to the configured endpoint', async () => {
    const report = await analyzeFiles([FIXTURE], { dialect: WMS, endpoint: '/geomet/' });

    expect(report.result.totalAccepted).toBe(5);
    expect(report.unmatchedLines).toBe(4);
    expect(report.unmatchedReasons).toEqual({ endpoint: 2, service: 1, 'post-body': 1 });
  });

  it('filters by a single day', async () => {
    const report = await analyzeFiles([FIXTURE], { dialect: WMS, timeWindow: parseTimeWindow('2018-01-24') });

    expect(report.result.totalAccepted).toBe(2);
    expect(report.outsideWindowLines).toBe(4);
    expect(report.result.totalRejected).toBe(7);
    expect(report.result.clients).toEqual([
      { key: '198.51.100.7', count: 1 },
      { key: '203.0.113.5', count: 1 },
    ]);
  });

  it('filters by open-ended ranges', async () => {
    const from = await analyzeFiles([FIXTURE], { dialect: WMS, timeWindow: parseTimeWindow('2018-01-24/') });
    const until = await analyzeFiles([FIXTURE], { dialect: WMS, timeWindow: parseTimeWindow('/2018-01-23') });

    expect(from.result.totalAccepted).toBe(3);
    expect(until.result.totalAccepted).toBe(3);
  });

  it('reads gzip-compressed logs', async () => {
    const gzPath = join(workDir, 'access.log.gz');
    await writeFile(gzPath, gzipSync(fixtureText));

    const plain = await analyzeFiles([FIXTURE], { dialect: WMS });
    const compressed = await analyzeFiles([gzPath], { dialect: WMS });

    expect(compressed.result).toEqual(plain.result);
  });

  it('fails before counting when a file cannot be opened', async () => {
    const missing = join(workDir, 'missing.log');

    await expect(analyzeFiles([FIXTURE, missing], { dialect: WMS })).rejects.toThrow(InputError);
    await expect(analyzeFiles([missing], { dialect: WMS })).rejects.toThrow(`Cannot open log file ${missing}`);
  });

  it('produces the same result in parallel as sequentially', async () => {
    const second = join(workDir, 'second.log');
    await writeFile(second, [
      '10.1.1.1 - - [26/Jan/2018:10:00:00 +0100] "GET /geomet/?SERVICE=WMS&REQUEST=GetMap&LAYERS=lakes HTTP/1.1" 200 10 "-" "QGIS/3.22"',
      '10.1.1.1 - - [26/Jan/2018:10:00:05 +0100] "GET /geomet/?SERVICE=WMS&REQUEST=GetMap&LAYERS=roads HTTP/1.1" 200 20 "-" "QGIS/3.22"',
      'not a log line',
    ].join('\n'));

    const sequential = await analyzeFiles([FIXTURE, second], { dialect: WMS });
    const parallel = await analyzeFiles([FIXTURE, second], { dialect: WMS, parallel: true });

    expect(parallel.result).toEqual(sequential.result);
    expect(parallel.sources).toEqual(sequential.sources);
    expect(parallel.skipReasons).toEqual({ layout: 2, timestamp: 1 });
    expect(sequential.result.totalAccepted).toBe(8);
    expect(sequential.result.resources.slice(0, 2)).toEqual([
      { key: 'rivers', count: 3 },
      { key: 'roads', count: 3 },
    ]);
  });

  it('gives identical reports for repeated runs', async () => {
    const first = await analyzeFiles([FIXTURE], { dialect: WMS, topN: 2 });
    const second = await analyzeFiles([FIXTURE], { dialect: WMS, topN: 2 });
    expect(second).toEqual(first);
  });
});

describe('runAnalysis', () => {
  it('attaches host names for the ranked clients', async () => {
    const resolver = new IPResolver({
      lookup: async (address) => {
        if (address === '198.51.100.7') return ['maps.example.net'];
        throw new Error('NXDOMAIN');
      },
    });

    const report = await runAnalysis([sourceFromText('fixture', fixtureText)], {
      dialect: WMS,
      topN: 2,
      resolveIps: true,
      resolver,
    });

    expect(report.hosts).toEqual([
      { address: '198.51.100.7', hostname: 'maps.example.net' },
      { address: '192.0.2.10', hostname: null },
    ]);
    expect(report.result.totalAccepted).toBe(6);
  });

  it('leaves counts unchanged when every lookup fails', async () => {
    const failing = new IPResolver({ lookup: async () => { throw new Error('SERVFAIL'); } });

    const withHosts = await runAnalysis([sourceFromText('fixture', fixtureText)], {
      dialect: WMS,
      resolveIps: true,
      resolver: failing,
    });
    const withoutHosts = await runAnalysis([sourceFromText('fixture', fixtureText)], { dialect: WMS });

    expect(withHosts.result).toEqual(withoutHosts.result);
    expect(withHosts.hosts?.every(host => host.hostname === null)).toBe(true);
  });

  it('analyzes other service types with the same log', async () => {
    const report = await runAnalysis([sourceFromText('fixture', fixtureText)], { dialect: getDialect('WFS') });

    expect(report.result.totalAccepted).toBe(1);
    expect(report.result.resources).toEqual([{ key: 'roads', count: 1 }]);
    expect(report.result.requests).toEqual([{ key: 'GetFeature', count: 1 }]);
  });
});

describe('AnalysisPipeline', () => {
  it('ignores blank lines without counting them', () => {
    const pipeline = new AnalysisPipeline({ dialect: WMS });
    pipeline.processLine('');
    pipeline.processLine('   ');

    const state = pipeline.state();
    expect(state.skippedLines).toBe(0);
    expect(state.snapshot.totalRejected).toBe(0);
  });
});
