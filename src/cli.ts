#!/usr/bin/env node
// ABOUTME: Command line entry point: ogc-usage analyze <logfile...> and ogc-usage services
// ABOUTME: Parses flags with util.parseArgs, runs the analysis and prints a text or JSON report

import { parseArgs } from 'util';
import { fileURLToPath } from 'url';
import { analyzeFiles } from './analysis-pipeline.js';
import { parseAnalysisRequest, toPipelineOptions } from './analysis-request.js';
import { loadConfig } from './config.js';
import { OgcUsageError, errorMessage } from './errors.js';
import { setLogLevel, type LogLevel } from './logger.js';
import { formatReport, toJsonReport } from './report-formatter.js';
import { SERVICE_DIALECTS } from './service-dialects.js';

const USAGE = `Usage:
  ogc-usage analyze [options] <logfile...>
  ogc-usage services

Options:
  -s, --service-type <type>  OGC service type (WMS, WFS, WCS, WPS, WMTS, CSW; default WMS)
  -e, --endpoint <path>      only count requests to this exact path (e.g. /geoserver/ows)
  -t, --time <spec>          ISO 8601 date/datetime or start/end range
      --top <n>              show top n visitors/resources (0 = all; default 10)
  -r, --resolve-ips          resolve client IP addresses to hostnames
  -p, --parallel             analyze files in parallel and merge the counts
  -f, --format <format>      text or json (default text)
      --verbosity <level>    error, warn, info or debug
  -h, --help                 show this help`;

const LOG_LEVELS: readonly LogLevel[] = ['error', 'warn', 'info', 'debug'];

export interface CliResult {
  exitCode: number;
  stdout: string;
  stderr: string;
}

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some(level => level === value);
}

function listServices(): string {
  return SERVICE_DIALECTS.map(dialect => {
    const operations = Object.keys(dialect.operations).join(', ');
    return `${dialect.service} (${dialect.title}): ${operations}`;
  }).join('\n');
}

function parseCliArgs(argv: string[]) {
  return parseArgs({
    args: argv,
    allowPositionals: true,
    strict: true,
    options: {
      'service-type': { type: 'string', short: 's' },
      endpoint: { type: 'string', short: 'e' },
      time: { type: 'string', short: 't' },
      top: { type: 'string' },
      'resolve-ips': { type: 'boolean', short: 'r' },
      parallel: { type: 'boolean', short: 'p' },
      format: { type: 'string', short: 'f' },
      verbosity: { type: 'string' },
      help: { type: 'boolean', short: 'h' },
    },
  });
}

export async function runCli(argv: string[], env: NodeJS.ProcessEnv = process.env): Promise<CliResult> {
  let parsed: ReturnType<typeof parseCliArgs>;
  try {
    parsed = parseCliArgs(argv);
  } catch (error) {
    return { exitCode: 2, stdout: '', stderr: `${errorMessage(error)}\n\n${USAGE}\n` };
  }

  const { values, positionals } = parsed;
  const [command, ...files] = positionals;

  if (values.help) {
    return { exitCode: 0, stdout: `${USAGE}\n`, stderr: '' };
  }
  if (command === undefined) {
    return { exitCode: 2, stdout: '', stderr: `${USAGE}\n` };
  }

  if (command === 'services') {
    return { exitCode: 0, stdout: `${listServices()}\n`, stderr: '' };
  }

  if (command !== 'analyze') {
    return { exitCode: 2, stdout: '', stderr: `Unknown command: ${command}\n\n${USAGE}\n` };
  }

  if (files.length === 0) {
    return { exitCode: 2, stdout: '', stderr: `Missing log file argument\n\n${USAGE}\n` };
  }

  try {
    const config = loadConfig(env);
    const verbosity = values.verbosity ?? config.logLevel;
    if (!isLogLevel(verbosity)) {
      return { exitCode: 2, stdout: '', stderr: `Invalid verbosity "${verbosity}"\n` };
    }
    setLogLevel(verbosity);

    const request = parseAnalysisRequest({
      files,
      serviceType: values['service-type'],
      endpoint: values.endpoint,
      time: values.time,
      top: values.top,
      resolveIps: values['resolve-ips'] ?? false,
      parallel: values.parallel ?? false,
      format: values.format,
    });

    const report = await analyzeFiles(request.files, toPipelineOptions(request, config));

    if (report.result.totalAccepted === 0) {
      return { exitCode: 1, stdout: '', stderr: 'No records to analyze\n' };
    }

    const output = request.format === 'json'
      ? JSON.stringify(toJsonReport(report), null, 2)
      : formatReport(report);
    return { exitCode: 0, stdout: `${output}\n`, stderr: '' };
  } catch (error) {
    if (error instanceof OgcUsageError) {
      return { exitCode: 1, stdout: '', stderr: `Error: ${error.message}\n` };
    }
    throw error;
  }
}

// CLI entry point
const isMainModule = process.argv[1] === fileURLToPath(import.meta.url);

if (isMainModule) {
  runCli(process.argv.slice(2))
    .then(result => {
      process.stdout.write(result.stdout);
      process.stderr.write(result.stderr);
      process.exitCode = result.exitCode;
    })
    .catch((error) => {
      console.error('Fatal error:', error);
      process.exit(1);
    });
}
