#!/usr/bin/env node
// ABOUTME: MCP server exposing OGC access-log usage analysis as tools
// ABOUTME: Exposes analyze_ogc_usage and list_service_types over stdio (see http-server.ts for HTTP)

import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import type { Transport } from '@modelcontextprotocol/sdk/shared/transport.js';
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
  Tool,
} from '@modelcontextprotocol/sdk/types.js';
import { fileURLToPath } from 'url';
import { z } from 'zod';
import { analyzeFiles, runAnalysis } from './analysis-pipeline.js';
import { parseAnalysisRequest, toPipelineOptions } from './analysis-request.js';
import { loadConfig, type AppConfig } from './config.js';
import { errorMessage } from './errors.js';
import { sourceFromText } from './log-reader.js';
import { setLogLevel } from './logger.js';
import { formatReport, toJsonReport } from './report-formatter.js';
import { SERVICE_DIALECTS } from './service-dialects.js';
import type { AnalysisReport } from './types.js';

// Tool definitions
const ANALYZE_TOOL: Tool = {
  name: 'analyze_ogc_usage',
  description: 'Analyze web server access logs for OGC service usage (WMS, WFS, WCS, WPS, WMTS, CSW). Counts requests per client, per operation and per requested layer/feature type/coverage/process. Provide either log_files (paths on the server) or log_content (raw log lines).',
  inputSchema: {
    type: 'object',
    properties: {
      log_files: {
        type: 'array',
        items: { type: 'string' },
        description: 'Paths to access log files (".gz" files are decompressed)',
      },
      log_content: {
        type: 'string',
        description: 'Raw access log lines, one per line (alternative to log_files)',
      },
      service_type: {
        type: 'string',
        description: 'OGC service type, e.g. "WMS" or "OGC:WFS". Default: WMS',
      },
      endpoint: {
        type: 'string',
        description: 'Only count requests to this exact path, e.g. "/geoserver/ows"',
      },
      time: {
        type: 'string',
        description: 'ISO 8601 date, datetime or start/end range, e.g. "2018-01-23" or "2018-01-01/2018-01-31"',
      },
      top: {
        type: 'number',
        description: 'Show top n visitors/resources (0 = all). Default: 10',
      },
      resolve_ips: {
        type: 'boolean',
        description: 'Resolve client IP addresses to hostnames. Default: false',
        default: false,
      },
      format: {
        type: 'string',
        enum: ['text', 'json'],
        description: 'Report format. Default: text',
      },
    },
  },
};

const LIST_SERVICES_TOOL: Tool = {
  name: 'list_service_types',
  description: 'List the supported OGC service types with their recognised operations and resource parameters',
  inputSchema: {
    type: 'object',
    properties: {},
  },
};

const AnalyzeArgsSchema = z.object({
  log_files: z.array(z.string()).optional(),
  log_content: z.string().optional(),
  service_type: z.string().optional(),
  endpoint: z.string().optional(),
  time: z.string().optional(),
  top: z.number().optional(),
  resolve_ips: z.boolean().optional(),
  format: z.enum(['text', 'json']).optional(),
});

type ToolResponse = {
  content: Array<{ type: 'text'; text: string }>;
  isError?: boolean;
};

export class OgcUsageMCPServer {
  private server: Server;
  private config: AppConfig;

  constructor(config: AppConfig = loadConfig()) {
    this.config = config;
    setLogLevel(config.logLevel);

    this.server = new Server(
      {
        name: 'ogc-usage-mcp',
        version: '1.0.0',
      },
      {
        capabilities: {
          tools: {},
        },
      }
    );

    this.setupHandlers();
  }

  private setupHandlers(): void {
    this.server.setRequestHandler(ListToolsRequestSchema, async () => {
      return {
        tools: [ANALYZE_TOOL, LIST_SERVICES_TOOL],
      };
    });

    this.server.setRequestHandler(CallToolRequestSchema, async (request) => {
      const { name, arguments: args } = request.params;

      switch (name) {
        case 'analyze_ogc_usage':
          return await this.handleAnalyze(args);
        case 'list_service_types':
          return this.handleListServices();
        default:
          throw new Error(`Unknown tool: ${name}`);
      }
    });
  }

  async handleAnalyze(args: unknown): Promise<ToolResponse> {
    try {
      const parsedArgs = AnalyzeArgsSchema.safeParse(args ?? {});
      if (!parsedArgs.success) {
        throw new Error(parsedArgs.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`).join('; '));
      }
      const params = parsedArgs.data;

      const hasFiles = params.log_files !== undefined && params.log_files.length > 0;
      if (!hasFiles && params.log_content === undefined) {
        throw new Error('Either "log_files" or "log_content" must be provided');
      }

      const analysisRequest = parseAnalysisRequest({
        files: params.log_files ?? [],
        serviceType: params.service_type,
        endpoint: params.endpoint,
        time: params.time,
        top: params.top,
        resolveIps: params.resolve_ips ?? false,
        format: params.format,
      });
      const options = toPipelineOptions(analysisRequest, this.config);

      let report: AnalysisReport;
      if (hasFiles) {
        report = await analyzeFiles(analysisRequest.files, options);
      } else {
        report = await runAnalysis([sourceFromText('log_content', params.log_content ?? '')], options);
      }

      const text = analysisRequest.format === 'json'
        ? JSON.stringify(toJsonReport(report), null, 2)
        : formatReport(report);

      return {
        content: [{ type: 'text', text }],
      };
    } catch (error) {
      return {
        content: [{ type: 'text', text: `Failed to analyze logs: ${errorMessage(error)}` }],
        isError: true,
      };
    }
  }

  handleListServices(): ToolResponse {
    const text = SERVICE_DIALECTS.map(dialect => {
      const operations = Object.entries(dialect.operations).map(([operation, spec]) => {
        const params = spec.resourceParams.length > 0 ? spec.resourceParams.join(' | ') : '-';
        return `  - ${operation}: ${params}`;
      });
      return `${dialect.service} (${dialect.title})\n${operations.join('\n')}`;
    }).join('\n\n');

    return {
      content: [{ type: 'text', text }],
    };
  }

  async connect(transport: Transport): Promise<void> {
    await this.server.connect(transport);
  }

  async run(): Promise<void> {
    const transport = new StdioServerTransport();
    await this.server.connect(transport);
    console.error('OGC Usage MCP server running on stdio');
  }
}

// CLI entry point
const isMainModule = process.argv[1] === fileURLToPath(import.meta.url);

if (isMainModule) {
  const server = new OgcUsageMCPServer();
  server.run().catch((error) => {
    console.error('Fatal error:', error);
    process.exit(1);
  });
}
