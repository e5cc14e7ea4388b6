#!/usr/bin/env node
// ABOUTME: HTTP server wrapper for the OGC Usage MCP server
// ABOUTME: Exposes the MCP server via Streamable HTTP transport for remote access

import express from 'express';
import { createServer } from 'http';
import { randomUUID } from 'crypto';
import { fileURLToPath } from 'url';
import { StreamableHTTPServerTransport } from '@modelcontextprotocol/sdk/server/streamableHttp.js';
import { isInitializeRequest } from '@modelcontextprotocol/sdk/types.js';
import { loadConfig, type AppConfig } from './config.js';
import { OgcUsageMCPServer } from './index.js';
import { createLogger } from './logger.js';

const log = createLogger('ogc-usage-http');

export function createApp(config: AppConfig): express.Express {
  // Store MCP transports by session ID
  const transports = new Map<string, StreamableHTTPServerTransport>();

  const app = express();
  app.use(express.json({ limit: '50mb' }));

  // Health check endpoint
  app.get('/health', (_req, res) => {
    res.json({ status: 'ok', service: 'ogc-usage-mcp' });
  });

  // MCP endpoint
  app.all('/mcp', async (req, res) => {
    log.info(`Received ${req.method} request to /mcp`);

    try {
      const sessionHeader = req.headers['mcp-session-id'];
      const sessionId = typeof sessionHeader === 'string' ? sessionHeader : undefined;
      let transport = sessionId ? transports.get(sessionId) : undefined;

      if (!transport && !sessionId && req.method === 'POST' && isInitializeRequest(req.body)) {
        const newTransport = new StreamableHTTPServerTransport({
          sessionIdGenerator: () => randomUUID(),
          onsessioninitialized: (sid) => {
            log.info(`MCP session initialized: ${sid}`);
            transports.set(sid, newTransport);
          },
        });

        newTransport.onclose = () => {
          const sid = newTransport.sessionId;
          if (sid && transports.delete(sid)) {
            log.info(`MCP session closed: ${sid}`);
          }
        };

        const mcpServer = new OgcUsageMCPServer(config);
        await mcpServer.connect(newTransport);
        transport = newTransport;
      }

      if (!transport) {
        res.status(400).json({
          jsonrpc: '2.0',
          error: { code: -32000, message: 'Bad Request: No valid session ID provided' },
          id: null,
        });
        return;
      }

      await transport.handleRequest(req, res, req.body);
    } catch (error) {
      log.error('Error handling MCP request:', error);
      if (!res.headersSent) {
        res.status(500).json({
          jsonrpc: '2.0',
          error: { code: -32603, message: 'Internal server error' },
          id: null,
        });
      }
    }
  });

  return app;
}

async function main() {
  const config = loadConfig();
  const server = createServer(createApp(config));

  server.listen(config.port, () => {
    console.error(`OGC Usage MCP HTTP server running on port ${config.port}`);
    console.error(`MCP endpoint: http://localhost:${config.port}/mcp`);
    console.error(`Health check: http://localhost:${config.port}/health`);
  });
}

const isMainModule = process.argv[1] === fileURLToPath(import.meta.url);

if (isMainModule) {
  main().catch((error) => {
    console.error('Fatal error:', error);
    process.exit(1);
  });
}
