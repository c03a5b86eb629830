#!/usr/bin/env node
import { createServer, type Server as HttpServer } from 'node:http';
import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { StreamableHTTPServerTransport } from '@modelcontextprotocol/sdk/server/streamableHttp.js';
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
  type CallToolRequest,
} from '@modelcontextprotocol/sdk/types.js';
import { createMarketDataRuntime } from './bootstrap.js';
import { getConfig, assertRequiredConfig } from './config.js';
import { rejectRequest } from './httpGuard.js';
import { logger } from './logger.js';
import { TOOLS, handleToolCall } from './tools.js';

const config = getConfig();
assertRequiredConfig(config);

const runtime = await createMarketDataRuntime(config);

const server = new Server(
  {
    name: 'market-pulse',
    version: '0.1.0',
  },
  {
    capabilities: {
      tools: {},
    },
  },
);

server.onerror = (error: Error) => logger.error({ err: error }, 'Unhandled MCP error');

let httpServer: HttpServer | undefined;

async function shutdown(): Promise<void> {
  await server.close();
  if (httpServer) {
    const listening = httpServer;
    await new Promise<void>((resolve, reject) => listening.close((err) => (err ? reject(err) : resolve())));
  }
  await runtime.close();
}

process.on('SIGINT', () => {
  logger.info('SIGINT received, closing server');
  shutdown().then(
    () => process.exit(0),
    (err: unknown) => {
      logger.error({ err }, 'Shutdown failed');
      process.exit(1);
    },
  );
});

server.setRequestHandler(ListToolsRequestSchema, async () => ({ tools: TOOLS }));

server.setRequestHandler(CallToolRequestSchema, async (request: CallToolRequest) =>
  handleToolCall(runtime.service, request.params.name, request.params.arguments),
);

async function start() {
  if (config.transport === 'http') {
    const transport = new StreamableHTTPServerTransport({
      sessionIdGenerator: undefined,
    });
    await server.connect(transport);

    const allow = {
      hosts: new Set(config.allowedHosts.map((h) => h.toLowerCase())),
      origins: new Set(config.allowedOrigins),
    };

    httpServer = createServer((req, res) => {
      if (req.method === 'GET' && req.url === '/healthz') {
        res.statusCode = 200;
        res.end('ok');
        return;
      }

      const rejection = rejectRequest(req.headers, allow);
      if (rejection) {
        res.statusCode = 403;
        res.end(rejection);
        return;
      }

      transport.handleRequest(req, res).catch((err: unknown) => {
        logger.error({ err }, 'HTTP transport error');
        if (!res.headersSent) {
          res.statusCode = 500;
          res.end('Internal Server Error');
        }
      });
    });

    httpServer.listen(config.port, config.httpHost, () => {
      logger.info({ transport: 'http', host: config.httpHost, port: config.port }, 'Market Pulse server listening');
    });
  } else {
    const transport = new StdioServerTransport();
    await server.connect(transport);
    logger.info({ transport: 'stdio' }, 'Market Pulse server listening');
  }
}

start().catch((error: unknown) => {
  logger.error({ err: error }, 'Failed to start Market Pulse server');
  process.exit(1);
});
