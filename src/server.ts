// src/server.ts
import express from 'express';
import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StreamableHTTPServerTransport } from '@modelcontextprotocol/sdk/server/streamableHttp.js';
import type { ServerConfig } from './config/config.js';
import type { CalendarService } from './services/calendar.service.js';
import { registerCalendarTools } from './tools/calendar-tools.js';
import { createLogger } from './utils/logger.js';

const logger = createLogger('server');

const INSTRUCTIONS =
  'Calendar tools for a CalDAV account. Dates accept YYYY-MM-DD, MM/DD/YYYY, today, tomorrow, ' +
  'weekday names and "in N days"; times accept military (1400), 14:00, 2pm, noon and midnight. ' +
  'Times are interpreted in the configured local time zone.';

/**
 * Creates an MCP server with every calendar tool registered
 */
export function createMcpServer(service: CalendarService, config: ServerConfig): McpServer {
  const server = new McpServer(
    { name: config.serverName, version: config.serverVersion },
    { instructions: INSTRUCTIONS },
  );
  registerCalendarTools(server, service);
  return server;
}

/**
 * Express app serving MCP over stateless streamable HTTP, plus a health check
 */
export function createApp(service: CalendarService, config: ServerConfig): express.Express {
  const app = express();
  app.use(express.json({ limit: '1mb' }));

  app.get('/health', (_req, res) => {
    res.json({
      status: 'healthy',
      version: config.serverVersion,
      environment: config.environment,
    });
  });

  app.post('/mcp', async (req, res) => {
    // A fresh server and transport per request; no session state is kept
    const server = createMcpServer(service, config);
    const transport = new StreamableHTTPServerTransport({ sessionIdGenerator: undefined });

    res.on('close', () => {
      void transport.close();
      void server.close();
    });

    try {
      await server.connect(transport);
      await transport.handleRequest(req, res, req.body);
    } catch (error) {
      logger.error('Error handling MCP request:', error);
      if (!res.headersSent) {
        res.status(500).json({
          jsonrpc: '2.0',
          error: { code: -32603, message: 'Internal server error' },
          id: null,
        });
      }
    }
  });

  const methodNotAllowed = (_req: express.Request, res: express.Response): void => {
    res.status(405).json({
      jsonrpc: '2.0',
      error: { code: -32000, message: 'Method not allowed.' },
      id: null,
    });
  };
  app.get('/mcp', methodNotAllowed);
  app.delete('/mcp', methodNotAllowed);

  return app;
}
