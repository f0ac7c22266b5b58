import { type Request, type Response } from 'express';
import { randomUUID } from 'node:crypto';
import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StreamableHTTPServerTransport } from '@modelcontextprotocol/sdk/server/streamableHttp.js';
import { createMcpExpressApp } from '@modelcontextprotocol/sdk/server/express.js';
import { isInitializeRequest } from '@modelcontextprotocol/sdk/types.js';
import { buildAuthContext } from './auth.js';
import { loadConfig } from './config.js';
import { logger } from './logger.js';
import { registerResourcesAndPrompts } from './resources.js';
import { createSplitwiseClient } from './splitwise/client.js';
import { registerTools } from './tools/index.js';

const config = loadConfig();
const splitwise = createSplitwiseClient(config.splitwise);

if (config.splitwise.apiKey === '') {
  logger.warn('SPLITWISE_API_KEY is not set; report tools will return an initialization error');
}

const getServer = (): McpServer => {
  const server = new McpServer(
    {
      name: 'shared-expense-reports',
      version: '0.1.0'
    },
    {
      capabilities: { logging: {} }
    }
  );

  registerTools(server, splitwise, {
    format: { currency: config.report.currency, locale: config.report.locale },
    widenLongMonths: config.report.widenLongMonths,
    expenseLimit: config.report.expenseLimit
  });
  registerResourcesAndPrompts(server, splitwise);
  return server;
};

const app = createMcpExpressApp();
const authContext = buildAuthContext({ mode: config.mcp.authMode, bearerToken: config.mcp.bearerToken });

logger.info('MCP auth mode set', { mode: authContext.mode });

const transports = new Map<string, StreamableHTTPServerTransport>();

const readSessionId = (req: Request): string | undefined => {
  const header = req.headers['mcp-session-id'];
  const value = Array.isArray(header) ? header[0] : header;
  return value !== undefined && value !== '' ? value : undefined;
};

const mcpPostHandler = async (req: Request, res: Response): Promise<void> => {
  const sessionId = readSessionId(req);
  if (sessionId !== undefined) {
    logger.debug('Received MCP request', { sessionId });
  }

  try {
    if (sessionId !== undefined) {
      const existingTransport = transports.get(sessionId);
      if (existingTransport === undefined) {
        res.status(400).json({
          jsonrpc: '2.0',
          error: { code: -32001, message: 'Bad Request: Transport not initialized' },
          id: null
        });
        return;
      }
      await existingTransport.handleRequest(req, res, req.body);
    } else if (isInitializeRequest(req.body)) {
      const newTransport = new StreamableHTTPServerTransport({
        sessionIdGenerator: () => randomUUID(),
        onsessioninitialized: (sid: string) => {
          logger.info('Session initialized', { sessionId: sid });
          transports.set(sid, newTransport);
        }
      });

      newTransport.onclose = () => {
        const sid = newTransport.sessionId;
        if (sid !== undefined && transports.has(sid)) {
          logger.info('Transport closed, removing from map', { sessionId: sid });
          transports.delete(sid);
        }
      };

      const server = getServer();
      await server.connect(newTransport);
      await newTransport.handleRequest(req, res, req.body);
    } else {
      res.status(400).json({
        jsonrpc: '2.0',
        error: { code: -32000, message: 'Bad Request: No valid session ID provided' },
        id: null
      });
    }
  } catch (error) {
    logger.error('Error handling MCP request', { error: String(error) });
    if (!res.headersSent) {
      res.status(500).json({
        jsonrpc: '2.0',
        error: { code: -32603, message: 'Internal server error' },
        id: null
      });
    }
  }
};

// GET opens the SSE stream, DELETE ends the session; both need a known session.
const mcpSessionHandler = async (req: Request, res: Response): Promise<void> => {
  const sessionId = readSessionId(req);
  const transport = sessionId !== undefined ? transports.get(sessionId) : undefined;
  if (transport === undefined) {
    res.status(400).send('Invalid or missing session ID');
    return;
  }

  logger.info(req.method === 'DELETE' ? 'Received session termination request' : 'Establishing SSE stream', { sessionId });
  try {
    await transport.handleRequest(req, res);
  } catch (error) {
    logger.error('Error handling session request', { sessionId, method: req.method, error: String(error) });
    if (!res.headersSent) {
      res.status(500).send('Error processing session request');
    }
  }
};

if (authContext.middleware !== null) {
  app.post('/mcp', authContext.middleware, (req: Request, res: Response) => { void mcpPostHandler(req, res); });
  app.get('/mcp', authContext.middleware, (req: Request, res: Response) => { void mcpSessionHandler(req, res); });
  app.delete('/mcp', authContext.middleware, (req: Request, res: Response) => { void mcpSessionHandler(req, res); });
} else {
  app.post('/mcp', (req: Request, res: Response) => { void mcpPostHandler(req, res); });
  app.get('/mcp', (req: Request, res: Response) => { void mcpSessionHandler(req, res); });
  app.delete('/mcp', (req: Request, res: Response) => { void mcpSessionHandler(req, res); });
}

app.listen(config.mcp.port, (error?: Error) => {
  if (error != null) {
    logger.error('Failed to start server', { error: String(error) });
    process.exit(1);
  }
  logger.info('Shared expense reports MCP server listening', { port: config.mcp.port, url: config.mcp.publicUrl });
});

const gracefulShutdown = async (): Promise<void> => {
  logger.info('Shutting down server');
  for (const [sessionId, transport] of transports.entries()) {
    try {
      logger.debug('Closing transport', { sessionId });
      await transport.close();
      transports.delete(sessionId);
    } catch (error) {
      logger.error('Error closing transport', { sessionId, error: String(error) });
    }
  }
  logger.info('Server shutdown complete');
  process.exit(0);
};

process.on('SIGINT', () => { void gracefulShutdown(); });
process.on('SIGTERM', () => { void gracefulShutdown(); });
