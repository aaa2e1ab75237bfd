/**
 * MCP server for the database gateway
 *
 * Registers the gateway tools with the MCP SDK and serves them over stdio
 * (default) or Streamable HTTP.
 *
 * Run modes:
 *   MCP_TRANSPORT=stdio  - Local clients that spawn the process
 *   MCP_TRANSPORT=http   - Streamable HTTP on MCP_HOST:MCP_PORT at /mcp
 */

import { randomUUID } from 'node:crypto';
import express, { Express, NextFunction, Request, Response } from 'express';
import cors from 'cors';
import { z } from 'zod';

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { StreamableHTTPServerTransport } from '@modelcontextprotocol/sdk/server/streamableHttp.js';
import { isInitializeRequest } from '@modelcontextprotocol/sdk/types.js';

import { Config, getConfig } from './config.js';
import { DatabaseGateway } from './database/gateway.js';
import {
  executeGetTableSchemaTool,
  executeGetTableSchemaWithRelationsTool,
  executeListDatabasesTool,
  executeListTablesTool,
  executeSqlTool,
} from './tools/index.js';
import {
  GET_TABLE_SCHEMA_TOOL_DESCRIPTION,
  GET_TABLE_SCHEMA_WITH_RELATIONS_TOOL_DESCRIPTION,
  LIST_DATABASES_TOOL_DESCRIPTION,
  LIST_TABLES_TOOL_DESCRIPTION,
  getExecuteSqlToolDescription,
} from './descriptions/static.js';
import { describeError, logger, setLogLevel } from './utils/logger.js';

const SERVER_NAME = 'pg-gateway-mcp';
const SERVER_VERSION = '1.0.0';

const parameterValue = z.union([z.string(), z.number(), z.boolean(), z.null()]);

/**
 * Create and configure the MCP server with all tools
 */
export function createMcpServer(
  gateway: DatabaseGateway,
  settings: Pick<Config, 'readOnly' | 'maxResults'>
): McpServer {
  const server = new McpServer(
    {
      name: SERVER_NAME,
      version: SERVER_VERSION,
    },
    {
      capabilities: {
        tools: {},
        logging: {},
      },
    }
  );

  server.tool('list_databases', LIST_DATABASES_TOOL_DESCRIPTION, {}, async () => {
    return executeListDatabasesTool(gateway);
  });

  server.tool(
    'list_tables',
    LIST_TABLES_TOOL_DESCRIPTION,
    {
      database_name: z.string().min(1).describe('Database to list tables from'),
    },
    async (args) => {
      return executeListTablesTool(gateway, { database_name: args.database_name });
    }
  );

  server.tool(
    'get_table_schema',
    GET_TABLE_SCHEMA_TOOL_DESCRIPTION,
    {
      database_name: z.string().min(1).describe('Database containing the table'),
      table_name: z.string().min(1).describe('Table or view name, optionally schema-qualified'),
    },
    async (args) => {
      return executeGetTableSchemaTool(gateway, {
        database_name: args.database_name,
        table_name: args.table_name,
      });
    }
  );

  server.tool(
    'get_table_schema_with_relations',
    GET_TABLE_SCHEMA_WITH_RELATIONS_TOOL_DESCRIPTION,
    {
      database_name: z.string().min(1).describe('Database containing the table'),
      table_name: z.string().min(1).describe('Table or view name, optionally schema-qualified'),
    },
    async (args) => {
      return executeGetTableSchemaWithRelationsTool(gateway, {
        database_name: args.database_name,
        table_name: args.table_name,
      });
    }
  );

  server.tool(
    'execute_sql',
    getExecuteSqlToolDescription(settings.readOnly, settings.maxResults),
    {
      sql_query: z.string().min(1).describe('The SQL statement to execute'),
      database_name: z
        .string()
        .optional()
        .describe('Target database (default: the first configured database)'),
      parameters: z
        .array(parameterValue)
        .default([])
        .describe('Positional parameters for $1, $2, ... or %s placeholders'),
    },
    async (args) => {
      return executeSqlTool(gateway, {
        sql_query: args.sql_query,
        database_name: args.database_name,
        parameters: args.parameters,
      });
    }
  );

  return server;
}

/**
 * Origin matches an allowed entry exactly or with any port
 */
export function isAllowedOrigin(origin: string, allowedOrigins: readonly string[]): boolean {
  return allowedOrigins.some(
    allowed => allowed === '*' || origin === allowed || origin.startsWith(`${allowed}:`)
  );
}

/**
 * Reject requests whose Host header is not allowlisted (DNS rebinding guard)
 */
export function createHostCheck(allowedHosts: readonly string[]) {
  return (req: Request, res: Response, next: NextFunction) => {
    const host = (req.headers.host || '').replace(/:\d+$/, '').toLowerCase();

    if (allowedHosts.includes('*') || allowedHosts.includes(host)) {
      next();
      return;
    }

    logger.warn('Rejected request with disallowed Host header', { host });
    res.status(403).json({
      jsonrpc: '2.0',
      error: { code: -32000, message: 'Forbidden: host not allowed' },
      id: null,
    });
  };
}

function sessionIdOf(req: Request): string | undefined {
  const header = req.headers['mcp-session-id'];
  return typeof header === 'string' ? header : undefined;
}

export interface HttpApp {
  app: Express;
  closeSessions: () => Promise<void>;
}

/**
 * Express app serving /mcp (Streamable HTTP, one transport per session) and /health
 */
export function createHttpApp(gateway: DatabaseGateway, config: Config): HttpApp {
  const transports: Record<string, StreamableHTTPServerTransport> = {};
  const app = express();

  // Middleware
  app.use(createHostCheck(config.allowedHosts));
  app.use(cors({
    origin: (origin, callback) => {
      callback(null, !origin || isAllowedOrigin(origin, config.allowedOrigins));
    },
    methods: ['GET', 'POST', 'DELETE', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'Authorization', 'Mcp-Session-Id', 'Last-Event-Id'],
    exposedHeaders: ['Mcp-Session-Id'],
  }));
  app.use(express.json());

  // Health check endpoint
  app.get('/health', (_req, res) => {
    res.json({
      status: 'healthy',
      server: SERVER_NAME,
      version: SERVER_VERSION,
      ...gateway.health(),
    });
  });

  // MCP POST handler - Initialize sessions and handle requests
  app.post('/mcp', async (req: Request, res: Response) => {
    try {
      const sessionId = sessionIdOf(req);

      if (sessionId && transports[sessionId]) {
        await transports[sessionId].handleRequest(req, res, req.body);
        return;
      }

      if (!sessionId && isInitializeRequest(req.body)) {
        const transport: StreamableHTTPServerTransport = new StreamableHTTPServerTransport({
          sessionIdGenerator: () => randomUUID(),
          onsessioninitialized: (sid) => {
            logger.info('Session initialized', { session: sid });
            transports[sid] = transport;
          },
        });

        transport.onclose = () => {
          const sid = transport.sessionId;
          if (sid && transports[sid]) {
            logger.info('Session closed', { session: sid });
            delete transports[sid];
          }
        };

        const server = createMcpServer(gateway, config);
        await server.connect(transport);
        await transport.handleRequest(req, res, req.body);
        return;
      }

      res.status(400).json({
        jsonrpc: '2.0',
        error: { code: -32000, message: 'Bad Request: No valid session ID' },
        id: null,
      });
    } catch (error) {
      logger.error('Error handling MCP request', { error: describeError(error) });
      if (!res.headersSent) {
        res.status(500).json({
          jsonrpc: '2.0',
          error: { code: -32603, message: 'Internal server error' },
          id: null,
        });
      }
    }
  });

  // GET opens the SSE stream, DELETE ends the session
  const sessionHandler = async (req: Request, res: Response) => {
    const sessionId = sessionIdOf(req);

    if (!sessionId || !transports[sessionId]) {
      res.status(400).send('Invalid or missing session ID');
      return;
    }

    await transports[sessionId].handleRequest(req, res);
  };
  app.get('/mcp', sessionHandler);
  app.delete('/mcp', sessionHandler);

  const closeSessions = async () => {
    for (const sessionId of Object.keys(transports)) {
      try {
        await transports[sessionId].close();
        delete transports[sessionId];
      } catch (error) {
        logger.error('Error closing session', { session: sessionId, error: describeError(error) });
      }
    }
  };

  return { app, closeSessions };
}

/**
 * Start the MCP server on the configured transport
 */
export async function startServer(config: Config = getConfig()): Promise<void> {
  setLogLevel(config.logLevel);

  const gateway = DatabaseGateway.fromConfig(config);
  await gateway.initializePool();

  if (config.transport === 'stdio') {
    const server = createMcpServer(gateway, config);
    const transport = new StdioServerTransport();

    const shutdown = async () => {
      logger.info('Shutting down...');
      await server.close();
      await gateway.closePool();
      process.exit(0);
    };
    process.on('SIGINT', shutdown);
    process.on('SIGTERM', shutdown);

    await server.connect(transport);
    logger.info(`${SERVER_NAME} v${SERVER_VERSION} running on stdio`);
    return;
  }

  const { app, closeSessions } = createHttpApp(gateway, config);

  const httpServer = app.listen(config.port, config.host, () => {
    logger.info(`${SERVER_NAME} v${SERVER_VERSION} running on port ${config.port}`, {
      mcp: `http://${config.host}:${config.port}/mcp`,
      health: `http://${config.host}:${config.port}/health`,
    });
  });

  // Graceful shutdown
  const shutdown = async () => {
    logger.info('Shutting down...');
    await closeSessions();
    await gateway.closePool();

    httpServer.close(() => {
      logger.info('Server shutdown complete.');
      process.exit(0);
    });
  };

  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
}
