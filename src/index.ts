#!/usr/bin/env node
/**
 * pg-gateway-mcp
 *
 * MCP server giving tool access to one or more PostgreSQL databases through
 * bounded connection pools, with read-only and result-size policies.
 *
 * Tools provided:
 *   - list_databases: Configured databases that are reachable
 *   - list_tables: Tables and views of a database
 *   - get_table_schema: Column definitions in declaration order
 *   - get_table_schema_with_relations: Columns plus foreign keys
 *   - execute_sql: Run a statement with positional parameters
 */

// Load .env file before anything else
import 'dotenv/config';

import { startServer } from './server.js';
import { logger } from './utils/logger.js';

// Start the server
startServer().catch((error: unknown) => {
  logger.error('Fatal error starting server', {
    error: error instanceof Error ? error.message : String(error),
  });
  process.exit(1);
});
