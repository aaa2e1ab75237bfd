/**
 * Tool executor re-exports
 *
 * Each tool's sole public API is its execute function.
 * Registration (name, schema, description) is handled in server.ts via the MCP SDK.
 */

export { executeListDatabasesTool } from './list-databases.js';
export { executeListTablesTool } from './list-tables.js';
export { executeGetTableSchemaTool, executeGetTableSchemaWithRelationsTool } from './get-table-schema.js';
export { executeSqlTool } from './execute-sql.js';
export type { ToolResponse } from './format.js';
