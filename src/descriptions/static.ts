/**
 * Tool descriptions shown to MCP clients
 */

export const LIST_DATABASES_TOOL_DESCRIPTION =
  'List the databases this server is configured for and can currently reach.';

export const LIST_TABLES_TOOL_DESCRIPTION =
  'List tables and views in a database. Tables outside the search path are returned as schema.table. ' +
  'Returns an empty list for an unknown database.';

export const GET_TABLE_SCHEMA_TOOL_DESCRIPTION =
  'Get the columns of a table in declaration order: type, nullable, default, key (PRI, UNI, MUL) and extra ' +
  '(identity, generated). Returns an empty object for an unknown table.';

export const GET_TABLE_SCHEMA_WITH_RELATIONS_TOOL_DESCRIPTION =
  'Same as get_table_schema, and each column that references another table carries ' +
  'foreign_key: {referenced_table, referenced_column}.';

/**
 * Description for execute_sql, reflecting the active safety settings
 */
export function getExecuteSqlToolDescription(readOnly: boolean, maxResults: number): string {
  const lines = [
    'Execute a SQL statement against a PostgreSQL database and return the rows as JSON objects.',
    '',
    '## Safety',
    readOnly
      ? '- Read-only mode: only SELECT, SHOW, EXPLAIN and WITH queries are allowed, inside READ ONLY transactions'
      : '- Writes are allowed and committed when the statement succeeds',
    `- At most ${maxResults} rows are returned; extra rows are cut and reported`,
    '- Statements past the configured timeout are cancelled',
    '',
    '## Parameters',
    '- Pass values through `parameters`, referenced as $1, $2, ... (or %s, in order)',
    '- Never splice values into the SQL text',
  ];
  return lines.join('\n');
}
