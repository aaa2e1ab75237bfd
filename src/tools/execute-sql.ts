/**
 * Execute SQL tool - Run one statement with optional positional parameters
 *
 * The first content item is always the JSON array of rows. Truncation and
 * affected-row counts follow as separate text items.
 */

import { DatabaseGateway } from '../database/gateway.js';
import { QueryParameter } from '../types/index.js';
import { ToolResponse, errorResponse, jsonResponse } from './format.js';

interface ExecuteSqlToolInput {
  sql_query: string;
  database_name?: string;
  parameters?: QueryParameter[];
}

export async function executeSqlTool(
  gateway: DatabaseGateway,
  input: ExecuteSqlToolInput
): Promise<ToolResponse> {
  try {
    const result = await gateway.executeSql(input.sql_query, input.database_name, input.parameters ?? []);
    const response = jsonResponse(result.rows);

    if (result.affectedRows !== null) {
      response.content.push({ type: 'text', text: `${result.affectedRows} row(s) affected` });
    }
    if (result.truncated) {
      response.content.push({
        type: 'text',
        text: `Results truncated to ${result.rowCount} rows. Add LIMIT to your query for better control.`,
      });
    }
    return response;
  } catch (error) {
    return errorResponse('executing SQL', error);
  }
}
