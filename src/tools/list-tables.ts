/**
 * List Tables tool - Tables and views of one database
 */

import { DatabaseGateway } from '../database/gateway.js';
import { ToolResponse, errorResponse, jsonResponse } from './format.js';

interface ListTablesToolInput {
  database_name: string;
}

export async function executeListTablesTool(
  gateway: DatabaseGateway,
  input: ListTablesToolInput
): Promise<ToolResponse> {
  try {
    return jsonResponse(await gateway.listTables(input.database_name));
  } catch (error) {
    return errorResponse('listing tables', error);
  }
}
