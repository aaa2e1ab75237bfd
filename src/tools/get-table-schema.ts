/**
 * Get Table Schema tools - Column definitions, optionally with foreign keys
 */

import { DatabaseGateway } from '../database/gateway.js';
import { ToolResponse, errorResponse, jsonResponse } from './format.js';

interface TableSchemaToolInput {
  database_name: string;
  table_name: string;
}

export async function executeGetTableSchemaTool(
  gateway: DatabaseGateway,
  input: TableSchemaToolInput
): Promise<ToolResponse> {
  try {
    return jsonResponse(await gateway.getTableSchema(input.database_name, input.table_name));
  } catch (error) {
    return errorResponse('describing table', error);
  }
}

export async function executeGetTableSchemaWithRelationsTool(
  gateway: DatabaseGateway,
  input: TableSchemaToolInput
): Promise<ToolResponse> {
  try {
    return jsonResponse(
      await gateway.getTableSchemaWithRelations(input.database_name, input.table_name)
    );
  } catch (error) {
    return errorResponse('describing table relations', error);
  }
}
