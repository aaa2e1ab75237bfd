/**
 * List Databases tool - Configured databases reachable right now
 */

import { DatabaseGateway } from '../database/gateway.js';
import { ToolResponse, errorResponse, jsonResponse } from './format.js';

export async function executeListDatabasesTool(gateway: DatabaseGateway): Promise<ToolResponse> {
  try {
    return jsonResponse(await gateway.listDatabases());
  } catch (error) {
    return errorResponse('listing databases', error);
  }
}
