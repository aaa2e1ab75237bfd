/**
 * PostgreSQL connections
 * The Connection interface the executor runs statements on, and the pg
 * client class the pools create
 */

import pg from 'pg';
import Cursor from 'pg-cursor';
import { sanitizeMessage } from '../errors.js';
import { logger } from '../utils/logger.js';
import { FieldInfo } from './normalize.js';

/**
 * Raw driver result: positional rows plus column descriptions
 */
export interface RawResult {
  fields: FieldInfo[];
  rows: unknown[][];
  command: string | null;
  rowCount: number | null;
}

export interface QueryOptions {
  /** Read at most this many rows from the server */
  maxRows?: number;
}

export interface Connection {
  readonly id: number;
  execute(sql: string, values?: readonly unknown[], options?: QueryOptions): Promise<RawResult>;
}

let nextConnectionId = 1;

function toFieldInfo(field: pg.FieldDef): FieldInfo {
  return { name: field.name, dataTypeID: field.dataTypeID };
}

/**
 * pg client handed out by the pools. Rows come back positionally so
 * duplicate column names survive.
 */
export class GatewayClient extends pg.Client implements Connection {
  readonly id = nextConnectionId++;

  constructor(config?: string | pg.ClientConfig) {
    super(config);
    // Backend terminations arrive as 'error' while no query is running
    this.on('error', (error) => {
      logger.debug('Connection error', {
        database: this.database,
        connection: this.id,
        error: sanitizeMessage(error.message, this.password ? [this.password] : []),
      });
    });
  }

  async execute(sql: string, values: readonly unknown[] = [], options: QueryOptions = {}): Promise<RawResult> {
    if (options.maxRows !== undefined) {
      return this.readBounded(sql, values, options.maxRows);
    }

    const result = await this.query<unknown[]>({
      text: sql,
      values: [...values],
      rowMode: 'array',
    });
    return {
      fields: result.fields.map(toFieldInfo),
      rows: result.rows,
      command: result.command,
      rowCount: result.rowCount,
    };
  }

  /**
   * Run through a cursor so no more than maxRows rows leave the server
   */
  private async readBounded(sql: string, values: readonly unknown[], maxRows: number): Promise<RawResult> {
    const cursor = this.query(new Cursor<unknown[]>(sql, [...values], { rowMode: 'array' }));

    const raw = await new Promise<RawResult>((resolve, reject) => {
      cursor.read(maxRows, (error, rows, result) => {
        if (error) {
          reject(error);
          return;
        }
        resolve({
          fields: result.fields.map(toFieldInfo),
          rows,
          command: result.command || null,
          rowCount: result.rowCount,
        });
      });
    });

    await cursor.close();
    return raw;
  }
}

/** Client class a pool instantiates with its own options */
export type ClientClass = typeof GatewayClient;

export interface ClientSettings {
  connectTimeoutMs: number;
}

/**
 * Client class whose connect timeout is independent of the pool's acquire
 * timeout (pg.Pool passes its connectionTimeoutMillis to every client)
 */
export function createClientClass(settings: ClientSettings): ClientClass {
  return class extends GatewayClient {
    constructor(config?: string | pg.ClientConfig) {
      super(withConnectTimeout(config, settings.connectTimeoutMs));
    }
  };
}

function withConnectTimeout(config: string | pg.ClientConfig | undefined, ms: number): pg.ClientConfig {
  if (typeof config === 'string') {
    return { connectionString: config, connectionTimeoutMillis: ms };
  }
  // pg.Pool keeps the password non-enumerable, so a spread alone drops it
  return { ...config, password: config?.password, connectionTimeoutMillis: ms };
}
