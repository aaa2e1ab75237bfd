/**
 * Query executor
 * Runs statements on pooled connections under the policy guard, with
 * deadlines, explicit transactions and bounded fetches
 */

import {
  ExecutionError,
  GatewayError,
  ReadOnlyViolationError,
  TimeoutError,
  sqlStateOf,
} from '../errors.js';
import { QueryParameter, QueryResult, Target } from '../types/index.js';
import { withDeadline } from '../utils/deadline.js';
import { describeError, logger } from '../utils/logger.js';
import { Connection } from './connection.js';
import { normalizeRow } from './normalize.js';
import { bindParameters, capRows, PolicyGuard } from './policy.js';
import { PoolManager } from './pool.js';
import { TargetRegistry } from './registry.js';

/** SQLSTATE query_canceled, raised when statement_timeout fires */
const SQLSTATE_QUERY_CANCELED = '57014';
/** SQLSTATE read_only_sql_transaction */
const SQLSTATE_READ_ONLY_TRANSACTION = '25006';

export interface ExecutorOptions {
  maxResults: number;
  readTimeoutMs: number;
  writeTimeoutMs: number;
}

export class QueryExecutor {
  constructor(
    private readonly registry: TargetRegistry,
    private readonly pools: PoolManager,
    private readonly guard: PolicyGuard,
    private readonly options: ExecutorOptions
  ) {}

  /**
   * Execute one SQL statement against a database.
   * At most maxResults rows come back; `truncated` tells whether more existed.
   */
  async execute(
    sql: string,
    database?: string | null,
    parameters: readonly QueryParameter[] = []
  ): Promise<QueryResult> {
    const kind = this.guard.check(sql);
    const statement = bindParameters(sql, parameters);
    const target = this.registry.resolve(database);
    const timeoutMs = kind === 'WRITE' ? this.options.writeTimeoutMs : this.options.readTimeoutMs;
    const started = Date.now();

    // One row past the cap tells us whether the result was cut
    const raw = await this.run(target, timeoutMs, this.guard.readOnly, connection =>
      connection.execute(statement.text, statement.values, { maxRows: this.options.maxResults + 1 })
    );

    const { rows, truncated } = capRows(raw.rows, this.options.maxResults);
    logger.debug('Executed statement', {
      target: target.name,
      kind,
      rows: rows.length,
      truncated,
      durationMs: Date.now() - started,
    });
    if (truncated) {
      logger.info(`Result truncated to ${this.options.maxResults} rows`, { target: target.name });
    }

    return {
      columns: raw.fields.map(f => f.name),
      rows: rows.map(values => normalizeRow(raw.fields, values)),
      rowCount: rows.length,
      truncated,
      affectedRows: kind === 'WRITE' ? raw.rowCount : null,
    };
  }

  /**
   * Trusted catalog query for introspection: no policy check, no row cap,
   * raw driver values keyed by column name
   */
  async catalogQuery(
    target: Target,
    sql: string,
    values: readonly unknown[] = []
  ): Promise<Array<Record<string, unknown>>> {
    const raw = await this.run(target, this.options.readTimeoutMs, true, connection =>
      connection.execute(sql, values)
    );
    return raw.rows.map(row =>
      Object.fromEntries(raw.fields.map((field, i): [string, unknown] => [field.name, row[i]]))
    );
  }

  private async run<T>(
    target: Target,
    timeoutMs: number,
    readOnly: boolean,
    work: (connection: Connection) => Promise<T>
  ): Promise<T> {
    try {
      return await this.pools.withConnection(target, connection =>
        withDeadline(
          this.transaction(connection, timeoutMs, readOnly, work),
          timeoutMs,
          () => new TimeoutError(`Query on '${target.name}' exceeded the ${timeoutMs}ms timeout`)
        )
      );
    } catch (error) {
      throw this.translate(error);
    }
  }

  private async transaction<T>(
    connection: Connection,
    timeoutMs: number,
    readOnly: boolean,
    work: (connection: Connection) => Promise<T>
  ): Promise<T> {
    // SET does not take bind parameters; timeoutMs is a validated integer
    await connection.execute(`SET statement_timeout = ${timeoutMs}`);
    await connection.execute(readOnly ? 'BEGIN READ ONLY' : 'BEGIN');

    try {
      const result = await work(connection);
      await connection.execute('COMMIT');
      return result;
    } catch (error) {
      await this.rollback(connection);
      throw error;
    }
  }

  private async rollback(connection: Connection): Promise<void> {
    try {
      await connection.execute('ROLLBACK');
    } catch (error) {
      // The connection is discarded by the pool either way
      logger.debug('Rollback failed', { connection: connection.id, error: describeError(error) });
    }
  }

  private translate(error: unknown): GatewayError {
    if (error instanceof GatewayError) return error;

    switch (sqlStateOf(error)) {
      case SQLSTATE_QUERY_CANCELED:
        return new TimeoutError('Statement cancelled by the server: statement timeout exceeded');
      case SQLSTATE_READ_ONLY_TRANSACTION:
        return new ReadOnlyViolationError('Write statements are not allowed: rejected by the read-only transaction');
      default:
        return ExecutionError.fromDriver(error, this.registry.secrets());
    }
  }
}
