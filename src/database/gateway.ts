/**
 * Database gateway
 * Wires registry, pools, policy, executor and inspector from configuration
 * and exposes the tool entry points and lifecycle hooks
 */

import { Config } from '../config.js';
import { PoolStats, QueryParameter, QueryResult, SchemaDescriptor, TableRelations } from '../types/index.js';
import { describeError, logger } from '../utils/logger.js';
import { ClientClass, createClientClass } from './connection.js';
import { QueryExecutor } from './executor.js';
import { PolicyGuard } from './policy.js';
import { PoolManager } from './pool.js';
import { TargetRegistry } from './registry.js';
import { SchemaInspector } from './schema-inspector.js';

export type GatewaySettings = Pick<
  Config,
  | 'targets'
  | 'connectTimeoutMs'
  | 'readTimeoutMs'
  | 'writeTimeoutMs'
  | 'acquireTimeoutMs'
  | 'shutdownTimeoutMs'
  | 'readOnly'
  | 'maxPoolSize'
  | 'maxResults'
>;

export interface GatewayHealth {
  readOnly: boolean;
  targets: string[];
  pools: PoolStats[];
}

export class DatabaseGateway {
  private initialized: Promise<void> | null = null;
  private closed: Promise<void> | null = null;

  constructor(
    readonly registry: TargetRegistry,
    private readonly pools: PoolManager,
    private readonly executor: QueryExecutor,
    private readonly inspector: SchemaInspector,
    readonly readOnly: boolean
  ) {}

  /**
   * Build a gateway from configuration. `Client` replaces the pg client
   * class the pools instantiate (tests use in-process fakes).
   */
  static fromConfig(settings: GatewaySettings, Client?: ClientClass): DatabaseGateway {
    const registry = new TargetRegistry(settings.targets);
    const pools = new PoolManager(
      Client ?? createClientClass({ connectTimeoutMs: settings.connectTimeoutMs }),
      {
        maxSize: settings.maxPoolSize,
        acquireTimeoutMs: settings.acquireTimeoutMs,
        shutdownTimeoutMs: settings.shutdownTimeoutMs,
      }
    );
    const guard = new PolicyGuard(settings.readOnly);
    const executor = new QueryExecutor(registry, pools, guard, {
      maxResults: settings.maxResults,
      readTimeoutMs: settings.readTimeoutMs,
      writeTimeoutMs: settings.writeTimeoutMs,
    });
    const inspector = new SchemaInspector(registry, executor);
    return new DatabaseGateway(registry, pools, executor, inspector, settings.readOnly);
  }

  /**
   * Probe every target once. Unreachable targets are logged, never fatal:
   * their pools retry on the next call.
   */
  initializePool(): Promise<void> {
    if (!this.initialized) {
      this.initialized = this.probeTargets();
    }
    return this.initialized;
  }

  /**
   * Close all pools; safe to call more than once
   */
  closePool(): Promise<void> {
    if (!this.closed) {
      this.closed = this.pools.shutdown();
    }
    return this.closed;
  }

  listDatabases(): Promise<string[]> {
    return this.inspector.listDatabases();
  }

  listTables(databaseName: string): Promise<string[]> {
    return this.inspector.listTables(databaseName);
  }

  getTableSchema(databaseName: string, tableName: string): Promise<SchemaDescriptor> {
    return this.inspector.getSchema(databaseName, tableName);
  }

  getTableSchemaWithRelations(databaseName: string, tableName: string): Promise<TableRelations> {
    return this.inspector.getSchemaWithRelations(databaseName, tableName);
  }

  executeSql(
    sqlQuery: string,
    databaseName?: string | null,
    parameters: readonly QueryParameter[] = []
  ): Promise<QueryResult> {
    return this.executor.execute(sqlQuery, databaseName, parameters);
  }

  health(): GatewayHealth {
    return {
      readOnly: this.readOnly,
      targets: this.registry.list().map(t => t.name),
      pools: this.pools.stats(),
    };
  }

  private async probeTargets(): Promise<void> {
    const targets = this.registry.list();
    const results = await Promise.all(
      targets.map(async target => {
        try {
          await this.executor.catalogQuery(target, 'SELECT 1');
          logger.info('Database target ready', { target: target.name, host: target.host, port: target.port });
          return true;
        } catch (error) {
          logger.error('Database target unavailable', { target: target.name, error: describeError(error) });
          return false;
        }
      })
    );
    const ready = results.filter(Boolean).length;
    logger.info(`Connection pools initialized: ${ready}/${targets.length} targets reachable`, {
      readOnly: this.readOnly,
    });
  }
}
