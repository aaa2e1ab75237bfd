/**
 * Connection pool manager
 *
 * One pg.Pool per target, created on first use. A checked-out client
 * belongs to exactly one caller until it goes back to the pool (healthy)
 * or is destroyed (any failure while checked out).
 */

import pg from 'pg';
import { ExecutionError, PoolExhaustedError, TimeoutError, sanitizeMessage } from '../errors.js';
import { PoolStats, Target } from '../types/index.js';
import { logger } from '../utils/logger.js';
import { ClientClass, Connection, GatewayClient } from './connection.js';

const APPLICATION_NAME = 'pg-gateway-mcp';

/** pg-pool's rejection when connectionTimeoutMillis passes in its queue */
const QUEUE_TIMEOUT_MESSAGE = 'timeout exceeded when trying to connect';

export interface PoolOptions {
  maxSize: number;
  acquireTimeoutMs: number;
}

type CheckedOut = pg.PoolClient & GatewayClient;

export class ConnectionPool {
  private readonly pool: pg.Pool;
  private readonly borrowed = new Set<CheckedOut>();
  private readonly pending = new Set<(error: Error) => void>();
  private ending: Promise<void> | null = null;

  constructor(
    readonly target: Target,
    Client: ClientClass,
    private readonly options: PoolOptions
  ) {
    this.pool = new pg.Pool({
      Client,
      host: target.host,
      port: target.port,
      user: target.user,
      password: target.password,
      database: target.database,
      application_name: APPLICATION_NAME,
      ...(target.charset ? { client_encoding: target.charset } : {}),
      max: options.maxSize,
      idleTimeoutMillis: 30000,
      connectionTimeoutMillis: options.acquireTimeoutMs,
      allowExitOnIdle: true,
    });

    this.pool.on('connect', () => {
      logger.debug('Opened connection', { target: target.name, host: target.host, port: target.port });
    });
    // Only idle clients reach here; pg.Pool has already removed this one
    this.pool.on('error', (error) => {
      logger.warn('Removed idle connection after error', {
        target: target.name,
        error: sanitizeMessage(error.message, [target.password]),
      });
    });
  }

  stats(): PoolStats {
    const total = this.pool.totalCount;
    const idle = this.pool.idleCount;
    return {
      target: this.target.name,
      total,
      idle,
      inUse: total - idle,
      waiting: this.pool.waitingCount,
    };
  }

  /**
   * Run work with a checked-out client. The client goes back to the pool
   * when work resolves and is destroyed when it rejects.
   */
  async use<T>(work: (connection: Connection) => Promise<T>): Promise<T> {
    const client = await this.acquire();
    let result: T;
    try {
      result = await work(client);
    } catch (error) {
      this.borrowed.delete(client);
      logger.debug('Discarding connection', { target: this.target.name, connection: client.id });
      client.release(true);
      throw error;
    }
    this.borrowed.delete(client);
    client.release();
    return result;
  }

  /**
   * Close the pool. Pending acquisitions fail at once, idle clients close,
   * checked-out clients get graceMs to come back before they are ended.
   */
  close(graceMs: number): Promise<void> {
    if (!this.ending) {
      this.ending = this.shutdown(graceMs);
    }
    return this.ending;
  }

  private acquire(): Promise<CheckedOut> {
    if (this.ending) {
      return Promise.reject(this.closedError());
    }

    return new Promise<CheckedOut>((resolve, reject) => {
      this.pending.add(reject);
      this.pool.connect().then(
        (client) => {
          // Cleared by close(): the caller has already been rejected
          if (!this.pending.delete(reject)) {
            client.release(true);
            return;
          }
          if (!(client instanceof GatewayClient)) {
            client.release(true);
            reject(new ExecutionError(`Connection pool for '${this.target.name}' returned a foreign client`));
            return;
          }
          this.borrowed.add(client);
          resolve(client);
        },
        (error: unknown) => {
          this.pending.delete(reject);
          reject(this.translateConnectError(error));
        }
      );
    });
  }

  private async shutdown(graceMs: number): Promise<void> {
    for (const reject of this.pending) {
      reject(this.closedError());
    }
    this.pending.clear();

    const ended = this.pool.end();
    let timer: NodeJS.Timeout | undefined;
    const drained = await Promise.race([
      ended.then(() => true),
      new Promise<boolean>((resolve) => {
        timer = setTimeout(() => resolve(false), graceMs);
      }),
    ]);
    clearTimeout(timer);

    if (!drained) {
      logger.warn('Ending connections still in use after shutdown grace period', {
        target: this.target.name,
        inUse: this.borrowed.size,
      });
      // In-flight queries fail, and their callers hand the clients back destroyed
      await Promise.all(Array.from(this.borrowed, client => client.end()));
      await ended;
    }
  }

  private translateConnectError(error: unknown): Error {
    if (error instanceof Error && error.message === QUEUE_TIMEOUT_MESSAGE) {
      return new PoolExhaustedError(this.target.name, this.options.maxSize, this.options.acquireTimeoutMs);
    }
    if (error instanceof Error && /timeout/i.test(error.message)) {
      return new TimeoutError(`Connecting to '${this.target.name}' timed out`);
    }
    return ExecutionError.fromDriver(error, [this.target.password]);
  }

  private closedError(): ExecutionError {
    return new ExecutionError(`Connection pool for '${this.target.name}' is closed`);
  }
}

/**
 * Owns one ConnectionPool per target
 */
export class PoolManager {
  private readonly pools = new Map<string, ConnectionPool>();
  private shutdownPromise: Promise<void> | null = null;

  constructor(
    private readonly Client: ClientClass,
    private readonly options: PoolOptions & { shutdownTimeoutMs: number }
  ) {}

  poolFor(target: Target): ConnectionPool {
    if (this.shutdownPromise) {
      throw new ExecutionError('Connection pools have been shut down');
    }
    let pool = this.pools.get(target.name);
    if (!pool) {
      pool = new ConnectionPool(target, this.Client, {
        maxSize: this.options.maxSize,
        acquireTimeoutMs: this.options.acquireTimeoutMs,
      });
      this.pools.set(target.name, pool);
      logger.debug('Created connection pool', { target: target.name, maxSize: this.options.maxSize });
    }
    return pool;
  }

  /**
   * Scoped acquisition: work runs with a client that always goes back to
   * the pool or is destroyed afterwards
   */
  withConnection<T>(target: Target, work: (connection: Connection) => Promise<T>): Promise<T> {
    return this.poolFor(target).use(work);
  }

  stats(): PoolStats[] {
    return Array.from(this.pools.values()).map(pool => pool.stats());
  }

  /**
   * Close every pool; later calls return the same promise
   */
  shutdown(): Promise<void> {
    if (!this.shutdownPromise) {
      const pools = Array.from(this.pools.values());
      this.shutdownPromise = Promise.all(pools.map(pool => pool.close(this.options.shutdownTimeoutMs))).then(
        () => {
          logger.info('Connection pools closed', { pools: pools.length });
        }
      );
    }
    return this.shutdownPromise;
  }
}
