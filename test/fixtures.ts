/**
 * Test fixtures: an in-process fake server, its pg client class, and
 * gateway settings
 */

import type pg from 'pg';
import { GatewayClient } from '../src/database/connection.js';
import type { ClientClass, QueryOptions, RawResult } from '../src/database/connection.js';
import type { GatewaySettings } from '../src/database/gateway.js';
import type { Target } from '../src/types/index.js';

/** pg type OIDs used by the fixtures */
export const OID = {
  int8: 20,
  int4: 23,
  text: 25,
} as const;

export interface FakeResponse {
  columns?: string[];
  types?: number[];
  rows?: unknown[][];
  command?: string;
  rowCount?: number | null;
}

export type Responder = (
  sql: string,
  values: readonly unknown[],
  database: string
) => FakeResponse | Promise<FakeResponse>;

export interface RecordedStatement {
  sql: string;
  values: readonly unknown[];
  maxRows?: number;
}

const SESSION_STATEMENT = /^(SET|BEGIN|COMMIT|ROLLBACK)\b/;

/**
 * pg client that talks to a FakeServer instead of a socket
 */
export class FakeClient extends GatewayClient {
  readonly statements: RecordedStatement[] = [];
  closed = false;
  private readonly inFlight = new Set<(error: Error) => void>();

  constructor(
    private readonly fakeServer: FakeServer,
    config?: string | pg.ClientConfig
  ) {
    super(config);
  }

  connect(callback?: (err?: Error) => void): Promise<void> {
    const accepted = this.fakeServer.accept(this);
    if (!callback) return accepted;
    accepted.then(() => callback(), (error: Error) => callback(error));
    return Promise.resolve();
  }

  end(callback?: (err?: Error) => void): Promise<void> {
    this.closed = true;
    for (const reject of this.inFlight) {
      reject(new Error('Connection terminated'));
    }
    this.inFlight.clear();
    callback?.();
    return Promise.resolve();
  }

  // No socket to hold the event loop open
  ref(): void {}
  unref(): void {}

  async execute(sql: string, values: readonly unknown[] = [], options: QueryOptions = {}): Promise<RawResult> {
    if (this.closed) throw new Error('Connection terminated');
    this.statements.push({ sql, values, maxRows: options.maxRows });

    if (SESSION_STATEMENT.test(sql)) {
      return { fields: [], rows: [], command: sql.split(' ')[0], rowCount: null };
    }

    const response = await this.untilClosed(this.fakeServer.responder(sql, values, this.database ?? ''));
    const rows = response.rows ?? [];
    const columns = response.columns ?? [];
    return {
      fields: columns.map((name, i) => ({ name, dataTypeID: response.types?.[i] ?? OID.text })),
      rows: options.maxRows === undefined ? rows : rows.slice(0, options.maxRows),
      command: response.command ?? 'SELECT',
      rowCount: response.rowCount === undefined ? rows.length : response.rowCount,
    };
  }

  /** Statements other than session control, in order */
  get userStatements(): RecordedStatement[] {
    return this.statements.filter(s => !SESSION_STATEMENT.test(s.sql));
  }

  // In-flight statements fail when the client is ended, as with pg
  private untilClosed<T>(work: T | Promise<T>): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      this.inFlight.add(reject);
      Promise.resolve(work)
        .then(resolve, reject)
        .finally(() => this.inFlight.delete(reject));
    });
  }
}

function bindClientClass(server: FakeServer): ClientClass {
  return class extends FakeClient {
    constructor(config?: string | pg.ClientConfig) {
      super(server, config);
    }
  };
}

/**
 * Fake database server accepting FakeClients; databases listed in
 * `unreachable` refuse connections
 */
export class FakeServer {
  readonly connections: FakeClient[] = [];
  readonly unreachable = new Set<string>();
  readonly Client: ClientClass = bindClientClass(this);
  maxOpen = 0;

  constructor(readonly responder: Responder = () => ({})) {}

  get open(): number {
    return this.connections.filter(c => !c.closed).length;
  }

  accept(client: FakeClient): Promise<void> {
    if (this.unreachable.has(client.database ?? '')) {
      return Promise.reject(new Error(`connect ECONNREFUSED ${client.host}:${client.port}`));
    }
    this.connections.push(client);
    this.maxOpen = Math.max(this.maxOpen, this.open);
    return Promise.resolve();
  }
}

export function makeTarget(name = 'demo', overrides: Partial<Target> = {}): Target {
  return {
    name,
    host: 'db.test',
    port: 5432,
    user: 'app',
    password: 'test-secret',
    database: name,
    charset: null,
    ...overrides,
  };
}

export function makeSettings(overrides: Partial<GatewaySettings> = {}): GatewaySettings {
  return {
    targets: [makeTarget()],
    connectTimeoutMs: 1000,
    readTimeoutMs: 30_000,
    writeTimeoutMs: 20_000,
    acquireTimeoutMs: 1000,
    shutdownTimeoutMs: 100,
    readOnly: true,
    maxPoolSize: 2,
    maxResults: 100,
    ...overrides,
  };
}

export function delay(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}
