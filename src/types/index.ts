/**
 * Type definitions for the database gateway
 */

/**
 * One database endpoint addressable by name
 */
export interface Target {
  name: string;
  host: string;
  port: number;
  user: string;
  password: string;
  database: string;
  charset: string | null;
}

/**
 * Values a row cell can hold once normalized
 */
export type JsonValue = string | number | boolean | null;

/**
 * Parameter accepted for positional binding
 */
export type QueryParameter = string | number | boolean | null;

export type Row = Record<string, JsonValue>;

export type StatementKind = 'READ' | 'WRITE';

/**
 * Statement ready to hand to the driver
 */
export interface BoundStatement {
  text: string;
  values: QueryParameter[];
}

/**
 * Query result with metadata
 */
export interface QueryResult {
  columns: string[];
  rows: Row[];
  rowCount: number;
  truncated: boolean;
  /** Rows touched by a write, null for reads */
  affectedRows: number | null;
}

export type ColumnKey = 'PRI' | 'UNI' | 'MUL' | '';

export type ColumnExtra = 'identity' | 'generated' | '';

export interface ForeignKeyRef {
  referenced_table: string;
  referenced_column: string;
}

/**
 * Column metadata as returned by the schema tools.
 * Field names are part of the tool contract.
 */
export interface ColumnDescriptor {
  type: string;
  nullable: boolean;
  default: string | null;
  key: ColumnKey;
  extra: ColumnExtra;
  foreign_key?: ForeignKeyRef;
}

/**
 * Columns of one table keyed by name, in catalog order
 */
export type SchemaDescriptor = Record<string, ColumnDescriptor>;

export interface TableRelations {
  table_name: string;
  columns: SchemaDescriptor;
}

/**
 * Snapshot of one target's pool
 */
export interface PoolStats {
  target: string;
  total: number;
  idle: number;
  inUse: number;
  waiting: number;
}
