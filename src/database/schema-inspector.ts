/**
 * Schema introspection
 * Reads the PostgreSQL catalog on every call; nothing is cached, so results
 * always reflect the live schema
 */

import { z } from 'zod';
import { ExecutionError } from '../errors.js';
import { ColumnDescriptor, SchemaDescriptor, TableRelations, Target } from '../types/index.js';
import { QueryExecutor } from './executor.js';
import { TargetRegistry } from './registry.js';

const LIST_DATABASES_SQL = `
  SELECT datname
  FROM pg_database
  WHERE NOT datistemplate
    AND datallowconn
  ORDER BY datname
`;

// Names visible on the search path are listed bare, others schema-qualified
const LIST_TABLES_SQL = `
  SELECT
    CASE WHEN t.table_schema = ANY (current_schemas(false))
      THEN t.table_name
      ELSE t.table_schema || '.' || t.table_name
    END AS name
  FROM information_schema.tables t
  WHERE t.table_schema <> 'information_schema'
    AND left(t.table_schema, 3) <> 'pg_'
    AND t.table_type IN ('BASE TABLE', 'VIEW', 'FOREIGN')
  ORDER BY t.table_schema <> ALL (current_schemas(false)), t.table_schema, t.table_name
`;

// $1 = schema or NULL for a search-path lookup, $2 = table name, matched exactly
const RELATION_CTE = `
  WITH rel AS (
    SELECT c.oid
    FROM pg_class c
    JOIN pg_namespace n ON n.oid = c.relnamespace
    WHERE c.relname = $2
      AND c.relkind IN ('r', 'p', 'v', 'm', 'f')
      AND CASE WHEN $1::text IS NULL THEN pg_table_is_visible(c.oid) ELSE n.nspname = $1::text END
    LIMIT 1
  )
`;

const COLUMNS_SQL = `
  ${RELATION_CTE}
  SELECT
    a.attname AS column_name,
    format_type(a.atttypid, a.atttypmod) AS data_type,
    NOT a.attnotnull AS is_nullable,
    CASE WHEN a.attgenerated <> 's' THEN pg_get_expr(d.adbin, d.adrelid) END AS column_default,
    CASE
      WHEN EXISTS (
        SELECT 1 FROM pg_index i
        WHERE i.indrelid = a.attrelid AND i.indisprimary AND a.attnum = ANY (i.indkey)
      ) THEN 'PRI'
      WHEN EXISTS (
        SELECT 1 FROM pg_index i
        WHERE i.indrelid = a.attrelid AND i.indisunique AND i.indnkeyatts = 1 AND i.indkey[0] = a.attnum
      ) THEN 'UNI'
      WHEN EXISTS (
        SELECT 1 FROM pg_index i
        WHERE i.indrelid = a.attrelid AND i.indkey[0] = a.attnum
      ) THEN 'MUL'
      ELSE ''
    END AS column_key,
    CASE
      WHEN a.attidentity IN ('a', 'd') THEN 'identity'
      WHEN a.attgenerated = 's' THEN 'generated'
      ELSE ''
    END AS extra
  FROM rel
  JOIN pg_attribute a ON a.attrelid = rel.oid
  LEFT JOIN pg_attrdef d ON d.adrelid = a.attrelid AND d.adnum = a.attnum
  WHERE a.attnum > 0
    AND NOT a.attisdropped
  ORDER BY a.attnum
`;

// A column in several foreign keys reports the first constraint by name
const FOREIGN_KEYS_SQL = `
  ${RELATION_CTE}
  SELECT DISTINCT ON (a.attname)
    a.attname AS column_name,
    con.confrelid::regclass::text AS referenced_table,
    fa.attname AS referenced_column
  FROM rel
  JOIN pg_constraint con ON con.conrelid = rel.oid AND con.contype = 'f'
  CROSS JOIN LATERAL unnest(con.conkey, con.confkey) AS cols(conkey_col, confkey_col)
  JOIN pg_attribute a ON a.attrelid = con.conrelid AND a.attnum = cols.conkey_col
  JOIN pg_attribute fa ON fa.attrelid = con.confrelid AND fa.attnum = cols.confkey_col
  ORDER BY a.attname, con.conname
`;

const databaseRow = z.object({ datname: z.string() });

const tableRow = z.object({ name: z.string() });

const columnRow = z.object({
  column_name: z.string(),
  data_type: z.string(),
  is_nullable: z.boolean(),
  column_default: z.string().nullable(),
  column_key: z.enum(['PRI', 'UNI', 'MUL', '']),
  extra: z.enum(['identity', 'generated', '']),
});

const foreignKeyRow = z.object({
  column_name: z.string(),
  referenced_table: z.string(),
  referenced_column: z.string(),
});

function parseRows<T>(schema: z.ZodType<T>, rows: unknown[]): T[] {
  const result = z.array(schema).safeParse(rows);
  if (!result.success) {
    const issue = result.error.issues[0];
    throw new ExecutionError(`Unexpected catalog row: ${issue.path.join('.')}: ${issue.message}`);
  }
  return result.data;
}

/**
 * Split `schema.table`; a bare name resolves through the search path
 */
export function splitTableName(name: string): { schema: string | null; table: string } {
  const dot = name.indexOf('.');
  if (dot <= 0 || dot === name.length - 1) return { schema: null, table: name };
  return { schema: name.slice(0, dot), table: name.slice(dot + 1) };
}

export class SchemaInspector {
  constructor(
    private readonly registry: TargetRegistry,
    private readonly executor: QueryExecutor
  ) {}

  /**
   * Configured databases that exist in their server's catalog.
   * A target that cannot be reached fails the whole call.
   */
  async listDatabases(): Promise<string[]> {
    const found = await Promise.all(
      this.registry.list().map(async target => {
        const rows = parseRows(databaseRow, await this.executor.catalogQuery(target, LIST_DATABASES_SQL));
        return rows.some(r => r.datname === target.database) ? target.name : null;
      })
    );
    return found.filter((name): name is string => name !== null);
  }

  /**
   * Tables and views of a database; unknown databases yield an empty list
   */
  async listTables(database: string): Promise<string[]> {
    const target = this.lookup(database);
    if (!target) return [];
    const rows = parseRows(tableRow, await this.executor.catalogQuery(target, LIST_TABLES_SQL));
    return rows.map(r => r.name);
  }

  /**
   * Column descriptors in catalog order; unknown database or table yields {}
   */
  async getSchema(database: string, table: string): Promise<SchemaDescriptor> {
    const target = this.lookup(database);
    if (!target) return {};

    const { schema, table: relname } = splitTableName(table);
    const rows = parseRows(columnRow, await this.executor.catalogQuery(target, COLUMNS_SQL, [schema, relname]));

    // fromEntries defines own properties, so a column named __proto__ survives
    return Object.fromEntries(
      rows.map((row): [string, ColumnDescriptor] => [
        row.column_name,
        {
          type: row.data_type,
          nullable: row.is_nullable,
          default: row.column_default,
          key: row.column_key,
          extra: row.extra,
        },
      ])
    );
  }

  /**
   * Column descriptors plus foreign_key on every referencing column.
   * Columns without a foreign key carry no foreign_key entry at all.
   */
  async getSchemaWithRelations(database: string, table: string): Promise<TableRelations> {
    const columns = await this.getSchema(database, table);
    const target = this.lookup(database);
    if (!target || Object.keys(columns).length === 0) {
      return { table_name: table, columns };
    }

    const { schema, table: relname } = splitTableName(table);
    const keys = parseRows(
      foreignKeyRow,
      await this.executor.catalogQuery(target, FOREIGN_KEYS_SQL, [schema, relname])
    );

    for (const key of keys) {
      if (Object.hasOwn(columns, key.column_name)) {
        columns[key.column_name].foreign_key = {
          referenced_table: key.referenced_table,
          referenced_column: key.referenced_column,
        };
      }
    }
    return { table_name: table, columns };
  }

  private lookup(database: string): Target | null {
    return database && this.registry.has(database) ? this.registry.resolve(database) : null;
  }
}
