/**
 * Policy guard
 * Statement classification, read-only gating, parameter binding and row capping
 *
 * Classification is a lexical heuristic, not a parser. Literals, quoted
 * identifiers and comments are neutralized first, then each statement is
 * judged by its leading keyword. Read-only mode also runs statements in a
 * READ ONLY transaction, so the server rejects whatever this misses.
 */

import { ParameterBindingError, ReadOnlyViolationError } from '../errors.js';
import { BoundStatement, QueryParameter, StatementKind } from '../types/index.js';
import { codeOnly, tokenize } from './sql-lexer.js';

/**
 * Keywords that turn a WITH or EXPLAIN statement into a write
 * (data-modifying CTEs, EXPLAIN ANALYZE of a write)
 */
const MODIFYING_KEYWORDS =
  /\b(INSERT|UPDATE|DELETE|MERGE|TRUNCATE|DROP|CREATE|ALTER|GRANT|REVOKE|COPY|INTO)\b/i;

const LEADING_KEYWORD = /^[\s(]*([A-Za-z]+)/;

const NUMBERED_PLACEHOLDER = /(?<![\w$])\$(\d+)/g;
const FORMAT_PLACEHOLDER = /%s(?![A-Za-z0-9_])/g;

function isReadStatement(statement: string): boolean {
  const match = LEADING_KEYWORD.exec(statement);
  if (!match) return false;

  const keyword = match[1].toUpperCase();
  switch (keyword) {
    case 'SELECT':
      // SELECT ... INTO creates a table
      return !/\bINTO\b/i.test(statement);
    case 'WITH':
    case 'EXPLAIN':
      return !MODIFYING_KEYWORDS.test(statement);
    case 'SHOW':
    case 'DESCRIBE':
      return true;
    default:
      return false;
  }
}

/**
 * Classify SQL as READ or WRITE. A batch is WRITE if any statement is;
 * empty input is WRITE.
 */
export function classifyStatement(sql: string): StatementKind {
  const statements = codeOnly(sql)
    .split(';')
    .map(s => s.trim())
    .filter(Boolean);

  if (statements.length === 0) return 'WRITE';
  return statements.every(isReadStatement) ? 'READ' : 'WRITE';
}

/**
 * Check placeholders against parameters and produce a driver-ready statement.
 * `%s` placeholders are rewritten to `$1..$n`; values are never inlined.
 */
export function bindParameters(
  sql: string,
  parameters: readonly QueryParameter[] = []
): BoundStatement {
  let highestNumbered = 0;
  let formatCount = 0;

  const text = tokenize(sql)
    .map(segment => {
      if (segment.kind !== 'code') return segment.text;
      for (const match of segment.text.matchAll(NUMBERED_PLACEHOLDER)) {
        highestNumbered = Math.max(highestNumbered, parseInt(match[1], 10));
      }
      return segment.text.replace(FORMAT_PLACEHOLDER, () => `$${++formatCount}`);
    })
    .join('');

  if (highestNumbered > 0 && formatCount > 0) {
    throw new ParameterBindingError('Cannot mix $n and %s placeholders in one statement');
  }

  const expected = highestNumbered || formatCount;
  if (parameters.length !== expected) {
    throw new ParameterBindingError(
      `Statement expects ${expected} parameter(s) but ${parameters.length} were provided`
    );
  }

  return { text, values: [...parameters] };
}

/**
 * Keep at most `limit` rows
 */
export function capRows<T>(rows: readonly T[], limit: number): { rows: T[]; truncated: boolean } {
  if (rows.length <= limit) return { rows: [...rows], truncated: false };
  return { rows: rows.slice(0, limit), truncated: true };
}

export class PolicyGuard {
  constructor(readonly readOnly: boolean) {}

  /**
   * Classify a statement and refuse writes in read-only mode
   */
  check(sql: string): StatementKind {
    const kind = classifyStatement(sql);
    if (kind === 'WRITE' && this.readOnly) {
      throw new ReadOnlyViolationError();
    }
    return kind;
  }
}
