/**
 * Minimal SQL lexer
 *
 * Splits SQL text into code, string literal, quoted identifier and comment
 * segments so that keyword and placeholder scans only look at code.
 * Covers PostgreSQL quoting: '...', E'...', $tag$...$tag$, "..." and
 * nested block comments.
 */

export type SegmentKind = 'code' | 'string' | 'identifier' | 'comment';

export interface Segment {
  kind: SegmentKind;
  text: string;
}

const DOLLAR_TAG = /^\$([A-Za-z_][A-Za-z0-9_]*)?\$/;

function isWordChar(ch: string | undefined): boolean {
  return ch !== undefined && /[A-Za-z0-9_$]/.test(ch);
}

export function tokenize(sql: string): Segment[] {
  const segments: Segment[] = [];
  let code = '';
  let i = 0;

  const push = (kind: SegmentKind, end: number) => {
    if (code) {
      segments.push({ kind: 'code', text: code });
      code = '';
    }
    segments.push({ kind, text: sql.slice(i, end) });
    i = end;
  };

  while (i < sql.length) {
    const ch = sql[i];
    const next = sql[i + 1];

    if (ch === '-' && next === '-') {
      const newline = sql.indexOf('\n', i);
      push('comment', newline === -1 ? sql.length : newline);
    } else if (ch === '/' && next === '*') {
      let depth = 1;
      let j = i + 2;
      while (j < sql.length && depth > 0) {
        if (sql[j] === '/' && sql[j + 1] === '*') {
          depth++;
          j += 2;
        } else if (sql[j] === '*' && sql[j + 1] === '/') {
          depth--;
          j += 2;
        } else {
          j++;
        }
      }
      push('comment', j);
    } else if (ch === "'") {
      const escaped = (sql[i - 1] === 'E' || sql[i - 1] === 'e') && !isWordChar(sql[i - 2]);
      push('string', endOfQuoted(sql, i, "'", escaped));
    } else if (ch === '"') {
      push('identifier', endOfQuoted(sql, i, '"', false));
    } else if (ch === '$' && !isWordChar(sql[i - 1])) {
      const tag = DOLLAR_TAG.exec(sql.slice(i));
      if (tag) {
        const close = sql.indexOf(tag[0], i + tag[0].length);
        push('string', close === -1 ? sql.length : close + tag[0].length);
      } else {
        code += ch;
        i++;
      }
    } else {
      code += ch;
      i++;
    }
  }

  if (code) segments.push({ kind: 'code', text: code });
  return segments;
}

/**
 * Index just past the closing quote; doubled quotes stay inside
 */
function endOfQuoted(sql: string, start: number, quote: string, backslashEscapes: boolean): number {
  let j = start + 1;
  while (j < sql.length) {
    const ch = sql[j];
    if (backslashEscapes && ch === '\\') {
      j += 2;
      continue;
    }
    if (ch === quote) {
      if (sql[j + 1] === quote) {
        j += 2;
        continue;
      }
      return j + 1;
    }
    j++;
  }
  return sql.length;
}

/**
 * SQL with every non-code segment replaced by a single space
 */
export function codeOnly(sql: string): string {
  return tokenize(sql)
    .map(s => (s.kind === 'code' ? s.text : ' '))
    .join('');
}
