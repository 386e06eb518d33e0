/**
 * Named parameter binding for PostgreSQL statements.
 *
 * `:name` placeholders become `$n` positions for the driver. Quoted strings,
 * quoted identifiers, dollar-quoted bodies, comments and `::` casts are
 * copied through untouched, and so is every `?`.
 */

import type { BindingValue, QueryParams } from '../types/models.js';

export interface PositionalStatement {
  text: string;
  values: BindingValue[];
}

const NAME_START = /[A-Za-z_]/;
const NAME_PART = /[A-Za-z0-9_]/;
const POSITION = /[0-9]/;
const DOLLAR_TAG = /^\$(?:[A-Za-z_][A-Za-z0-9_]*)?\$/;

function isNamePart(char: string | undefined): boolean {
  return char !== undefined && NAME_PART.test(char);
}

/**
 * Index just past a quoted run that closes with `quote`. A doubled quote
 * stays inside the run; so does a backslash-escaped one when `backslashes`.
 */
function endOfQuoted(sql: string, start: number, quote: string, backslashes: boolean): number {
  let i = start + 1;
  while (i < sql.length) {
    const char = sql[i];
    if (backslashes && char === '\\') {
      i += 2;
    } else if (char === quote) {
      if (sql[i + 1] !== quote) {
        return i + 1;
      }
      i += 2;
    } else {
      i++;
    }
  }
  return sql.length;
}

function endOfBlockComment(sql: string, start: number): number {
  let depth = 0;
  let i = start;
  while (i < sql.length) {
    if (sql.startsWith('/*', i)) {
      depth++;
      i += 2;
    } else if (sql.startsWith('*/', i)) {
      depth--;
      i += 2;
      if (depth === 0) {
        return i;
      }
    } else {
      i++;
    }
  }
  return sql.length;
}

/**
 * End of the literal, identifier or comment starting at `start`, or `start`
 * itself when none starts there. Unterminated runs extend to the end of the
 * text and are left for the server to reject.
 */
function endOfOpaqueRun(sql: string, start: number): number {
  const char = sql[start];

  if (char === "'") {
    const prefix = sql[start - 1];
    const escaped = (prefix === 'E' || prefix === 'e') && !isNamePart(sql[start - 2]);
    return endOfQuoted(sql, start, "'", escaped);
  }
  if (char === '"') {
    return endOfQuoted(sql, start, '"', false);
  }
  if (sql.startsWith('--', start)) {
    const newline = sql.indexOf('\n', start);
    return newline === -1 ? sql.length : newline;
  }
  if (sql.startsWith('/*', start)) {
    return endOfBlockComment(sql, start);
  }
  if (char === '$' && !isNamePart(sql[start - 1])) {
    const tag = DOLLAR_TAG.exec(sql.slice(start))?.[0];
    if (tag) {
      const close = sql.indexOf(tag, start + tag.length);
      return close === -1 ? sql.length : close + tag.length;
    }
  }
  return start;
}

/**
 * Rewrite `:name` placeholders to `$n` and collect their values in order.
 * A name used twice shares one position. Without `params` the text is
 * returned exactly as given.
 *
 * @throws Error when a placeholder has no value in `params`, or the text
 * also uses `$n` positions
 */
export function bindNamedParams(sql: string, params?: QueryParams): PositionalStatement {
  if (!params) {
    return { text: sql, values: [] };
  }

  const positions = new Map<string, number>();
  const values: BindingValue[] = [];
  let text = '';
  let i = 0;

  while (i < sql.length) {
    const end = endOfOpaqueRun(sql, i);
    if (end > i) {
      text += sql.slice(i, end);
      i = end;
      continue;
    }

    const char = sql.charAt(i);
    if (char === ':' && sql[i + 1] === ':') {
      text += '::';
      i += 2;
      continue;
    }

    if (char === '$' && POSITION.test(sql.charAt(i + 1)) && !isNamePart(sql[i - 1])) {
      throw new Error('Positional $n parameters cannot be mixed with named parameters');
    }

    if (char === ':' && NAME_START.test(sql.charAt(i + 1))) {
      let nameEnd = i + 2;
      while (isNamePart(sql[nameEnd])) {
        nameEnd++;
      }
      const name = sql.slice(i + 1, nameEnd);
      if (!Object.hasOwn(params, name)) {
        throw new Error(`No value bound for parameter :${name}`);
      }

      let position = positions.get(name);
      if (position === undefined) {
        values.push(params[name]);
        position = values.length;
        positions.set(name, position);
      }
      text += `$${position}`;
      i = nameEnd;
      continue;
    }

    text += char;
    i++;
  }

  return { text, values };
}
