/**
 * Placeholder dialects
 *
 * prepare() always emits `?`. Drivers such as `pg` expect numbered
 * placeholders instead: `$1, $2, ...`.
 *
 * @example
 * ```typescript
 * const { sql, params } = toNumberedPlaceholders(
 *   select(User).from(User).where(User.columns.id.eq(2)).prepare(),
 * );
 * await pool.query(sql, params);
 * ```
 */

import { PLACEHOLDER } from '../constants';

import type { PreparedQuery } from '../types';

/**
 * Rewrite `?` placeholders as `$1, $2, ...`. Single-quoted literals and
 * double-quoted identifiers are copied unchanged.
 */
export function toNumberedPlaceholders(prepared: PreparedQuery): PreparedQuery {
  let index = 0;
  let quote: string | undefined;
  let sql = '';

  for (const char of prepared.sql) {
    if (quote) {
      if (char === quote) {
        quote = undefined;
      }
      sql += char;
    } else if (char === "'" || char === '"') {
      quote = char;
      sql += char;
    } else if (char === PLACEHOLDER) {
      sql += `$${++index}`;
    } else {
      sql += char;
    }
  }

  return { sql, params: [...prepared.params] };
}
