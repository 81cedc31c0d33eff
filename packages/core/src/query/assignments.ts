/**
 * Column/value assignments for INSERT ... VALUES and UPDATE ... SET.
 *
 * Keys are field names (plain object or Map) or bound columns (Map). Values
 * are bound as params, except:
 * - a SELECT chain, rendered as a parenthesized subquery with its params in place
 * - a column or expression, rendered inline (`"user".counter + ?`)
 * - an enum member, whose value is bound
 */

import { PLACEHOLDER } from '../constants';
import { UnknownColumnError } from '../errors';
import { Column } from '../schema/Column';
import { PgEnumMember } from '../schema/PgEnum';
import { Operand } from './expression';
import { SelectStatement } from './select-builder';

import type { ColumnMap, Table } from '../schema/Table';
import type { PreparedQuery } from '../types';

export type Assignments<C extends ColumnMap = ColumnMap> =
  | { readonly [K in keyof C & string]?: unknown }
  | Map<Column | string, unknown>;

export interface Assignment {
  column: Column;
  value: unknown;
}

/**
 * Resolve every key against the table, keeping iteration order
 */
export function resolveAssignments<C extends ColumnMap>(
  table: Table<C>,
  values: Assignments<C>,
): Assignment[] {
  const entries: Array<[Column | string, unknown]> =
    values instanceof Map ? [...values.entries()] : Object.entries(values);

  return entries.map(([key, value]) => {
    if (!(key instanceof Column)) {
      return { column: table.column(key), value };
    }
    if (key.table !== table.name) {
      throw new UnknownColumnError(table.name, key.qualifiedName);
    }
    return { column: key, value };
  });
}

/**
 * Render one assigned value
 */
export function prepareValue(value: unknown): PreparedQuery {
  if (value instanceof SelectStatement) {
    const { sql, params } = value.prepare();
    return { sql: `(${sql})`, params };
  }
  if (value instanceof Operand) {
    return value.prepare();
  }
  if (value instanceof PgEnumMember) {
    return { sql: PLACEHOLDER, params: [value.value] };
  }
  return { sql: PLACEHOLDER, params: [value] };
}
