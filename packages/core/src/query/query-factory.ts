/**
 * Query Factory
 *
 * Entry points for every statement chain.
 *
 * @example
 * ```typescript
 * select(User).from(User).where(User.columns.id.eq(2)).prepare();
 * insertInto(User).values({ id: 1 }).prepare();
 * update(User).set({ first: 'Potato' }).where(User.columns.id.eq(1)).prepare();
 * deleteFrom(User).where(User.columns.id.eq(1)).prepare();
 * ```
 */

import { Delete } from './delete-builder';
import { InsertInto } from './insert-builder';
import { Select } from './select-builder';
import { Update } from './update-builder';

import type { SelectTarget } from './clause';
import type { ColumnMap, Table } from '../schema/Table';

/**
 * Start a SELECT with columns, aliased expressions or whole tables
 */
export function select(...targets: SelectTarget[]): Select {
  return new Select(targets);
}

/**
 * Start an INSERT INTO statement
 */
export function insertInto<C extends ColumnMap>(table: Table<C>): InsertInto<C> {
  return new InsertInto(table);
}

/**
 * Start an UPDATE statement
 */
export function update<C extends ColumnMap>(table: Table<C>): Update<C> {
  return new Update(table);
}

/**
 * Start a DELETE FROM statement
 */
export function deleteFrom(table: Table): Delete {
  return new Delete(table);
}
