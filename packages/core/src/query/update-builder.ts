/**
 * Update Query Builder
 *
 * @example
 * ```typescript
 * update(User)
 *   .set({ first: 'Potato', id: select(Task.columns.id).from(Task).where(Task.columns.id.eq(1)) })
 *   .where(User.columns.id.eq(2))
 *   .prepare();
 * // sql:    UPDATE "user" SET "first" = ?, "id" = (SELECT "task".id FROM "task" WHERE "task".id = ?) WHERE "user".id = ?
 * // params: ['Potato', 1, 2]
 * ```
 */

import { ValidationError } from '../errors';
import { postgresDialect } from '../schema/dialects/PostgreSQLDialect';
import { prepareValue, resolveAssignments } from './assignments';
import { Clause } from './clause';
import { joinPrepared } from './query-node';
import { Returnable } from './returning';
import { MutationWhere } from './where-builder';

import type { Assignment, Assignments } from './assignments';
import type { Condition } from './expression';
import type { ColumnMap, Table } from '../schema/Table';
import type { PreparedQuery } from '../types';

export class Update<C extends ColumnMap = ColumnMap> extends Clause {
  constructor(public readonly table: Table<C>) {
    super();
  }

  /**
   * Set columns to update
   */
  set(values: Assignments<C>): SetClause<C> {
    return new SetClause(this, values);
  }

  protected fragment(): PreparedQuery {
    return { sql: `UPDATE ${this.table.name}`, params: [] };
  }
}

export class SetClause<C extends ColumnMap = ColumnMap> extends Returnable {
  private readonly assignments: Assignment[];

  constructor(update: Update<C>, values: Assignments<C>) {
    super(update);
    this.assignments = resolveAssignments(update.table, values);
    if (this.assignments.length === 0) {
      throw new ValidationError(`No columns to update in ${update.table.name}`, 'values');
    }
  }

  /**
   * Add WHERE condition
   */
  where(condition: Condition): MutationWhere {
    return new MutationWhere(this, condition);
  }

  protected fragment(): PreparedQuery {
    const { sql, params } = joinPrepared(
      this.assignments.map(({ column, value }) => {
        const prepared = prepareValue(value);
        return {
          sql: `${postgresDialect.quoteIdentifier(column.name)} = ${prepared.sql}`,
          params: prepared.params,
        };
      }),
      ', ',
    );
    return { sql: ` SET ${sql}`, params };
  }
}
