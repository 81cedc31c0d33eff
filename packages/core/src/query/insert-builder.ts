/**
 * Insert Query Builder
 *
 * @example
 * ```typescript
 * insertInto(User).values({ id: 1, first: 'Potato' }).prepare();
 * // sql:    INSERT INTO "user" ("id", "first") VALUES (?, ?)
 * // params: [1, 'Potato']
 *
 * // Column keys and subqueries
 * insertInto(Audit)
 *   .values(new Map([[Audit.columns.userId, select(User.columns.id).from(User).limit(1)]]))
 *   .returning(Audit.columns.id)
 *   .prepare();
 * ```
 */

import { postgresDialect } from '../schema/dialects/PostgreSQLDialect';
import { prepareValue, resolveAssignments } from './assignments';
import { Clause } from './clause';
import { joinPrepared } from './query-node';
import { Returnable } from './returning';

import type { Assignment, Assignments } from './assignments';
import type { ColumnMap, Table } from '../schema/Table';
import type { PreparedQuery } from '../types';

export class InsertInto<C extends ColumnMap = ColumnMap> extends Clause {
  constructor(public readonly table: Table<C>) {
    super();
  }

  /**
   * Set the row to insert; an empty set inserts DEFAULT VALUES
   */
  values(values: Assignments<C>): Values<C> {
    return new Values(this, values);
  }

  protected fragment(): PreparedQuery {
    return { sql: `INSERT INTO ${this.table.name}`, params: [] };
  }
}

export class Values<C extends ColumnMap = ColumnMap> extends Returnable {
  private readonly assignments: Assignment[];

  constructor(insert: InsertInto<C>, values: Assignments<C>) {
    super(insert);
    this.assignments = resolveAssignments(insert.table, values);
  }

  protected fragment(): PreparedQuery {
    if (this.assignments.length === 0) {
      return { sql: ' DEFAULT VALUES', params: [] };
    }

    const columns = this.assignments
      .map(({ column }) => postgresDialect.quoteIdentifier(column.name))
      .join(', ');
    const { sql, params } = joinPrepared(
      this.assignments.map(({ value }) => prepareValue(value)),
      ', ',
    );

    return { sql: ` (${columns}) VALUES (${sql})`, params };
  }
}
