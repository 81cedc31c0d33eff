/**
 * Table
 * Table descriptor built from a record of column declarations
 *
 * @example
 * ```typescript
 * const User = defineTable('User', {
 *   id: column(types.integer(), { primary: true }),
 *   first: column(types.text()),
 *   last: column(types.text(), { nullable: true }),
 * });
 *
 * User.name;         // "user"
 * User.createTable(); // CREATE TABLE IF NOT EXISTS "user" (...);
 * ```
 */

import { UnknownColumnError, ValidationError } from '../errors';
import { toSnake } from '../utils/snake';
import { postgresDialect } from './dialects/PostgreSQLDialect';

import type { Column } from './Column';

export type ColumnMap = Record<string, Column>;

export class Table<C extends ColumnMap = ColumnMap> {
  /** Quoted snake_case table name, e.g. `"user_account"` */
  readonly name: string;
  /** The declared columns, keyed by field name */
  readonly columns: C;
  /** Columns in declaration order */
  readonly columnList: readonly Column[];

  constructor(
    public readonly className: string,
    columns: C,
  ) {
    const tableName = toSnake(className);
    if (!tableName) {
      throw new ValidationError(`Cannot derive a table name from "${className}"`, 'name');
    }
    this.name = postgresDialect.quoteIdentifier(tableName);

    for (const [field, column] of Object.entries(columns)) {
      column.bind(this.name, field);
    }
    this.columns = columns;
    this.columnList = Object.values(columns);
  }

  /**
   * Resolve a column by field name
   */
  column(field: string): Column {
    if (!Object.hasOwn(this.columns, field)) {
      throw new UnknownColumnError(this.name, field);
    }
    return this.columns[field];
  }

  /**
   * Generate CREATE TABLE (and CREATE INDEX) statements
   */
  createTable(): string {
    return postgresDialect.createTable(this);
  }

  /**
   * Generate DROP TABLE IF EXISTS statement
   */
  dropTable(): string {
    return `${postgresDialect.dropTableIfExists(this.name)};`;
  }

  toString(): string {
    return this.name;
  }
}

/**
 * Declare a table. The name is converted to snake_case; columns are bound in
 * declaration order and cannot be shared with another table.
 */
export function defineTable<C extends ColumnMap>(name: string, columns: C): Table<C> {
  return new Table(name, columns);
}
