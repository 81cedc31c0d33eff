/**
 * Column
 * Typed column descriptor; binds to its table once, when the table is defined
 *
 * @example
 * ```typescript
 * const User = defineTable('User', {
 *   id: column(types.uuid(), { primary: true }),
 *   email: column(types.varchar(255), { unique: true }),
 * });
 *
 * User.columns.email.qualifiedName; // "user".email
 * User.columns.email.eq('a@example.com').prepare();
 * ```
 */

import { ValidationError } from '../errors';
import { Operand } from '../query/expression';
import { PgEnum } from './PgEnum';

import type { PreparedQuery } from '../types';
import type {
  ColumnDefinition,
  ColumnOptions,
  ColumnReference,
  ColumnType,
  SortDirection,
} from './types';

export class Column extends Operand implements ColumnReference {
  readonly definition: ColumnDefinition;
  private boundTable?: string;
  private boundName?: string;
  private sortDirection: SortDirection = 'ASC';

  constructor(type?: ColumnType, options: ColumnOptions = {}) {
    super();
    this.definition = {
      type,
      check: options.check,
      defaultValue: options.default,
      foreignKey: options.foreignKey,
      index: options.index ?? false,
      nullable: options.nullable ?? false,
      primary: options.primary ?? false,
      unique: options.unique ?? false,
    };
  }

  /**
   * Quoted name of the owning table
   */
  get table(): string {
    if (this.boundTable === undefined) {
      throw new ValidationError('Column is not bound to a table', 'table');
    }
    return this.boundTable;
  }

  /**
   * Field name the column was declared under
   */
  get name(): string {
    if (this.boundName === undefined) {
      throw new ValidationError('Column is not bound to a table', 'name');
    }
    return this.boundName;
  }

  get isBound(): boolean {
    return this.boundTable !== undefined;
  }

  get direction(): SortDirection {
    return this.sortDirection;
  }

  /**
   * `"table".name`, the column's identity in rendered SQL
   */
  get qualifiedName(): string {
    return `${this.table}.${this.name}`;
  }

  /**
   * Attach the column to a table. Called by defineTable().
   */
  bind(table: string, name: string): this {
    if (this.isBound) {
      throw new ValidationError(
        `Column ${this.qualifiedName} is already bound and cannot be reused as ${table}.${name}`,
        name,
      );
    }
    this.boundTable = table;
    this.boundName = name;
    return this;
  }

  /**
   * Sort ascending in ORDER BY
   */
  asc(): Column {
    return this.withDirection('ASC');
  }

  /**
   * Sort descending in ORDER BY
   */
  desc(): Column {
    return this.withDirection('DESC');
  }

  prepare(): PreparedQuery {
    return { sql: this.qualifiedName, params: [] };
  }

  override toString(): string {
    return this.qualifiedName;
  }

  private withDirection(direction: SortDirection): Column {
    const derived = new Column().bind(this.table, this.name);
    derived.sortDirection = direction;
    return derived;
  }
}

/**
 * Declare a column; it is bound when passed to defineTable().
 * A foreign key column may omit its type and borrow the referenced one.
 */
export function column(options?: ColumnOptions): Column;
export function column(type: ColumnType, options?: ColumnOptions): Column;
export function column(typeOrOptions?: ColumnType | ColumnOptions, options: ColumnOptions = {}): Column {
  if (typeOrOptions === undefined) {
    return new Column(undefined, options);
  }
  if (isColumnType(typeOrOptions)) {
    return new Column(typeOrOptions, options);
  }
  return new Column(undefined, typeOrOptions);
}

function isColumnType(value: ColumnType | ColumnOptions): value is ColumnType {
  return value instanceof PgEnum || 'kind' in value;
}
