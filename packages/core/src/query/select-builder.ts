/**
 * Select Query Builder
 *
 * Immutable clause chain for SELECT statements. Each node only exposes the
 * clauses that may legally follow it:
 *
 * Select → From → (Join → On)* → Where? → OrderBy? → Limit / Offset
 *
 * @example
 * ```typescript
 * const { id, userId, value } = Task.columns;
 *
 * select(User, value.as('task_value'))
 *   .from(User)
 *   .leftJoin(Task)
 *   .on(userId.eq(User.columns.id))
 *   .where(value.gt(10))
 *   .or(value.eq(null))
 *   .orderBy(id.desc())
 *   .limit(20)
 *   .offset(40)
 *   .prepare();
 * ```
 */

import { MissingJoinConditionError, ValidationError } from '../errors';
import { Clause, prepareTargets, validateTargets } from './clause';
import { prepareCondition } from './expression';
import { prepareConnective } from './where-builder';

import type { SelectTarget } from './clause';
import type { Condition } from './expression';
import type { WhereConnective } from './where-builder';
import type { Column } from '../schema/Column';
import type { Table } from '../schema/Table';
import type { Preparable, PreparedQuery } from '../types';

export type JoinKind = 'JOIN' | 'LEFT JOIN' | 'RIGHT JOIN' | 'FULL JOIN';

// ============ Capabilities ============

/**
 * Any renderable SELECT chain; usable as a subquery value in INSERT and UPDATE
 */
export abstract class SelectStatement extends Clause {}

export abstract class Paginatable extends SelectStatement {
  /**
   * Set LIMIT, rendered verbatim
   */
  limit(count: number): Limit {
    return new Limit(this, count);
  }

  /**
   * Set OFFSET, rendered verbatim
   */
  offset(count: number): Offset {
    return new Offset(this, count);
  }
}

export abstract class Orderable extends Paginatable {
  /**
   * Add ORDER BY; each column carries its direction (see Column.asc/desc)
   */
  orderBy(...columns: Column[]): OrderBy {
    return new OrderBy(this, columns);
  }
}

export abstract class Filterable extends Orderable {
  /**
   * Add WHERE condition
   */
  where(condition: Condition): Where {
    return new Where(this, condition);
  }
}

export abstract class Joinable extends Filterable {
  /**
   * Add INNER JOIN
   */
  join(table: Table): Join {
    return new Join(this, table, 'JOIN');
  }

  /**
   * Add LEFT JOIN
   */
  leftJoin(table: Table): Join {
    return new Join(this, table, 'LEFT JOIN');
  }

  /**
   * Add RIGHT JOIN
   */
  rightJoin(table: Table): Join {
    return new Join(this, table, 'RIGHT JOIN');
  }

  /**
   * Add FULL JOIN
   */
  fullJoin(table: Table): Join {
    return new Join(this, table, 'FULL JOIN');
  }
}

// ============ Clauses ============

export class Select extends SelectStatement {
  private readonly targets: SelectTarget[];

  constructor(targets: readonly SelectTarget[]) {
    super();
    if (targets.length === 0) {
      throw new ValidationError('select() needs at least one column, alias or table', 'targets');
    }
    this.targets = validateTargets(targets);
  }

  /**
   * Set table to select from
   */
  from(table: Table): From {
    return new From(this, table);
  }

  protected fragment(): PreparedQuery {
    const { sql, params } = prepareTargets(this.targets);
    return { sql: `SELECT ${sql}`, params };
  }
}

export class From extends Joinable {
  constructor(
    predecessor: Select,
    public readonly table: Table,
  ) {
    super(predecessor);
  }

  protected fragment(): PreparedQuery {
    return { sql: ` FROM ${this.table.name}`, params: [] };
  }
}

/**
 * Pending join; only on() may follow
 */
export class Join extends Clause {
  constructor(
    private readonly source: Joinable,
    public readonly table: Table,
    public readonly kind: JoinKind,
  ) {
    super(source);
  }

  /**
   * Set the join condition
   */
  on(condition: Condition): On {
    return new On(this.source, this, condition);
  }

  protected fragment(): PreparedQuery {
    throw new MissingJoinConditionError(this.table.name);
  }
}

export class On extends Joinable {
  constructor(
    predecessor: Preparable,
    private readonly pending: Join,
    private readonly condition: Condition,
  ) {
    super(predecessor);
  }

  protected fragment(): PreparedQuery {
    const { sql, params } = prepareCondition(this.condition);
    return { sql: ` ${this.pending.kind} ${this.pending.table.name} ON ${sql}`, params };
  }
}

export class Where extends Orderable {
  constructor(
    predecessor: Preparable,
    private readonly condition: Condition,
    private readonly connective: WhereConnective = 'WHERE',
  ) {
    super(predecessor);
  }

  /**
   * Add AND condition
   */
  and(condition: Condition): Where {
    return new Where(this, condition, 'AND');
  }

  /**
   * Add AND NOT condition
   */
  andNot(condition: Condition): Where {
    return new Where(this, condition, 'AND NOT');
  }

  /**
   * Add OR condition
   */
  or(condition: Condition): Where {
    return new Where(this, condition, 'OR');
  }

  /**
   * Add OR NOT condition
   */
  orNot(condition: Condition): Where {
    return new Where(this, condition, 'OR NOT');
  }

  protected fragment(): PreparedQuery {
    return prepareConnective(this.connective, this.condition);
  }
}

export class OrderBy extends Paginatable {
  private readonly columns: readonly Column[];

  constructor(predecessor: Preparable, columns: readonly Column[]) {
    super(predecessor);
    if (columns.length === 0) {
      throw new ValidationError('orderBy() needs at least one column', 'columns');
    }
    this.columns = columns;
  }

  protected fragment(): PreparedQuery {
    const order = this.columns
      .map((column) => `${column.qualifiedName} ${column.direction}`)
      .join(', ');
    return { sql: ` ORDER BY ${order}`, params: [] };
  }
}

export class Limit extends SelectStatement {
  constructor(
    predecessor: Preparable,
    public readonly count: number,
  ) {
    super(predecessor);
  }

  /**
   * Set OFFSET after LIMIT
   */
  offset(count: number): Paginated {
    return new Paginated(this, 'OFFSET', count);
  }

  protected fragment(): PreparedQuery {
    return { sql: ` LIMIT ${this.count}`, params: [] };
  }
}

export class Offset extends SelectStatement {
  constructor(
    predecessor: Preparable,
    public readonly count: number,
  ) {
    super(predecessor);
  }

  /**
   * Set LIMIT after OFFSET
   */
  limit(count: number): Paginated {
    return new Paginated(this, 'LIMIT', count);
  }

  protected fragment(): PreparedQuery {
    return { sql: ` OFFSET ${this.count}`, params: [] };
  }
}

/**
 * Both LIMIT and OFFSET set; nothing may follow
 */
export class Paginated extends SelectStatement {
  constructor(
    predecessor: Preparable,
    public readonly keyword: 'LIMIT' | 'OFFSET',
    public readonly count: number,
  ) {
    super(predecessor);
  }

  protected fragment(): PreparedQuery {
    return { sql: ` ${this.keyword} ${this.count}`, params: [] };
  }
}
