/**
 * Where Builder
 *
 * WHERE clause rendering shared by SELECT, UPDATE and DELETE, and the
 * condition chain used by UPDATE and DELETE.
 *
 * - `where(cond)` renders ` WHERE cond`
 * - `.and(cond)`, `.or(cond)`, `.andNot(cond)`, `.orNot(cond)` append a connective
 * - a logic gate passed directly is parenthesized: `WHERE (a AND b) OR c`
 */

import { prepareCondition } from './expression';
import { Returnable } from './returning';

import type { BooleanOperator, Condition } from './expression';
import type { Preparable, PreparedQuery } from '../types';

export type WhereConnective = 'WHERE' | BooleanOperator;

/**
 * Render ` <connective> <condition>`
 */
export function prepareConnective(connective: WhereConnective, condition: Condition): PreparedQuery {
  const { sql, params } = prepareCondition(condition);
  return { sql: ` ${connective} ${sql}`, params };
}

/**
 * WHERE clause of an UPDATE or DELETE statement
 */
export class MutationWhere extends Returnable {
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
  and(condition: Condition): MutationWhere {
    return new MutationWhere(this, condition, 'AND');
  }

  /**
   * Add AND NOT condition
   */
  andNot(condition: Condition): MutationWhere {
    return new MutationWhere(this, condition, 'AND NOT');
  }

  /**
   * Add OR condition
   */
  or(condition: Condition): MutationWhere {
    return new MutationWhere(this, condition, 'OR');
  }

  /**
   * Add OR NOT condition
   */
  orNot(condition: Condition): MutationWhere {
    return new MutationWhere(this, condition, 'OR NOT');
  }

  protected fragment(): PreparedQuery {
    return prepareConnective(this.connective, this.condition);
  }
}
