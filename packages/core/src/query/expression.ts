/**
 * Expressions and Logic Gates
 *
 * Comparison and arithmetic expressions over columns, nested expressions and
 * literal values, plus the boolean combinators that join them.
 *
 * Literal rules for the right operand, resolved once at construction:
 * - Column: inlined as its qualified name, no param
 * - Expression: its SQL inlined, its params placed before the node's own
 * - null / undefined, true, false: inlined as NULL, TRUE, FALSE
 * - PgEnumMember: its value bound as a param
 * - anything else: bound as a param
 *
 * @example
 * ```typescript
 * const { id, last } = User.columns;
 * id.add(1).gt(Task.columns.id.sub(2)).and(last.eq(null).or(last.eq('Wedge'))).prepare();
 * // sql:    "user".id + ? > "task".id - ? AND ("user".last IS NULL OR "user".last = ?)
 * // params: [1, 2, 'Wedge']
 * ```
 */

import { PLACEHOLDER } from '../constants';
import { PgEnumMember } from '../schema/PgEnum';
import { QueryNode } from './query-node';

import type { PreparedQuery } from '../types';

export type ComparisonOperator = '>' | '>=' | '<' | '<=' | '=' | '!=' | 'IS' | 'IS NOT';
export type ArithmeticOperator = '+' | '-' | '*' | '/' | '%';
export type ExpressionOperator = ComparisonOperator | ArithmeticOperator;
export type BooleanOperator = 'AND' | 'AND NOT' | 'OR' | 'OR NOT';

/** Anything usable as a WHERE / ON condition */
export type Condition = Expression | LogicGate;

/**
 * Values rendered as SQL keywords instead of params; compared with IS / IS NOT
 */
export function isKeywordLiteral(value: unknown): value is null | undefined | boolean {
  return value === null || value === undefined || typeof value === 'boolean';
}

/**
 * Operator methods shared by columns and expressions
 */
export abstract class Operand extends QueryNode {
  gt(other: unknown): Expression {
    return new Expression(this, '>', other);
  }

  ge(other: unknown): Expression {
    return new Expression(this, '>=', other);
  }

  lt(other: unknown): Expression {
    return new Expression(this, '<', other);
  }

  le(other: unknown): Expression {
    return new Expression(this, '<=', other);
  }

  /**
   * `=`, or `IS` for null, undefined, true and false
   */
  eq(other: unknown): Expression {
    return new Expression(this, isKeywordLiteral(other) ? 'IS' : '=', other);
  }

  /**
   * `!=`, or `IS NOT` for null, undefined, true and false
   */
  ne(other: unknown): Expression {
    return new Expression(this, isKeywordLiteral(other) ? 'IS NOT' : '!=', other);
  }

  /**
   * Alias for eq()
   */
  is(other: unknown): Expression {
    return this.eq(other);
  }

  /**
   * Alias for ne()
   */
  isNot(other: unknown): Expression {
    return this.ne(other);
  }

  add(other: unknown): Expression {
    return new Expression(this, '+', other);
  }

  sub(other: unknown): Expression {
    return new Expression(this, '-', other);
  }

  mul(other: unknown): Expression {
    return new Expression(this, '*', other);
  }

  div(other: unknown): Expression {
    return new Expression(this, '/', other);
  }

  mod(other: unknown): Expression {
    return new Expression(this, '%', other);
  }

  /**
   * Alias this operand in a select list
   */
  as(alias: string): As {
    return new As(this, alias);
  }
}

export class Expression extends Operand {
  private readonly right: PreparedQuery;

  constructor(
    public readonly left: Operand,
    public readonly operator: ExpressionOperator,
    right: unknown,
  ) {
    super();
    this.right = resolveOperand(right);
  }

  and(operand: Condition): LogicGate {
    return new LogicGate(this, 'AND', operand);
  }

  andNot(operand: Condition): LogicGate {
    return new LogicGate(this, 'AND NOT', operand);
  }

  or(operand: Condition): LogicGate {
    return new LogicGate(this, 'OR', operand);
  }

  orNot(operand: Condition): LogicGate {
    return new LogicGate(this, 'OR NOT', operand);
  }

  prepare(): PreparedQuery {
    const left = this.left.prepare();
    return {
      sql: `${left.sql} ${this.operator} ${this.right.sql}`,
      params: [...left.params, ...this.right.params],
    };
  }
}

export class LogicGate extends QueryNode {
  constructor(
    public readonly predecessor: Condition,
    public readonly operator: BooleanOperator,
    public readonly operand: Condition,
  ) {
    super();
  }

  and(operand: Condition): LogicGate {
    return new LogicGate(this, 'AND', operand);
  }

  andNot(operand: Condition): LogicGate {
    return new LogicGate(this, 'AND NOT', operand);
  }

  or(operand: Condition): LogicGate {
    return new LogicGate(this, 'OR', operand);
  }

  orNot(operand: Condition): LogicGate {
    return new LogicGate(this, 'OR NOT', operand);
  }

  prepare(): PreparedQuery {
    const predecessor = this.predecessor.prepare();
    const operand = prepareCondition(this.operand);
    return {
      sql: `${predecessor.sql} ${this.operator} ${operand.sql}`,
      params: [...predecessor.params, ...operand.params],
    };
  }
}

export class As extends QueryNode {
  constructor(
    public readonly node: Operand,
    public readonly alias: string,
  ) {
    super();
  }

  prepare(): PreparedQuery {
    const { sql, params } = this.node.prepare();
    return { sql: `${sql} AS ${this.alias}`, params };
  }
}

/**
 * Prepare a condition used as an operand; logic gates are parenthesized
 */
export function prepareCondition(condition: Condition): PreparedQuery {
  const { sql, params } = condition.prepare();
  return condition instanceof LogicGate ? { sql: `(${sql})`, params } : { sql, params };
}

function resolveOperand(value: unknown): PreparedQuery {
  if (value instanceof Operand) {
    return value.prepare();
  }
  if (value === null || value === undefined) {
    return { sql: 'NULL', params: [] };
  }
  if (value === true) {
    return { sql: 'TRUE', params: [] };
  }
  if (value === false) {
    return { sql: 'FALSE', params: [] };
  }
  if (value instanceof PgEnumMember) {
    return { sql: PLACEHOLDER, params: [value.value] };
  }
  return { sql: PLACEHOLDER, params: [value] };
}
