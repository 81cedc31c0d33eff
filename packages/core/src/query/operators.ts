/**
 * Operator helpers
 *
 * Free-function forms of the Column/Expression methods.
 *
 * @example
 * ```typescript
 * const { id, last } = User.columns;
 * or(equals(last, null), and(compare(id, '>', 1), notEquals(last, 'Wedge')));
 * // "user".last IS NULL OR ("user".id > ? AND "user".last != ?)
 * ```
 */

import { As, Expression, isKeywordLiteral, LogicGate } from './expression';

import type { Condition, ExpressionOperator, Operand } from './expression';

/**
 * Build an expression with an explicit operator
 */
export function compare(left: Operand, operator: ExpressionOperator, right: unknown): Expression {
  return new Expression(left, operator, right);
}

/**
 * `left = right`, or `left IS right` for null, undefined and booleans
 */
export function equals(left: Operand, right: unknown): Expression {
  return new Expression(left, isKeywordLiteral(right) ? 'IS' : '=', right);
}

/**
 * `left != right`, or `left IS NOT right` for null, undefined and booleans
 */
export function notEquals(left: Operand, right: unknown): Expression {
  return new Expression(left, isKeywordLiteral(right) ? 'IS NOT' : '!=', right);
}

export function and(predecessor: Condition, operand: Condition): LogicGate {
  return new LogicGate(predecessor, 'AND', operand);
}

export function andNot(predecessor: Condition, operand: Condition): LogicGate {
  return new LogicGate(predecessor, 'AND NOT', operand);
}

export function or(predecessor: Condition, operand: Condition): LogicGate {
  return new LogicGate(predecessor, 'OR', operand);
}

export function orNot(predecessor: Condition, operand: Condition): LogicGate {
  return new LogicGate(predecessor, 'OR NOT', operand);
}

export function alias(node: Operand, name: string): As {
  return new As(node, name);
}
