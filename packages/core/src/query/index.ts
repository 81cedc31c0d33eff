/**
 * Query Builder Module
 *
 * Immutable statement chains, one file per statement kind:
 * - Select → From → Join/On → Where → OrderBy → Limit/Offset
 * - InsertInto → Values → Returning
 * - Update → SetClause → MutationWhere → Returning
 * - Delete → MutationWhere → Returning
 *
 * @module query
 */

export { QueryNode, joinPrepared } from './query-node';
export {
  Operand,
  Expression,
  LogicGate,
  As,
  isKeywordLiteral,
  prepareCondition,
  type ArithmeticOperator,
  type BooleanOperator,
  type ComparisonOperator,
  type Condition,
  type ExpressionOperator,
} from './expression';
export { compare, equals, notEquals, and, andNot, or, orNot, alias } from './operators';
export { Clause, type SelectTarget } from './clause';
export {
  SelectStatement,
  Paginatable,
  Orderable,
  Filterable,
  Joinable,
  Select,
  From,
  Join,
  On,
  Where,
  OrderBy,
  Limit,
  Offset,
  Paginated,
  type JoinKind,
} from './select-builder';
export { MutationWhere, type WhereConnective } from './where-builder';
export { Returning, Returnable } from './returning';
export { InsertInto, Values } from './insert-builder';
export { Update, SetClause } from './update-builder';
export { Delete } from './delete-builder';
export type { Assignments, Assignment } from './assignments';
export { select, insertInto, update, deleteFrom } from './query-factory';
