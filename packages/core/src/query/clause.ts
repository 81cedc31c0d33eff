/**
 * Clause
 *
 * A statement fragment chained onto its predecessor. prepare() renders the
 * predecessor first and appends this clause's own fragment, so params always
 * follow the textual order of their placeholders.
 */

import { InvalidSelectTargetError } from '../errors';
import { Column } from '../schema/Column';
import { Table } from '../schema/Table';
import { As } from './expression';
import { joinPrepared, QueryNode } from './query-node';

import type { Preparable, PreparedQuery } from '../types';

/** Column list entry for SELECT and RETURNING */
export type SelectTarget = Column | Table | As;

export abstract class Clause extends QueryNode {
  /**
   * @param predecessor - previous clause; omitted for the statement keyword itself
   */
  constructor(protected readonly predecessor?: Preparable) {
    super();
  }

  /**
   * This clause's own fragment, with a leading space unless it opens the statement
   */
  protected abstract fragment(): PreparedQuery;

  prepare(): PreparedQuery {
    if (!this.predecessor) {
      return this.fragment();
    }
    return joinPrepared([this.predecessor.prepare(), this.fragment()], '');
  }
}

/**
 * Check targets at construction; untyped callers may pass anything
 */
export function validateTargets(targets: readonly unknown[]): SelectTarget[] {
  return targets.map((target) => {
    if (target instanceof Column || target instanceof Table || target instanceof As) {
      return target;
    }
    throw new InvalidSelectTargetError(target);
  });
}

/**
 * Render a target list: tables expand to every column in declaration order
 */
export function prepareTargets(targets: readonly SelectTarget[]): PreparedQuery {
  const parts = targets.flatMap((target) =>
    target instanceof Table ? target.columnList.map((column) => column.prepare()) : [target.prepare()],
  );
  return joinPrepared(parts, ', ');
}
