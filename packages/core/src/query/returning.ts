/**
 * Returning
 *
 * RETURNING clause for INSERT, UPDATE and DELETE.
 *
 * @example
 * ```typescript
 * deleteFrom(User).where(User.columns.id.eq(2)).returning(User.columns.id).prepare();
 * // DELETE FROM "user" WHERE "user".id = ? RETURNING "user".id
 * ```
 */

import { Clause, prepareTargets, validateTargets } from './clause';

import type { SelectTarget } from './clause';
import type { Preparable, PreparedQuery } from '../types';

export class Returning extends Clause {
  private readonly targets: SelectTarget[];

  constructor(predecessor: Preparable, targets: readonly SelectTarget[]) {
    super(predecessor);
    this.targets = validateTargets(targets);
  }

  protected fragment(): PreparedQuery {
    const { sql, params } = prepareTargets(this.targets);
    return { sql: ` RETURNING ${sql}`, params };
  }
}

/**
 * Mutation clauses that may end with RETURNING
 */
export abstract class Returnable extends Clause {
  /**
   * Return columns, aliased expressions or whole tables from the affected rows
   */
  returning(...targets: SelectTarget[]): Returning {
    return new Returning(this, targets);
  }
}
