/**
 * Delete Query Builder
 *
 * @example
 * ```typescript
 * deleteFrom(User).where(User.columns.first.eq('Potato')).prepare();
 * // sql:    DELETE FROM "user" WHERE "user".first = ?
 * // params: ['Potato']
 * ```
 */

import { Returnable } from './returning';
import { MutationWhere } from './where-builder';

import type { Condition } from './expression';
import type { Table } from '../schema/Table';
import type { PreparedQuery } from '../types';

export class Delete extends Returnable {
  constructor(public readonly table: Table) {
    super();
  }

  /**
   * Add WHERE condition
   */
  where(condition: Condition): MutationWhere {
    return new MutationWhere(this, condition);
  }

  protected fragment(): PreparedQuery {
    return { sql: `DELETE FROM ${this.table.name}`, params: [] };
  }
}
