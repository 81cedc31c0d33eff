/**
 * Query Node
 *
 * Base class for every renderable node: columns, expressions, logic gates
 * and statement clauses. Nodes are immutable; prepare() is a pure function
 * of the node and its predecessors.
 */

import { consoleLogger } from '../utils/logger';

import type { Logger, Preparable, PreparedQuery } from '../types';

export abstract class QueryNode implements Preparable {
  /**
   * Render SQL text and the parameters bound to its placeholders
   */
  abstract prepare(): PreparedQuery;

  /**
   * Debug helper - log the rendered SQL and params without changing anything
   */
  dump(logger: Logger = consoleLogger): this {
    const { sql, params } = this.prepare();
    logger.debug(`SQL: ${sql}`);
    logger.debug('Params:', params);
    return this;
  }
}

/**
 * Concatenate prepared fragments, keeping params in textual order
 */
export function joinPrepared(parts: PreparedQuery[], separator: string): PreparedQuery {
  return {
    sql: parts.map((part) => part.sql).join(separator),
    params: parts.flatMap((part) => part.params),
  };
}
