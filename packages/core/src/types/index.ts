/**
 * Rendered statement: SQL text with `?` placeholders plus the values bound to them.
 * @example
 * ```typescript
 * const { sql, params } = select(User).from(User).where(User.columns.id.eq(2)).prepare();
 * // sql:    SELECT "user".id, "user".first, "user".last FROM "user" WHERE "user".id = ?
 * // params: [2]
 * ```
 */
export interface PreparedQuery {
  sql: string;
  params: unknown[];
}

/**
 * Anything that renders to a prepared query
 */
export interface Preparable {
  prepare(): PreparedQuery;
}

export interface Logger {
  error(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  debug(message: string, ...args: unknown[]): void;
}
