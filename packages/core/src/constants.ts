/**
 * Constants
 *
 * Centralized rendering constants shared by the statement and DDL builders.
 */

// ============ DDL Formatting ============

export const DDL_FORMAT = {
  /** Indentation of column and constraint lines inside CREATE TABLE */
  INDENT: '  ',
  /** Separator between column and constraint lines */
  LINE_SEPARATOR: ',\n',
  /** Separator between trailing statements (CREATE INDEX) */
  STATEMENT_SEPARATOR: '\n',
} as const;

// ============ Placeholders ============

/** Positional placeholder emitted by every prepare() call */
export const PLACEHOLDER = '?';

// ============ Logging ============

export const LOG_PREFIX = '[pgchain]';
