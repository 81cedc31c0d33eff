/**
 * Schema Types
 * Type definitions for column, table and enum declarations
 */

import type { PgEnum } from './PgEnum';

export type SimpleTypeKind =
  | 'BIGINT'
  | 'BIGSERIAL'
  | 'BIT'
  | 'VARBIT'
  | 'BOOLEAN'
  | 'BOX'
  | 'BYTEA'
  | 'CIDR'
  | 'CIRCLE'
  | 'DATE'
  | 'DOUBLE'
  | 'INET'
  | 'INTEGER'
  | 'JSON'
  | 'JSONB'
  | 'LINE'
  | 'LSEG'
  | 'MACADDR'
  | 'MACADDR8'
  | 'MONEY'
  | 'PATH'
  | 'PG_LSN'
  | 'PG_SNAPSHOT'
  | 'POINT'
  | 'POLYGON'
  | 'REAL'
  | 'SMALLINT'
  | 'SMALLSERIAL'
  | 'SERIAL'
  | 'TEXT'
  | 'TSQUERY'
  | 'TSVECTOR'
  | 'UUID'
  | 'XML';

export type ScalarType =
  | { kind: SimpleTypeKind }
  | { kind: 'CHAR'; length?: number }
  | { kind: 'VARCHAR'; length?: number }
  | { kind: 'INTERVAL'; fields?: string; precision?: number }
  | { kind: 'NUMERIC'; precision?: number; scale?: number }
  | { kind: 'TIME'; precision?: number; withTimeZone?: boolean }
  | { kind: 'TIMESTAMP'; precision?: number; withTimeZone?: boolean };

export type ScalarTypeKind = ScalarType['kind'];

/** Anything a column can be declared as */
export type ColumnType = ScalarType | PgEnum;

/** Raw SQL default; an empty string renders as `DEFAULT ''` */
export type ColumnDefault = string | number | boolean;

export interface ColumnOptions {
  /** Raw SQL for a CHECK constraint */
  check?: string;
  default?: ColumnDefault;
  /** Referenced column; its type is used for this column's DDL */
  foreignKey?: ColumnReference;
  index?: boolean;
  nullable?: boolean;
  primary?: boolean;
  unique?: boolean;
}

/**
 * Normalized column metadata used for DDL rendering
 */
export interface ColumnDefinition {
  type?: ColumnType;
  check?: string;
  defaultValue?: ColumnDefault;
  foreignKey?: ColumnReference;
  index: boolean;
  nullable: boolean;
  primary: boolean;
  unique: boolean;
}

/**
 * What DDL rendering needs from a referenced (foreign key) column
 */
export interface ColumnReference {
  readonly table: string;
  readonly name: string;
  readonly definition?: ColumnDefinition;
}

export type SortDirection = 'ASC' | 'DESC';
