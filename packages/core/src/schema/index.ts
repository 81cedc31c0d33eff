/**
 * Schema Module
 * Column, table and enum declarations plus DDL rendering
 */

export { Column, column } from './Column';
export { Table, defineTable, type ColumnMap } from './Table';
export { PgEnum, PgEnumMember, defineEnum, type EnumValues } from './PgEnum';
export { types, type TimeZoneOptions } from './sql-types';
export { SchemaBuilder } from './SchemaBuilder';
export type { SchemaBuilderOptions, SchemaBuilderEvents } from './SchemaBuilder';
export { PostgreSQLDialect, postgresDialect, renderType } from './dialects/PostgreSQLDialect';

export type {
  ColumnDefault,
  ColumnDefinition,
  ColumnOptions,
  ColumnReference,
  ColumnType,
  ScalarType,
  ScalarTypeKind,
  SimpleTypeKind,
  SortDirection,
} from './types';
