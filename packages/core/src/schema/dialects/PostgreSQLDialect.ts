/**
 * PostgreSQL Dialect
 * DDL generation for tables, indexes and enum types
 */

import { DDL_FORMAT } from '../../constants';
import { InvalidTypeConfigurationError, ValidationError } from '../../errors';

import type { Column } from '../Column';
import type { PgEnum } from '../PgEnum';
import type { Table } from '../Table';
import type { ColumnDefinition, ColumnType, ScalarType } from '../types';

export class PostgreSQLDialect {
  readonly dialect = 'postgresql' as const;

  /**
   * Quote an identifier (table/column name)
   */
  quoteIdentifier(name: string): string {
    return `"${name.replaceAll('"', '""')}"`;
  }

  /**
   * Quote a value for SQL
   */
  quoteValue(value: unknown): string {
    if (value === null || value === undefined) {
      return 'NULL';
    }
    if (typeof value === 'boolean') {
      return value ? 'TRUE' : 'FALSE';
    }
    if (typeof value === 'number') {
      return String(value);
    }
    return `'${String(value).replaceAll("'", "''")}'`;
  }

  /**
   * Generate CREATE TABLE statement, followed by one CREATE INDEX per indexed column
   */
  createTable(table: Table): string {
    const lines: string[] = [];
    const primaries: string[] = [];
    const indexes: string[] = [];
    // Referenced table -> [local column, referenced column] pairs, first-seen order
    const foreignKeys = new Map<string, Array<[string, string]>>();

    for (const column of table.columnList) {
      const { definition } = column;
      lines.push(this.columnToSQL(column));

      if (definition.foreignKey) {
        const pairs = foreignKeys.get(definition.foreignKey.table) ?? [];
        pairs.push([column.name, definition.foreignKey.name]);
        foreignKeys.set(definition.foreignKey.table, pairs);
      }
      if (definition.index) {
        indexes.push(this.createIndex(table.name, column.name));
      }
      if (definition.primary) {
        primaries.push(column.name);
      }
    }

    if (primaries.length > 0) {
      lines.push(`PRIMARY KEY (${primaries.join(', ')})`);
    }

    for (const [referenced, pairs] of foreignKeys) {
      const local = pairs.map(([name]) => name).join(', ');
      const remote = pairs.map(([, name]) => name).join(', ');
      lines.push(`FOREIGN KEY (${local}) REFERENCES ${referenced} (${remote})`);
    }

    const body = lines.map((line) => `${DDL_FORMAT.INDENT}${line}`).join(DDL_FORMAT.LINE_SEPARATOR);
    const statements = [`CREATE TABLE IF NOT EXISTS ${table.name} (\n${body}\n);`, ...indexes];

    return statements.join(DDL_FORMAT.STATEMENT_SEPARATOR);
  }

  /**
   * Generate DROP TABLE IF EXISTS statement
   */
  dropTableIfExists(tableName: string): string {
    return `DROP TABLE IF EXISTS ${tableName}`;
  }

  /**
   * Create index statement
   */
  createIndex(tableName: string, columnName: string): string {
    return `CREATE INDEX ON ${tableName} (${columnName});`;
  }

  /**
   * Generate CREATE TYPE ... AS ENUM statement
   */
  createEnum(pgEnum: PgEnum): string {
    const values = pgEnum.values.map((value) => this.quoteValue(value)).join(', ');
    return `CREATE TYPE ${pgEnum.typeName} AS ENUM (${values})`;
  }

  /**
   * Generate DROP TYPE IF EXISTS statement
   */
  dropEnumIfExists(pgEnum: PgEnum): string {
    return `DROP TYPE IF EXISTS ${pgEnum.typeName}`;
  }

  /**
   * Convert column definition to SQL
   */
  columnToSQL(column: Column): string {
    const { definition } = column;
    const parts: string[] = [this.quoteIdentifier(column.name)];

    // Type
    parts.push(this.columnTypeToSQL(this.resolveType(column.name, definition)));

    // Default value
    if (definition.defaultValue !== undefined) {
      parts.push(
        definition.defaultValue === '' ? "DEFAULT ''" : `DEFAULT ${String(definition.defaultValue)}`,
      );
    }

    // Nullable
    if (!definition.nullable && !definition.primary) {
      parts.push('NOT NULL');
    }

    if (definition.unique) {
      parts.push('UNIQUE');
    }

    if (definition.check) {
      parts.push(`CHECK (${definition.check})`);
    }

    return parts.join(' ');
  }

  /**
   * Convert column type to PostgreSQL type
   */
  columnTypeToSQL(type: ColumnType): string {
    if (!('kind' in type)) {
      return type.typeName;
    }
    return this.scalarTypeToSQL(type);
  }

  private scalarTypeToSQL(type: ScalarType): string {
    switch (type.kind) {
      case 'DOUBLE': {
        return 'DOUBLE PRECISION';
      }
      case 'CHAR':
      case 'VARCHAR': {
        return type.length ? `${type.kind}(${type.length})` : type.kind;
      }
      case 'INTERVAL': {
        const fields = type.fields ? ` ${type.fields}` : '';
        const precision = type.precision ? `(${type.precision})` : '';
        return `INTERVAL${fields}${precision}`;
      }
      case 'NUMERIC': {
        if (type.precision && type.scale) {
          return `NUMERIC(${type.precision}, ${type.scale})`;
        }
        if (type.precision) {
          return `NUMERIC(${type.precision})`;
        }
        if (type.scale) {
          throw new InvalidTypeConfigurationError(
            'Precision must be set if scale is',
            type.kind,
          );
        }
        return 'NUMERIC';
      }
      case 'TIME':
      case 'TIMESTAMP': {
        const precision = type.precision ? `(${type.precision})` : '';
        const timeZone = type.withTimeZone ? ' WITH TIME ZONE' : '';
        return `${type.kind}${precision}${timeZone}`;
      }
      default: {
        return type.kind;
      }
    }
  }

  /**
   * A foreign key column takes the type of the column it references
   */
  private resolveType(name: string, definition: ColumnDefinition): ColumnType {
    if (definition.foreignKey) {
      const referenced = definition.foreignKey.definition;
      if (!referenced) {
        throw new ValidationError(
          `Column "${name}" references ${definition.foreignKey.table}.${definition.foreignKey.name}, which has no type`,
          name,
        );
      }
      return this.resolveType(definition.foreignKey.name, referenced);
    }
    if (!definition.type) {
      throw new ValidationError(`Column "${name}" has no type and no foreign key`, name);
    }
    return definition.type;
  }
}

export const postgresDialect = new PostgreSQLDialect();

/**
 * Render a column type as it appears in DDL
 */
export function renderType(type: ColumnType): string {
  return postgresDialect.columnTypeToSQL(type);
}
