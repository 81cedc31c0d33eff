/**
 * Schema Builder
 * Collects enum types and tables and renders them as one ordered DDL script
 *
 * @example
 * ```typescript
 * const schema = new SchemaBuilder({ logger: consoleLogger })
 *   .addEnum(Mood)
 *   .addTable(User)
 *   .addTable(Task);
 *
 * schema.on('statement', (sql) => migrationFile.write(`${sql}\n`));
 * schema.toSQL();
 * // CREATE TYPE MOOD AS ENUM (...);
 * // CREATE TABLE IF NOT EXISTS "user" (...);
 * // CREATE TABLE IF NOT EXISTS "task" (...);
 * ```
 */

import { EventEmitter } from 'eventemitter3';

import { DDL_FORMAT } from '../constants';
import { PgEnum } from './PgEnum';

import type { Table } from './Table';
import type { Logger } from '../types';

export interface SchemaBuilderOptions {
  /** Receives a debug line per registration and rendered statement */
  logger?: Logger;
}

export interface SchemaBuilderEvents {
  enum: (pgEnum: PgEnum) => void;
  table: (table: Table) => void;
  statement: (sql: string) => void;
}

export class SchemaBuilder extends EventEmitter<SchemaBuilderEvents> {
  private readonly enums: PgEnum[] = [];
  private readonly tables: Table[] = [];
  private readonly logger?: Logger;

  constructor(options: SchemaBuilderOptions = {}) {
    super();
    this.logger = options.logger;
  }

  /**
   * Registered enum types, in registration order
   */
  get enumList(): readonly PgEnum[] {
    return this.enums;
  }

  /**
   * Registered tables, in registration order
   */
  get tableList(): readonly Table[] {
    return this.tables;
  }

  /**
   * Register an enum type; registering it again is a no-op
   */
  addEnum(pgEnum: PgEnum): this {
    if (this.enums.includes(pgEnum)) {
      return this;
    }
    this.enums.push(pgEnum);
    this.logger?.debug(`Registered enum ${pgEnum.typeName}`);
    this.emit('enum', pgEnum);
    return this;
  }

  /**
   * Register a table and the enum types its columns use
   */
  addTable(table: Table): this {
    if (this.tables.includes(table)) {
      return this;
    }
    for (const column of table.columnList) {
      if (column.definition.type instanceof PgEnum) {
        this.addEnum(column.definition.type);
      }
    }
    this.tables.push(table);
    this.logger?.debug(`Registered table ${table.name}`);
    this.emit('table', table);
    return this;
  }

  /**
   * CREATE TYPE statements first, then CREATE TABLE (with their indexes)
   */
  createStatements(): string[] {
    return this.render([
      ...this.enums.map((pgEnum) => pgEnum.createType()),
      ...this.tables.map((table) => table.createTable()),
    ]);
  }

  /**
   * DROP TABLE statements in reverse registration order, then DROP TYPE
   */
  dropStatements(): string[] {
    return this.render([
      ...[...this.tables].reverse().map((table) => table.dropTable()),
      ...[...this.enums].reverse().map((pgEnum) => pgEnum.dropType()),
    ]);
  }

  /**
   * Full creation script
   */
  toSQL(): string {
    return this.createStatements().join(DDL_FORMAT.STATEMENT_SEPARATOR);
  }

  private render(statements: string[]): string[] {
    for (const sql of statements) {
      this.logger?.debug(`Rendered: ${sql}`);
      this.emit('statement', sql);
    }
    return statements;
  }
}
