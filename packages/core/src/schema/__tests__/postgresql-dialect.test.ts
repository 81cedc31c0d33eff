import { describe, it, expect } from 'vitest';

import { InvalidTypeConfigurationError, ValidationError } from '../../errors';
import { column } from '../Column';
import { defineEnum } from '../PgEnum';
import { types } from '../sql-types';
import { defineTable } from '../Table';
import { PostgreSQLDialect, renderType } from '../dialects/PostgreSQLDialect';

const User = defineTable('User', {
  id: column(types.uuid(), { primary: true }),
  bigint: column(types.bigint(), { primary: true }),
  bigserial: column(types.bigserial()),
  bit: column(types.bit()),
  varbit: column(types.varbit()),
  boolean: column(types.boolean()),
  box: column(types.box()),
  bytea: column(types.bytea()),
  char: column(types.char()),
  varchar: column(types.varchar()),
  cidr: column(types.cidr()),
  circle: column(types.circle()),
  date: column(types.date()),
  double: column(types.double()),
  inet: column(types.inet()),
  integer: column(types.integer()),
  interval: column(types.interval()),
  json: column(types.json()),
  jsonb: column(types.jsonb()),
  line: column(types.line()),
  lseg: column(types.lseg()),
  macaddr: column(types.macaddr()),
  macaddr8: column(types.macaddr8()),
  money: column(types.money()),
  numeric: column(types.numeric()),
  path: column(types.path()),
  pg_lsn: column(types.pgLsn()),
  pg_snapshot: column(types.pgSnapshot()),
  point: column(types.point()),
  polygon: column(types.polygon()),
  real: column(types.real()),
  smallint: column(types.smallint()),
  smallserial: column(types.smallserial()),
  serial: column(types.serial()),
  text: column(types.text()),
  time: column(types.time()),
  timestamp: column(types.timestamp()),
  tsquery: column(types.tsquery()),
  tsvector: column(types.tsvector()),
  uuid: column(types.uuid()),
  xml: column(types.xml()),
});

describe('PostgreSQLDialect', () => {
  const dialect = new PostgreSQLDialect();

  describe('createTable', () => {
    it('should render every scalar type', () => {
      expect(User.createTable()).toBe(
        [
          'CREATE TABLE IF NOT EXISTS "user" (',
          '  "id" UUID,',
          '  "bigint" BIGINT,',
          '  "bigserial" BIGSERIAL NOT NULL,',
          '  "bit" BIT NOT NULL,',
          '  "varbit" VARBIT NOT NULL,',
          '  "boolean" BOOLEAN NOT NULL,',
          '  "box" BOX NOT NULL,',
          '  "bytea" BYTEA NOT NULL,',
          '  "char" CHAR NOT NULL,',
          '  "varchar" VARCHAR NOT NULL,',
          '  "cidr" CIDR NOT NULL,',
          '  "circle" CIRCLE NOT NULL,',
          '  "date" DATE NOT NULL,',
          '  "double" DOUBLE PRECISION NOT NULL,',
          '  "inet" INET NOT NULL,',
          '  "integer" INTEGER NOT NULL,',
          '  "interval" INTERVAL NOT NULL,',
          '  "json" JSON NOT NULL,',
          '  "jsonb" JSONB NOT NULL,',
          '  "line" LINE NOT NULL,',
          '  "lseg" LSEG NOT NULL,',
          '  "macaddr" MACADDR NOT NULL,',
          '  "macaddr8" MACADDR8 NOT NULL,',
          '  "money" MONEY NOT NULL,',
          '  "numeric" NUMERIC NOT NULL,',
          '  "path" PATH NOT NULL,',
          '  "pg_lsn" PG_LSN NOT NULL,',
          '  "pg_snapshot" PG_SNAPSHOT NOT NULL,',
          '  "point" POINT NOT NULL,',
          '  "polygon" POLYGON NOT NULL,',
          '  "real" REAL NOT NULL,',
          '  "smallint" SMALLINT NOT NULL,',
          '  "smallserial" SMALLSERIAL NOT NULL,',
          '  "serial" SERIAL NOT NULL,',
          '  "text" TEXT NOT NULL,',
          '  "time" TIME NOT NULL,',
          '  "timestamp" TIMESTAMP NOT NULL,',
          '  "tsquery" TSQUERY NOT NULL,',
          '  "tsvector" TSVECTOR NOT NULL,',
          '  "uuid" UUID NOT NULL,',
          '  "xml" XML NOT NULL,',
          '  PRIMARY KEY (id, bigint)',
          ');',
        ].join('\n'),
      );
    });

    it('should render type options', () => {
      const TypeOptionsTable = defineTable('TypeOptionsTable', {
        char: column(types.char(1), { nullable: true }),
        varchar: column(types.varchar(1), { default: '', nullable: true }),
        interval: column(types.interval('DAY TO SECOND', 1), { nullable: true }),
        numeric: column(types.numeric(10, 2), { nullable: true }),
        numeric_two: column(types.numeric(10), { nullable: true }),
        time: column(types.time(1, { withTimeZone: true }), { nullable: true }),
        timestamp: column(types.timestamp(1, { withTimeZone: true }), { nullable: true }),
      });

      expect(TypeOptionsTable.createTable()).toBe(
        [
          'CREATE TABLE IF NOT EXISTS "type_options_table" (',
          '  "char" CHAR(1),',
          "  \"varchar\" VARCHAR(1) DEFAULT '',",
          '  "interval" INTERVAL DAY TO SECOND(1),',
          '  "numeric" NUMERIC(10, 2),',
          '  "numeric_two" NUMERIC(10),',
          '  "time" TIME(1) WITH TIME ZONE,',
          '  "timestamp" TIMESTAMP(1) WITH TIME ZONE',
          ');',
        ].join('\n'),
      );
    });

    it('should render column options, grouped foreign keys and indexes', () => {
      const ColumnOptionsTable = defineTable('ColumnOptionsTable', {
        integer: column(types.integer(), {
          check: 'integer > 0',
          default: 1,
          index: true,
          nullable: true,
          unique: true,
        }),
        fk: column({ foreignKey: User.columns.id }),
        fk2: column({ foreignKey: User.columns.bigint }),
      });

      expect(ColumnOptionsTable.createTable()).toBe(
        [
          'CREATE TABLE IF NOT EXISTS "column_options_table" (',
          '  "integer" INTEGER DEFAULT 1 UNIQUE CHECK (integer > 0),',
          '  "fk" UUID NOT NULL,',
          '  "fk2" BIGINT NOT NULL,',
          '  FOREIGN KEY (fk, fk2) REFERENCES "user" (id, bigint)',
          ');',
          'CREATE INDEX ON "column_options_table" (integer);',
        ].join('\n'),
      );
    });

    it('should emit one FOREIGN KEY clause per referenced table in first-seen order', () => {
      const Team = defineTable('Team', { id: column(types.integer(), { primary: true }) });
      const Member = defineTable('Member', {
        userId: column({ foreignKey: User.columns.id }),
        teamId: column({ foreignKey: Team.columns.id }),
        userKey: column({ foreignKey: User.columns.bigint }),
        note: column(types.text(), { index: true }),
        score: column(types.integer(), { index: true, default: 0 }),
      });

      expect(Member.createTable()).toBe(
        [
          'CREATE TABLE IF NOT EXISTS "member" (',
          '  "userId" UUID NOT NULL,',
          '  "teamId" INTEGER NOT NULL,',
          '  "userKey" BIGINT NOT NULL,',
          '  "note" TEXT NOT NULL,',
          '  "score" INTEGER DEFAULT 0 NOT NULL,',
          '  FOREIGN KEY (userId, userKey) REFERENCES "user" (id, bigint),',
          '  FOREIGN KEY (teamId) REFERENCES "team" (id)',
          ');',
          'CREATE INDEX ON "member" (note);',
          'CREATE INDEX ON "member" (score);',
        ].join('\n'),
      );
    });

    it('should prefer the referenced type over a declared one', () => {
      const Ref = defineTable('Ref', { owner: column(types.text(), { foreignKey: User.columns.id }) });
      expect(Ref.createTable()).toContain('  "owner" UUID NOT NULL,\n');
    });

    it('should render boolean and raw string defaults verbatim', () => {
      const Flags = defineTable('Flags', {
        active: column(types.boolean(), { default: false }),
        createdAt: column(types.timestamp(), { default: 'now()' }),
      });

      expect(Flags.createTable()).toBe(
        [
          'CREATE TABLE IF NOT EXISTS "flags" (',
          '  "active" BOOLEAN DEFAULT false NOT NULL,',
          '  "createdAt" TIMESTAMP DEFAULT now() NOT NULL',
          ');',
        ].join('\n'),
      );
    });

    it('should render enum columns by type name', () => {
      const MyE = defineEnum('MyE', { A: 'apple', B: 'bee' });
      const UsesEnum = defineTable('UsesEnum', { col: column(MyE, { nullable: true }) });

      expect(UsesEnum.createTable()).toBe(
        ['CREATE TABLE IF NOT EXISTS "uses_enum" (', '  "col" MY_E', ');'].join('\n'),
      );
    });

    it('should be identical across calls', () => {
      expect(User.createTable()).toBe(User.createTable());
    });

    it('should fail on NUMERIC with a scale but no precision', () => {
      const Broken = defineTable('Broken', { amount: column(types.numeric(undefined, 1)) });
      expect(() => Broken.createTable()).toThrow(InvalidTypeConfigurationError);
    });

    it('should fail on a column with neither type nor foreign key', () => {
      const Untyped = defineTable('Untyped', { value: column() });
      expect(() => Untyped.createTable()).toThrow(ValidationError);
    });
  });

  describe('columnTypeToSQL', () => {
    it.each([
      [types.double(), 'DOUBLE PRECISION'],
      [types.char(3), 'CHAR(3)'],
      [types.varchar(255), 'VARCHAR(255)'],
      [types.varchar(0), 'VARCHAR'],
      [types.interval('YEAR'), 'INTERVAL YEAR'],
      [types.interval(undefined, 6), 'INTERVAL(6)'],
      [types.numeric(10, 0), 'NUMERIC(10)'],
      [types.time(3), 'TIME(3)'],
      [types.time(undefined, { withTimeZone: true }), 'TIME WITH TIME ZONE'],
      [types.timestamp(6, { withTimeZone: false }), 'TIMESTAMP(6)'],
      [types.pgLsn(), 'PG_LSN'],
    ])('should render %j as %s', (type, expected) => {
      expect(renderType(type)).toBe(expected);
    });

    it('should render an enum by its type name', () => {
      expect(dialect.columnTypeToSQL(defineEnum('OrderStatus', { NEW: 'new' }))).toBe('ORDER_STATUS');
    });

    it('should throw for a scale without precision', () => {
      expect(() => renderType(types.numeric(undefined, 2))).toThrow('Precision must be set if scale is');
    });
  });

  describe('quoting', () => {
    it('should double embedded quotes in identifiers', () => {
      expect(dialect.quoteIdentifier('we"ird')).toBe('"we""ird"');
    });

    it.each([
      [null, 'NULL'],
      [undefined, 'NULL'],
      [true, 'TRUE'],
      [false, 'FALSE'],
      [12.5, '12.5'],
      ["it's", "'it''s'"],
    ])('should quote %j as %s', (value, expected) => {
      expect(dialect.quoteValue(value)).toBe(expected);
    });
  });

  describe('drop statements', () => {
    it('should drop tables and enum types if they exist', () => {
      expect(User.dropTable()).toBe('DROP TABLE IF EXISTS "user";');
      expect(dialect.dropEnumIfExists(defineEnum('Mood', { SAD: 'sad' }))).toBe('DROP TYPE IF EXISTS MOOD');
    });
  });
});
