/**
 * PostgreSQL scalar type factories.
 * From the docs: https://www.postgresql.org/docs/current/datatype.html
 *
 * @example
 * ```typescript
 * column(types.varchar(255), { unique: true });
 * column(types.numeric(10, 2));
 * column(types.timestamp(3, { withTimeZone: true }));
 * ```
 */

import type { ScalarType, SimpleTypeKind } from './types';

export interface TimeZoneOptions {
  withTimeZone?: boolean;
}

const simple = (kind: SimpleTypeKind) => (): ScalarType => ({ kind });

export const types = {
  /** Signed eight-byte integer */
  bigint: simple('BIGINT'),
  /** Auto-incrementing eight-byte integer */
  bigserial: simple('BIGSERIAL'),
  /** Fixed-length bit string */
  bit: simple('BIT'),
  /** Variable-length bit string */
  varbit: simple('VARBIT'),
  boolean: simple('BOOLEAN'),
  /** Rectangular box on a plane */
  box: simple('BOX'),
  /** Binary data */
  bytea: simple('BYTEA'),
  /** Fixed-length character string */
  char: (length?: number): ScalarType => ({ kind: 'CHAR', length }),
  /** Variable-length character string */
  varchar: (length?: number): ScalarType => ({ kind: 'VARCHAR', length }),
  /** IPv4 or IPv6 network address */
  cidr: simple('CIDR'),
  circle: simple('CIRCLE'),
  date: simple('DATE'),
  /** Double precision floating-point number (8 bytes) */
  double: simple('DOUBLE'),
  /** IPv4 or IPv6 host address */
  inet: simple('INET'),
  integer: simple('INTEGER'),
  /** Time span, e.g. `types.interval('DAY TO SECOND', 1)` */
  interval: (fields?: string, precision?: number): ScalarType => ({
    kind: 'INTERVAL',
    fields,
    precision,
  }),
  json: simple('JSON'),
  jsonb: simple('JSONB'),
  line: simple('LINE'),
  lseg: simple('LSEG'),
  macaddr: simple('MACADDR'),
  /** MAC address (EUI-64 format) */
  macaddr8: simple('MACADDR8'),
  money: simple('MONEY'),
  /** Exact numeric; a scale without a precision fails when rendered */
  numeric: (precision?: number, scale?: number): ScalarType => ({
    kind: 'NUMERIC',
    precision,
    scale,
  }),
  path: simple('PATH'),
  /** PostgreSQL Log Sequence Number */
  pgLsn: simple('PG_LSN'),
  /** User-level transaction ID snapshot */
  pgSnapshot: simple('PG_SNAPSHOT'),
  point: simple('POINT'),
  polygon: simple('POLYGON'),
  real: simple('REAL'),
  smallint: simple('SMALLINT'),
  smallserial: simple('SMALLSERIAL'),
  serial: simple('SERIAL'),
  text: simple('TEXT'),
  time: (precision?: number, options: TimeZoneOptions = {}): ScalarType => ({
    kind: 'TIME',
    precision,
    withTimeZone: options.withTimeZone,
  }),
  timestamp: (precision?: number, options: TimeZoneOptions = {}): ScalarType => ({
    kind: 'TIMESTAMP',
    precision,
    withTimeZone: options.withTimeZone,
  }),
  tsquery: simple('TSQUERY'),
  tsvector: simple('TSVECTOR'),
  uuid: simple('UUID'),
  xml: simple('XML'),
} as const;
