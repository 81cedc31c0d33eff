/**
 * PostgreSQL Enum Types
 *
 * @example
 * ```typescript
 * const Mood = defineEnum('Mood', { SAD: 'sad', HAPPY: 'happy' });
 * Mood.createType(); // CREATE TYPE MOOD AS ENUM ('sad', 'happy');
 *
 * const Person = defineTable('Person', { mood: column(Mood) });
 * select(Person).from(Person).where(Person.columns.mood.eq(Mood.member('HAPPY')));
 * ```
 */

import { ValidationError } from '../errors';
import { toSnake } from '../utils/snake';
import { postgresDialect } from './dialects/PostgreSQLDialect';

export type EnumValues = Readonly<Record<string, string>>;

/**
 * A single enum variant; binds its value when used in an expression
 */
export class PgEnumMember {
  constructor(
    public readonly pgEnum: PgEnum,
    public readonly key: string,
    public readonly value: string,
  ) {}

  toString(): string {
    return this.value;
  }
}

export class PgEnum<V extends EnumValues = EnumValues> {
  /** DDL type name, e.g. `MY_E` for `MyE` */
  public readonly typeName: string;
  /** Distinct variant values in declaration order; a repeated value is an alias */
  public readonly values: readonly string[];
  private readonly members = new Map<string, PgEnumMember>();

  constructor(public readonly name: string, variants: V) {
    this.typeName = toSnake(name).toUpperCase();
    if (!this.typeName) {
      throw new ValidationError(`Cannot derive an enum type name from "${name}"`, 'name');
    }

    for (const [key, value] of Object.entries(variants)) {
      this.members.set(key, new PgEnumMember(this, key, value));
    }
    if (this.members.size === 0) {
      throw new ValidationError(`Enum ${this.typeName} needs at least one value`, 'values');
    }
    this.values = [...new Set([...this.members.values()].map((member) => member.value))];
  }

  /**
   * Get the member declared under a key
   */
  member(key: keyof V & string): PgEnumMember {
    const member = this.members.get(key);
    if (!member) {
      throw new ValidationError(`Enum ${this.typeName} has no member "${key}"`, key);
    }
    return member;
  }

  /**
   * Generate CREATE TYPE statement
   */
  createType(): string {
    return `${postgresDialect.createEnum(this)};`;
  }

  /**
   * Generate DROP TYPE IF EXISTS statement
   */
  dropType(): string {
    return `${postgresDialect.dropEnumIfExists(this)};`;
  }
}

/**
 * Declare an enum type from a record of member keys to values.
 * A TypeScript string enum object can be passed directly.
 */
export function defineEnum<V extends EnumValues>(name: string, values: V): PgEnum<V> {
  return new PgEnum(name, values);
}
