import { AttributeUsageError } from '../errors.js';
import { BooleanExpression, BooleanExpressionClause } from './expression.js';
import type {
  AttributeKind,
  ExpressionElement,
  FilterValue,
  ResolvedExpression,
  SortDirection,
} from './types.js';

/**
 * Shared comparison surface of every attribute that may appear in a
 * where/order clause. Each comparison returns a fresh BooleanExpression.
 */
export abstract class FilterableAttribute<V extends FilterValue> implements ExpressionElement {
  abstract readonly kind: Exclude<AttributeKind, 'nonFilterable'>;

  constructor(readonly name: string) {}

  eq(value: V): BooleanExpression {
    return new BooleanExpression(this.name, 'equals', value);
  }

  ne(value: V): BooleanExpression {
    return new BooleanExpression(this.name, 'notEquals', value);
  }

  lt(value: V): BooleanExpression {
    return new BooleanExpression(this.name, 'less', value);
  }

  le(value: V): BooleanExpression {
    return new BooleanExpression(this.name, 'lessEqual', value);
  }

  gt(value: V): BooleanExpression {
    return new BooleanExpression(this.name, 'greater', value);
  }

  ge(value: V): BooleanExpression {
    return new BooleanExpression(this.name, 'greaterEqual', value);
  }

  asc(): OrderedAttribute {
    return new OrderedAttribute(this, true);
  }

  desc(): OrderedAttribute {
    return new OrderedAttribute(this, false);
  }

  and(other: ExpressionElement): BooleanExpressionClause {
    return new BooleanExpressionClause(this.resolve(), 'and', other.resolve());
  }

  or(other: ExpressionElement): BooleanExpressionClause {
    return new BooleanExpressionClause(this.resolve(), 'or', other.resolve());
  }

  abstract resolve(): ResolvedExpression;
}

/** Direction-tagged attribute accepted by Query.orderBy. */
export class OrderedAttribute {
  constructor(
    readonly attribute: FilterableAttribute<FilterValue>,
    readonly ascending: boolean,
  ) {}

  get name(): string {
    return this.attribute.name;
  }

  get direction(): SortDirection {
    return this.ascending ? 'asc' : 'desc';
  }
}

/**
 * Plain attribute. Has no truth value of its own, so it must be compared
 * before it can be combined with and/or.
 */
export class Attribute<V extends FilterValue = string> extends FilterableAttribute<V> {
  override readonly kind = 'plain' as const;

  contains(text: string): BooleanExpression {
    return new BooleanExpression(this.name, 'contains', text);
  }

  startsWith(text: string): BooleanExpression {
    return new BooleanExpression(this.name, 'startsWith', text);
  }

  endsWith(text: string): BooleanExpression {
    return new BooleanExpression(this.name, 'endsWith', text);
  }

  override resolve(): never {
    throw new AttributeUsageError(
      this.name,
      `Attribute "${this.name}" has no implicit truth value and must be compared before it is combined`,
    );
  }
}

/** Boolean attribute. Used bare, it means "is true". */
export class BooleanAttribute extends FilterableAttribute<boolean> {
  override readonly kind = 'boolean' as const;

  /** The is-false test, built directly rather than by negating the is-true one. */
  not(): BooleanExpression {
    return new BooleanExpression(this.name, 'isFalse');
  }

  override resolve(): BooleanExpression {
    return new BooleanExpression(this.name, 'isTrue');
  }
}

export type EnumerationValues = Readonly<Record<string, string>>;

/** Accessor name generated for an enumeration member: `High` -> `is_high`. */
export type EnumAccessor<E extends EnumerationValues> = `is_${Lowercase<Extract<keyof E, string>>}`;

/**
 * Attribute restricted to a fixed set of values. One equality test per
 * member is registered under `is_<member>` when the attribute is created.
 */
export class EnumerativeAttribute<E extends EnumerationValues> extends FilterableAttribute<E[keyof E]> {
  override readonly kind = 'enumerative' as const;
  private readonly accessors: ReadonlyMap<string, () => BooleanExpression>;

  constructor(
    name: string,
    readonly enumeration: E,
  ) {
    super(name);
    this.accessors = new Map(
      Object.entries(enumeration).map(([member, value]): [string, () => BooleanExpression] => [
        `is_${member.toLowerCase()}`,
        () => new BooleanExpression(name, 'equals', value),
      ]),
    );
  }

  get accessorNames(): string[] {
    return [...this.accessors.keys()];
  }

  is(accessor: EnumAccessor<E>): BooleanExpression {
    const build = this.accessors.get(accessor);
    if (build === undefined) {
      throw new AttributeUsageError(
        this.name,
        `Attribute "${this.name}" has no accessor "${accessor}" (known: ${this.accessorNames.join(', ')})`,
      );
    }
    return build();
  }

  override resolve(): never {
    throw new AttributeUsageError(
      this.name,
      `Attribute "${this.name}" has no implicit truth value; use eq() or one of ${this.accessorNames.join(', ')}`,
    );
  }
}

const NON_FILTERABLE_VISIBLE: ReadonlySet<string> = new Set(['name', 'kind', 'toString', 'constructor', 'then', 'toJSON']);

/**
 * Field that can be selected but never filtered or ordered on. Reading any
 * property other than its name and kind throws immediately.
 */
export class NonFilterableAttribute {
  readonly kind = 'nonFilterable' as const;

  constructor(readonly name: string) {
    return new Proxy(this, {
      get(target, property, receiver) {
        if (typeof property === 'symbol' || NON_FILTERABLE_VISIBLE.has(property)) {
          return Reflect.get(target, property, receiver);
        }
        throw new AttributeUsageError(target.name);
      },
    });
  }

  toString(): string {
    return this.name;
  }
}

export type AnyAttribute = FilterableAttribute<FilterValue> | NonFilterableAttribute;
