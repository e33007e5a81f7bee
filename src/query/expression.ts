import type { BooleanAttribute } from './attribute.js';
import type {
  ChainOperator,
  Comparator,
  ExpressionElement,
  FilterValue,
  ResolvedExpression,
} from './types.js';

/**
 * Comparators with a direct logical opposite. Negating one of these rewrites
 * the comparator; every other comparator toggles the `negated` flag instead.
 */
const LOGICAL_OPPOSITES: Partial<Record<Comparator, Comparator>> = {
  equals: 'notEquals',
  notEquals: 'equals',
  greater: 'lessEqual',
  lessEqual: 'greater',
  less: 'greaterEqual',
  greaterEqual: 'less',
  // A pair, so that negating twice gives back the is-true test and a negated
  // Boolean attribute compiles to equals(false) with no negate scope.
  isTrue: 'isFalse',
  isFalse: 'isTrue',
};

/**
 * Leaf condition: one attribute compared against one argument.
 * Content is fixed after construction except through negate().
 */
export class BooleanExpression implements ExpressionElement {
  readonly kind = 'comparison' as const;
  private _comparator: Comparator;
  private _negated = false;

  constructor(
    readonly attribute: string,
    comparator: Comparator,
    readonly argument: FilterValue | undefined = undefined,
  ) {
    this._comparator = comparator;
  }

  get comparator(): Comparator {
    return this._comparator;
  }

  get negated(): boolean {
    return this._negated;
  }

  /** Negates in place and returns this expression. */
  negate(): this {
    const opposite = LOGICAL_OPPOSITES[this._comparator];
    if (opposite !== undefined) {
      this._comparator = opposite;
    } else {
      this._negated = !this._negated;
    }
    return this;
  }

  and(other: ExpressionElement): BooleanExpressionClause {
    return new BooleanExpressionClause(this, 'and', other.resolve());
  }

  or(other: ExpressionElement): BooleanExpressionClause {
    return new BooleanExpressionClause(this, 'or', other.resolve());
  }

  resolve(): BooleanExpression {
    return this;
  }
}

/**
 * Binary and/or node. Each and()/or() call makes exactly one new root;
 * nothing is flattened or rebalanced.
 */
export class BooleanExpressionClause implements ExpressionElement {
  readonly kind = 'clause' as const;

  constructor(
    readonly left: ResolvedExpression,
    readonly operator: ChainOperator,
    readonly right: ResolvedExpression,
  ) {}

  and(other: ExpressionElement): BooleanExpressionClause {
    return new BooleanExpressionClause(this, 'and', other.resolve());
  }

  or(other: ExpressionElement): BooleanExpressionClause {
    return new BooleanExpressionClause(this, 'or', other.resolve());
  }

  resolve(): BooleanExpressionClause {
    return this;
  }
}

export function and(left: ExpressionElement, right: ExpressionElement): BooleanExpressionClause {
  return new BooleanExpressionClause(left.resolve(), 'and', right.resolve());
}

export function or(left: ExpressionElement, right: ExpressionElement): BooleanExpressionClause {
  return new BooleanExpressionClause(left.resolve(), 'or', right.resolve());
}

/**
 * Negates a Boolean attribute (giving its is-false test) or an expression
 * (in place, see BooleanExpression.negate).
 */
export function not(element: BooleanAttribute | BooleanExpression): BooleanExpression {
  if (element.kind === 'comparison') {
    return element.negate();
  }
  return element.not();
}
