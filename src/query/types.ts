import type { BooleanExpression, BooleanExpressionClause } from './expression.js';

/** Values a comparison can be made against. */
export type FilterValue = string | number | boolean | Date | null;

export type Comparator =
  | 'equals'
  | 'notEquals'
  | 'less'
  | 'lessEqual'
  | 'greater'
  | 'greaterEqual'
  | 'contains'
  | 'startsWith'
  | 'endsWith'
  | 'isTrue'
  | 'isFalse';

export type ChainOperator = 'and' | 'or';

export type AttributeKind = 'plain' | 'boolean' | 'enumerative' | 'nonFilterable';

export type SortDirection = 'asc' | 'desc';

/** A node of a compiled condition tree. */
export type ResolvedExpression = BooleanExpression | BooleanExpressionClause;

/**
 * Anything that can stand on either side of an and/or combination:
 * a Boolean attribute, an expression, or a clause.
 */
export interface ExpressionElement {
  resolve(): ResolvedExpression;
}
