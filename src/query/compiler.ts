import { AttributeUsageError, QueryCompileError, QueryUsageError, describeType, describeValue } from '../errors.js';
import type { RemoteQueryBuilder } from '../types.js';
import {
  FilterableAttribute,
  NonFilterableAttribute,
  OrderedAttribute,
  type AnyAttribute,
} from './attribute.js';
import { BooleanExpression, BooleanExpressionClause } from './expression.js';
import type { FilterValue, ResolvedExpression } from './types.js';

export type CasingFunction = (name: string) => string;

/** Raw "<remoteName> [asc|desc]" string, a direction-tagged attribute, or a bare attribute (ascending). */
export type OrderClause = string | OrderedAttribute | FilterableAttribute<FilterValue>;

const EXPRESSION_TYPES = ['BooleanExpression', 'BooleanExpressionClause'] as const;

/**
 * Turns any expression element into a tree node. Rejects non-filterable
 * attributes and values that are not elements at all.
 */
export function resolveElement(value: unknown): ResolvedExpression {
  if (value instanceof BooleanExpression || value instanceof BooleanExpressionClause) {
    return value;
  }
  if (value instanceof NonFilterableAttribute) {
    throw new AttributeUsageError(value.name);
  }
  if (typeof value === 'object' && value !== null && 'resolve' in value && typeof value.resolve === 'function') {
    const resolved: unknown = value.resolve();
    if (resolved instanceof BooleanExpression || resolved instanceof BooleanExpressionClause) {
      return resolved;
    }
    throw new QueryCompileError(resolved, describeType(resolved), EXPRESSION_TYPES);
  }
  throw new QueryCompileError(value, describeType(value), EXPRESSION_TYPES);
}

/** Runs body inside openGroup()/closeGroup(); the group is closed even if body throws. */
export function withGroup(builder: RemoteQueryBuilder, body: () => void): void {
  builder.openGroup();
  try {
    body();
  } finally {
    builder.closeGroup();
  }
}

/** Runs body inside a negate()/negate() pair; negation is restored even if body throws. */
export function withNegation(builder: RemoteQueryBuilder, body: () => void): void {
  builder.negate();
  try {
    body();
  } finally {
    builder.negate();
  }
}

export function compileSelect(
  builder: RemoteQueryBuilder,
  casing: CasingFunction,
  attributes: readonly AnyAttribute[],
): void {
  builder.clearSelect();
  if (attributes.length > 0) {
    builder.select(...attributes.map((attribute) => casing(attribute.name)));
  }
}

/**
 * Replaces the builder's filter with element and returns the compiled root.
 * If compiling fails partway, the builder is reset to previous (or to no
 * filter) before the error propagates.
 */
export function compileWhere(
  builder: RemoteQueryBuilder,
  casing: CasingFunction,
  element: unknown,
  previous: ResolvedExpression | null = null,
): ResolvedExpression {
  const root = resolveElement(element);
  builder.clearFilters();
  try {
    compileNode(builder, casing, root);
  } catch (err) {
    builder.clearFilters();
    if (previous !== null) {
      compileNode(builder, casing, previous);
    }
    throw err;
  }
  return root;
}

/**
 * Depth-first, left to right. One group per clause node, one chain() between
 * its sides; leaves are never reordered or flattened.
 */
export function compileNode(builder: RemoteQueryBuilder, casing: CasingFunction, node: unknown): void {
  if (node instanceof BooleanExpression) {
    compileComparison(builder, casing, node);
    return;
  }
  if (node instanceof BooleanExpressionClause) {
    withGroup(builder, () => {
      compileNode(builder, casing, node.left);
      builder.chain(node.operator);
      compileNode(builder, casing, node.right);
    });
    return;
  }
  throw new QueryCompileError(node, describeType(node), EXPRESSION_TYPES);
}

function compileComparison(builder: RemoteQueryBuilder, casing: CasingFunction, expression: BooleanExpression): void {
  builder.onAttribute(casing(expression.attribute));
  if (expression.negated) {
    withNegation(builder, () => applyComparator(builder, expression));
  } else {
    applyComparator(builder, expression);
  }
}

function applyComparator(builder: RemoteQueryBuilder, expression: BooleanExpression): void {
  const comparator = expression.comparator;
  switch (comparator) {
    case 'equals':
      builder.equals(requireArgument(expression));
      return;
    case 'notEquals':
      builder.notEquals(requireArgument(expression));
      return;
    case 'less':
      builder.less(requireArgument(expression));
      return;
    case 'lessEqual':
      builder.lessEqual(requireArgument(expression));
      return;
    case 'greater':
      builder.greater(requireArgument(expression));
      return;
    case 'greaterEqual':
      builder.greaterEqual(requireArgument(expression));
      return;
    case 'contains':
      builder.contains(requireText(expression));
      return;
    case 'startsWith':
      builder.startsWith(requireText(expression));
      return;
    case 'endsWith':
      builder.endsWith(requireText(expression));
      return;
    case 'isTrue':
      builder.equals(true);
      return;
    case 'isFalse':
      builder.equals(false);
      return;
    default: {
      const unhandled: never = comparator;
      throw new QueryCompileError(unhandled, describeType(unhandled), ['Comparator']);
    }
  }
}

function requireArgument(expression: BooleanExpression): FilterValue {
  if (expression.argument === undefined) {
    throw new QueryCompileError(
      expression.argument,
      'undefined',
      ['string', 'number', 'boolean', 'Date', 'null'],
      `Comparison "${expression.comparator}" on "${expression.attribute}" has no argument`,
    );
  }
  return expression.argument;
}

function requireText(expression: BooleanExpression): string {
  const argument = expression.argument;
  if (typeof argument !== 'string') {
    throw new QueryCompileError(
      argument,
      describeType(argument),
      ['string'],
      `Comparison "${expression.comparator}" on "${expression.attribute}" needs a string argument`,
    );
  }
  return argument;
}

export function compileOrder(builder: RemoteQueryBuilder, casing: CasingFunction, clause: unknown): void {
  const { name, ascending } = resolveOrder(casing, clause);
  builder.clearOrder();
  builder.orderBy(name, ascending);
}

function resolveOrder(casing: CasingFunction, clause: unknown): { name: string; ascending: boolean } {
  if (typeof clause === 'string') {
    return parseRawOrder(clause);
  }
  if (clause instanceof NonFilterableAttribute) {
    throw new AttributeUsageError(clause.name);
  }
  if (clause instanceof OrderedAttribute) {
    return { name: casing(clause.name), ascending: clause.ascending };
  }
  if (clause instanceof FilterableAttribute) {
    return { name: casing(clause.name), ascending: true };
  }
  throw new QueryUsageError(`Unrecognized type '${describeType(clause)}' of ${describeValue(clause)} for 'orderBy'`);
}

function parseRawOrder(raw: string): { name: string; ascending: boolean } {
  const parts = raw.trim().split(/\s+/);
  const [name, direction, ...rest] = parts;
  if (name === undefined || name === '' || rest.length > 0) {
    throw new QueryUsageError(`Malformed order clause '${raw}', expected "<field> [asc|desc]"`);
  }
  if (direction === undefined) {
    return { name, ascending: true };
  }
  const normalized = direction.toLowerCase();
  if (normalized !== 'asc' && normalized !== 'desc') {
    throw new QueryUsageError(`Malformed order clause '${raw}', direction must be "asc" or "desc"`);
  }
  return { name, ascending: normalized === 'asc' };
}
