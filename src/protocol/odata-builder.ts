import { QueryCompileError, describeType } from '../errors.js';
import type { ChainOperator, FilterValue } from '../query/types.js';
import type { RemoteQueryBuilder } from '../types.js';

export interface ODataParams {
  $select?: string;
  $filter?: string;
  $orderby?: string;
}

type ComparisonOperator = 'eq' | 'ne' | 'lt' | 'le' | 'gt' | 'ge';
type FilterFunction = 'contains' | 'startswith' | 'endswith';

/**
 * Remote query builder for OData-style endpoints. Filter calls append tokens
 * in call order; `$filter` is rendered from those tokens on demand.
 *
 * @example
 * builder.openGroup();
 * builder.onAttribute('subject');
 * builder.contains('invoice');
 * builder.chain('and');
 * builder.onAttribute('isRead');
 * builder.equals(true);
 * builder.closeGroup();
 * builder.filter; // "(contains(subject, 'invoice') and isRead eq true)"
 */
export class ODataQueryBuilder implements RemoteQueryBuilder {
  private selects: string[] = [];
  private tokens: string[] = [];
  private orders: string[] = [];
  private attribute: string | null = null;
  private negation = false;
  private depth = 0;

  select(...names: string[]): void {
    for (const name of names) {
      if (!this.selects.includes(name)) {
        this.selects.push(name);
      }
    }
  }

  clearSelect(): void {
    this.selects = [];
  }

  clearFilters(): void {
    this.tokens = [];
    this.attribute = null;
    this.negation = false;
    this.depth = 0;
  }

  clearOrder(): void {
    this.orders = [];
  }

  onAttribute(name: string): void {
    this.attribute = name;
  }

  equals(value: FilterValue): void {
    this.addComparison('eq', value);
  }

  notEquals(value: FilterValue): void {
    this.addComparison('ne', value);
  }

  less(value: FilterValue): void {
    this.addComparison('lt', value);
  }

  lessEqual(value: FilterValue): void {
    this.addComparison('le', value);
  }

  greater(value: FilterValue): void {
    this.addComparison('gt', value);
  }

  greaterEqual(value: FilterValue): void {
    this.addComparison('ge', value);
  }

  contains(value: string): void {
    this.addFunction('contains', value);
  }

  startsWith(value: string): void {
    this.addFunction('startswith', value);
  }

  endsWith(value: string): void {
    this.addFunction('endswith', value);
  }

  negate(): void {
    this.negation = !this.negation;
  }

  chain(operator: ChainOperator): void {
    this.tokens.push(operator);
  }

  openGroup(): void {
    this.tokens.push('(');
    this.depth += 1;
  }

  closeGroup(): void {
    if (this.depth === 0) {
      throw new QueryCompileError(')', 'string', ['('], 'closeGroup() called without a matching openGroup()');
    }
    this.tokens.push(')');
    this.depth -= 1;
  }

  orderBy(name: string, ascending: boolean): void {
    this.orders.push(`${name} ${ascending ? 'asc' : 'desc'}`);
  }

  get filter(): string {
    if (this.depth !== 0) {
      throw new QueryCompileError(
        this.depth,
        'number',
        ['0'],
        `Filter has ${this.depth} unclosed group(s)`,
      );
    }
    let rendered = '';
    for (const token of this.tokens) {
      if (token === ')' || rendered === '' || rendered.endsWith('(')) {
        rendered += token;
      } else {
        rendered += ` ${token}`;
      }
    }
    return rendered;
  }

  get selectClause(): string {
    return this.selects.join(',');
  }

  get orderClause(): string {
    return this.orders.join(',');
  }

  /** Only the non-empty parameters. */
  toParams(): ODataParams {
    const filter = this.filter;
    return {
      ...(this.selects.length > 0 ? { $select: this.selectClause } : {}),
      ...(filter !== '' ? { $filter: filter } : {}),
      ...(this.orders.length > 0 ? { $orderby: this.orderClause } : {}),
    };
  }

  private addComparison(operator: ComparisonOperator, value: FilterValue): void {
    const attribute = this.requireAttribute();
    this.tokens.push(`${this.prefix()}${attribute} ${operator} ${formatValue(value)}`);
  }

  private addFunction(fn: FilterFunction, value: string): void {
    const attribute = this.requireAttribute();
    this.tokens.push(`${this.prefix()}${fn}(${attribute}, ${formatValue(value)})`);
  }

  private prefix(): string {
    return this.negation ? 'not ' : '';
  }

  private requireAttribute(): string {
    if (this.attribute === null) {
      throw new QueryCompileError(
        null,
        'null',
        ['string'],
        'No attribute selected: call onAttribute() before a comparator',
      );
    }
    return this.attribute;
  }
}

/**
 * OData literal for a filter value. Strings are quoted with embedded quotes
 * doubled; dates are ISO-8601 and unquoted.
 */
export function formatValue(value: FilterValue): string {
  if (value === null) return 'null';
  if (typeof value === 'string') return `'${value.replaceAll("'", "''")}'`;
  if (typeof value === 'boolean') return value ? 'true' : 'false';
  if (typeof value === 'number') {
    if (!Number.isFinite(value)) {
      throw new QueryCompileError(value, 'number', ['finite number']);
    }
    return String(value);
  }
  if (Number.isNaN(value.getTime())) {
    throw new QueryCompileError(value, describeType(value), ['valid Date']);
  }
  return value.toISOString();
}
