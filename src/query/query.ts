import { QueryUsageError } from '../errors.js';
import type { FetchOptions, QueryContainer, QueryOptions, RemoteQueryBuilder } from '../types.js';
import type { AnyAttribute } from './attribute.js';
import type { BulkAction } from './bulk.js';
import { compileOrder, compileSelect, compileWhere, type CasingFunction, type OrderClause } from './compiler.js';
import type { ExpressionElement, ResolvedExpression } from './types.js';

/**
 * One-shot query against a single container. Owns one remote query builder;
 * select(), where() and orderBy() each clear their part of the builder and
 * rebuild it immediately, so repeated calls never accumulate.
 *
 * @example
 * const unread = await new MessageQuery(inbox)
 *   .select(MessageAttributes.Subject, MessageAttributes.From)
 *   .where(MessageAttributes.Subject.contains('invoice').and(MessageAttributes.IsRead.not()))
 *   .orderBy(MessageAttributes.ReceivedOn.desc())
 *   .limit(10)
 *   .execute();
 */
export abstract class Query<T> {
  /** Entity kind reported to onExecute. */
  protected abstract readonly kind: string;
  protected readonly builder: RemoteQueryBuilder;
  protected readonly casing: CasingFunction;
  private _limit: number | null = null;
  private _filter: ResolvedExpression | null = null;

  constructor(
    protected readonly container: QueryContainer,
    protected readonly options: QueryOptions = {},
  ) {
    this.builder = container.protocol.createQueryBuilder();
    this.casing = (name) => container.protocol.casingFunction(name);
  }

  /** Restrict the fields fetched. No attributes means all fields. */
  select(...attributes: AnyAttribute[]): this {
    compileSelect(this.builder, this.casing, attributes);
    return this;
  }

  where(element: ExpressionElement): this {
    this._filter = compileWhere(this.builder, this.casing, element, this._filter);
    return this;
  }

  orderBy(clause: OrderClause): this {
    compileOrder(this.builder, this.casing, clause);
    return this;
  }

  /** Applied by the container's fetch call, not by the builder. Last value wins. */
  limit(limit: number = 25): this {
    if (!Number.isInteger(limit) || limit <= 0) {
      throw new QueryUsageError(`limit must be a positive integer, got ${String(limit)}`);
    }
    this._limit = limit;
    return this;
  }

  /** Effective limit: the last limit() value, else defaultLimit, else null (remote default). */
  get limitValue(): number | null {
    return this._limit ?? this.options.defaultLimit ?? null;
  }

  get queryBuilder(): RemoteQueryBuilder {
    return this.builder;
  }

  abstract get bulk(): BulkAction<T>;

  abstract execute(): Promise<T[]>;

  protected fetchOptions(): FetchOptions {
    const limit = this.limitValue;
    this.options.onExecute?.({ kind: this.kind, limit });
    return { limit, query: this.builder };
  }
}
