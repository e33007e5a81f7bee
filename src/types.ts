import type { ChainOperator, FilterValue } from './query/types.js';

/**
 * Imperative filter builder of the remote object-query API. Calls accumulate
 * state; the compiler issues them in a fixed depth-first order.
 */
export interface RemoteQueryBuilder {
  select(...names: string[]): void;
  clearSelect(): void;
  clearFilters(): void;
  clearOrder(): void;

  /** Sets the attribute the next comparator call applies to. */
  onAttribute(name: string): void;
  equals(value: FilterValue): void;
  notEquals(value: FilterValue): void;
  less(value: FilterValue): void;
  lessEqual(value: FilterValue): void;
  greater(value: FilterValue): void;
  greaterEqual(value: FilterValue): void;
  contains(value: string): void;
  startsWith(value: string): void;
  endsWith(value: string): void;

  /** Toggles negation for every comparator call issued until the next negate(). */
  negate(): void;
  chain(operator: ChainOperator): void;
  openGroup(): void;
  closeGroup(): void;

  orderBy(name: string, ascending: boolean): void;
}

export interface Protocol {
  readonly name: string;
  /** Converts a registry field name into the remote API's spelling. */
  casingFunction(name: string): string;
  createQueryBuilder(): RemoteQueryBuilder;
}

/** Back-reference handed to results that need to reach the owning account. */
export interface OfficeHandle {
  readonly resource: string;
}

/** Target of a copy or move. */
export interface FolderRef {
  readonly id: string;
}

/** Folder, address book or calendar a Query runs against. */
export interface QueryContainer {
  readonly protocol: Protocol;
}

export interface FetchOptions {
  /** null means the remote default page size. */
  limit: number | null;
  query: RemoteQueryBuilder;
}

export interface ExecuteEvent {
  kind: string;
  limit: number | null;
}

export interface UncommittedEvent {
  action: string;
  count: number;
}

export interface QueryOptions {
  /** Used when limit() was never called. */
  defaultLimit?: number;
  onExecute?: (event: ExecuteEvent) => void;
  /** Called when a scoped bulk action closes with results but no commit(). */
  onUncommitted?: (event: UncommittedEvent) => void;
}
