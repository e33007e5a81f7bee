import type { ChainOperator, FilterValue } from '../../src/query/types.js';
import type { Protocol, RemoteQueryBuilder } from '../../src/types.js';
import { toCamelCase } from '../../src/protocol/casing.js';

export type BuilderCall = readonly [method: string, ...args: unknown[]];

/** Remote query builder that only records the calls it receives, in order. */
export class RecordingQueryBuilder implements RemoteQueryBuilder {
  readonly calls: BuilderCall[] = [];

  select(...names: string[]): void {
    this.calls.push(['select', ...names]);
  }
  clearSelect(): void {
    this.calls.push(['clearSelect']);
  }
  clearFilters(): void {
    this.calls.push(['clearFilters']);
  }
  clearOrder(): void {
    this.calls.push(['clearOrder']);
  }
  onAttribute(name: string): void {
    this.calls.push(['onAttribute', name]);
  }
  equals(value: FilterValue): void {
    this.calls.push(['equals', value]);
  }
  notEquals(value: FilterValue): void {
    this.calls.push(['notEquals', value]);
  }
  less(value: FilterValue): void {
    this.calls.push(['less', value]);
  }
  lessEqual(value: FilterValue): void {
    this.calls.push(['lessEqual', value]);
  }
  greater(value: FilterValue): void {
    this.calls.push(['greater', value]);
  }
  greaterEqual(value: FilterValue): void {
    this.calls.push(['greaterEqual', value]);
  }
  contains(value: string): void {
    this.calls.push(['contains', value]);
  }
  startsWith(value: string): void {
    this.calls.push(['startsWith', value]);
  }
  endsWith(value: string): void {
    this.calls.push(['endsWith', value]);
  }
  negate(): void {
    this.calls.push(['negate']);
  }
  chain(operator: ChainOperator): void {
    this.calls.push(['chain', operator]);
  }
  openGroup(): void {
    this.calls.push(['openGroup']);
  }
  closeGroup(): void {
    this.calls.push(['closeGroup']);
  }
  orderBy(name: string, ascending: boolean): void {
    this.calls.push(['orderBy', name, ascending]);
  }

  /** Calls with the given method name. */
  named(method: string): BuilderCall[] {
    return this.calls.filter(([name]) => name === method);
  }

  clear(): void {
    this.calls.length = 0;
  }
}

export class RecordingProtocol implements Protocol {
  readonly name = 'recording';
  readonly builders: RecordingQueryBuilder[] = [];

  casingFunction(name: string): string {
    return toCamelCase(name);
  }

  createQueryBuilder(): RecordingQueryBuilder {
    const builder = new RecordingQueryBuilder();
    this.builders.push(builder);
    return builder;
  }

  /** The builder created most recently. */
  get last(): RecordingQueryBuilder {
    const builder = this.builders[this.builders.length - 1];
    if (builder === undefined) {
      throw new Error('RecordingProtocol has not created a builder yet');
    }
    return builder;
  }
}
