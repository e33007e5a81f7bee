import type { QueryOptions, UncommittedEvent } from '../types.js';

export type BulkActionFn<T, A extends unknown[]> = (item: T, ...args: A) => unknown;

export interface Executable<T> {
  execute(): Promise<readonly T[]>;
}

export interface BulkActionContextConfig {
  /** Action name, used when reporting an uncommitted scope. */
  name: string;
  onUncommitted?: (event: UncommittedEvent) => void;
}

/**
 * Runs a query and applies an action to every result.
 *
 * execute() does both at once. The scoped form (open/close, or run) fetches
 * first and applies the action on close only if commit() was called, so the
 * caller can look at the results before anything destructive happens.
 *
 * Actions run one at a time in result order; the first failure stops the
 * loop and propagates.
 */
export class BulkActionContext<T, A extends unknown[] = []> {
  private _result: readonly T[] = [];
  private _committed = false;
  private readonly onUncommitted: (event: UncommittedEvent) => void;

  constructor(
    private readonly query: Executable<T>,
    private readonly action: BulkActionFn<T, A>,
    private readonly args: A,
    private readonly config: BulkActionContextConfig,
  ) {
    this.onUncommitted = config.onUncommitted ?? ((event) => {
      console.warn(
        `[bulk] "${event.action}" skipped: ${event.count} result(s) fetched but commit() was not called`,
      );
    });
  }

  get name(): string {
    return this.config.name;
  }

  get result(): readonly T[] {
    return this._result;
  }

  get length(): number {
    return this._result.length;
  }

  get hasResults(): boolean {
    return this._result.length > 0;
  }

  get committed(): boolean {
    return this._committed;
  }

  commit(): void {
    this._committed = true;
  }

  /** Runs the query, applies the action to every result, returns how many there were. */
  async execute(): Promise<number> {
    await this.executeQuery();
    await this.performBulkAction();
    return this.length;
  }

  /** Start of the scoped form: runs the query and captures the results. */
  async open(): Promise<this> {
    await this.executeQuery();
    return this;
  }

  /** End of the scoped form: applies the action only if commit() was called. */
  async close(): Promise<void> {
    if (this._committed) {
      await this.performBulkAction();
      return;
    }
    if (this.hasResults) {
      this.onUncommitted({ action: this.config.name, count: this.length });
    }
  }

  /**
   * open(), then scope, then close(). If scope throws, close() is skipped and
   * the action is not applied, committed or not.
   */
  async run<R>(scope: (context: this) => Promise<R> | R): Promise<R> {
    await this.open();
    const value = await scope(this);
    await this.close();
    return value;
  }

  private async executeQuery(): Promise<void> {
    this._result = [...(await this.query.execute())];
  }

  private async performBulkAction(): Promise<void> {
    for (const item of this._result) {
      await this.action(item, ...this.args);
    }
  }
}

/** Base of the per-entity bulk action factories (delete, move, ...). */
export abstract class BulkAction<T> {
  constructor(
    protected readonly query: Executable<T>,
    protected readonly options: QueryOptions = {},
  ) {}

  protected context<A extends unknown[]>(
    name: string,
    action: BulkActionFn<T, A>,
    ...args: A
  ): BulkActionContext<T, A> {
    return new BulkActionContext(this.query, action, args, {
      name,
      ...(this.options.onUncommitted !== undefined ? { onUncommitted: this.options.onUncommitted } : {}),
    });
  }
}
