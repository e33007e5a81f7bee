import { describe, it, expect, vi, afterEach } from 'vitest';
import { BulkActionContext, type Executable } from '../../src/query/bulk.js';
import type { UncommittedEvent } from '../../src/types.js';

function source<T>(items: T[]) {
  return { execute: vi.fn(async () => items) } satisfies Executable<T>;
}

afterEach(() => {
  vi.restoreAllMocks();
});

describe('BulkActionContext.execute', () => {
  it('runs the query, applies the action to every result and returns the count', async () => {
    const seen: string[] = [];
    const context = new BulkActionContext(source(['a', 'b', 'c']), (item: string) => seen.push(item), [], {
      name: 'touch',
    });

    expect(await context.execute()).toBe(3);
    expect(seen).toEqual(['a', 'b', 'c']);
    expect(context.result).toEqual(['a', 'b', 'c']);
    expect(context.length).toBe(3);
    expect(context.hasResults).toBe(true);
  });

  it('passes the bound arguments to every call', async () => {
    const action = vi.fn((_item: string, _target: { id: string }) => undefined);
    const target = { id: 'folder-1' };
    const context = new BulkActionContext(source(['a', 'b']), action, [target], { name: 'move' });

    await context.execute();

    expect(action.mock.calls).toEqual([
      ['a', target],
      ['b', target],
    ]);
  });

  it('awaits each action before starting the next', async () => {
    const order: string[] = [];
    const action = async (item: string) => {
      order.push(`start ${item}`);
      await Promise.resolve();
      order.push(`end ${item}`);
    };
    await new BulkActionContext(source(['a', 'b']), action, [], { name: 'slow' }).execute();
    expect(order).toEqual(['start a', 'end a', 'start b', 'end b']);
  });

  it('stops at the first failing action', async () => {
    const action = vi.fn(async (item: string) => {
      if (item === 'b') throw new Error('cannot act on b');
    });
    const context = new BulkActionContext(source(['a', 'b', 'c']), action, [], { name: 'delete' });

    await expect(context.execute()).rejects.toThrow('cannot act on b');
    expect(action.mock.calls.map(([item]) => item)).toEqual(['a', 'b']);
  });

  it('returns 0 for an empty result', async () => {
    const action = vi.fn();
    const context = new BulkActionContext(source<string>([]), action, [], { name: 'delete' });
    expect(await context.execute()).toBe(0);
    expect(action).not.toHaveBeenCalled();
    expect(context.hasResults).toBe(false);
  });
});

describe('BulkActionContext scoped form', () => {
  it('applies the action on close when committed', async () => {
    const action = vi.fn();
    const context = new BulkActionContext(source(['a', 'b']), action, [], { name: 'delete' });

    await context.run((ctx) => {
      expect(ctx.result).toEqual(['a', 'b']);
      expect(action).not.toHaveBeenCalled();
      ctx.commit();
    });

    expect(context.committed).toBe(true);
    expect(action).toHaveBeenCalledTimes(2);
  });

  it('skips the action and reports when not committed', async () => {
    const action = vi.fn();
    const onUncommitted = vi.fn<(event: UncommittedEvent) => void>();
    const context = new BulkActionContext(source(['a', 'b']), action, [], { name: 'delete', onUncommitted });

    await context.run(() => undefined);

    expect(action).not.toHaveBeenCalled();
    expect(onUncommitted).toHaveBeenCalledWith({ action: 'delete', count: 2 });
  });

  it('does not report an uncommitted scope with no results', async () => {
    const onUncommitted = vi.fn<(event: UncommittedEvent) => void>();
    const context = new BulkActionContext(source<string>([]), vi.fn(), [], { name: 'delete', onUncommitted });
    await context.run(() => undefined);
    expect(onUncommitted).not.toHaveBeenCalled();
  });

  it('warns on the console by default', async () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const context = new BulkActionContext(source(['a', 'b']), vi.fn(), [], { name: 'delete' });

    await context.run(() => undefined);

    expect(warn).toHaveBeenCalledWith('[bulk] "delete" skipped: 2 result(s) fetched but commit() was not called');
  });

  it('does not apply the action when the scope throws, even if committed', async () => {
    const action = vi.fn();
    const context = new BulkActionContext(source(['a']), action, [], { name: 'delete' });

    await expect(
      context.run((ctx) => {
        ctx.commit();
        throw new Error('changed my mind');
      }),
    ).rejects.toThrow('changed my mind');
    expect(action).not.toHaveBeenCalled();
  });

  it('returns the scope value', async () => {
    const context = new BulkActionContext(source(['a', 'b']), vi.fn(), [], { name: 'delete' });
    const count = await context.run(async (ctx) => {
      ctx.commit();
      return ctx.length;
    });
    expect(count).toBe(2);
  });

  it('open() and close() can be called directly', async () => {
    const action = vi.fn();
    const query = source(['a']);
    const context = new BulkActionContext(query, action, [], { name: 'markAsRead' });

    expect(await context.open()).toBe(context);
    expect(query.execute).toHaveBeenCalledTimes(1);
    context.commit();
    await context.close();

    expect(action).toHaveBeenCalledTimes(1);
  });

  it('exposes its action name', () => {
    expect(new BulkActionContext(source([]), vi.fn(), [], { name: 'copy' }).name).toBe('copy');
  });
});
