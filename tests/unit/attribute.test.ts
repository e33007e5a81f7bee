import { describe, it, expect } from 'vitest';
import {
  Attribute,
  BooleanAttribute,
  EnumerativeAttribute,
  NonFilterableAttribute,
  OrderedAttribute,
  type EnumerationValues,
} from '../../src/query/attribute.js';
import { BooleanExpression } from '../../src/query/expression.js';
import { AttributeUsageError } from '../../src/errors.js';

const Subject = new Attribute('subject');
const Count = new Attribute<number>('total_item_count');
const IsRead = new BooleanAttribute('is_read');
const Priority = { Normal: 'normal', Low: 'low', High: 'high' } as const;
const Importance = new EnumerativeAttribute('importance', Priority);
const Body = new NonFilterableAttribute('body');

describe('Attribute (plain)', () => {
  it('has kind plain and keeps its registry name', () => {
    expect(Subject.kind).toBe('plain');
    expect(Subject.name).toBe('subject');
  });

  it.each([
    ['eq', 'equals'],
    ['ne', 'notEquals'],
    ['lt', 'less'],
    ['le', 'lessEqual'],
    ['gt', 'greater'],
    ['ge', 'greaterEqual'],
  ] as const)('%s() builds a %s comparison', (method, comparator) => {
    const expr = Count[method](3);
    expect(expr).toBeInstanceOf(BooleanExpression);
    expect(expr.attribute).toBe('total_item_count');
    expect(expr.comparator).toBe(comparator);
    expect(expr.argument).toBe(3);
    expect(expr.negated).toBe(false);
  });

  it('builds string function comparisons', () => {
    expect(Subject.contains('invoice').comparator).toBe('contains');
    expect(Subject.startsWith('RE:').comparator).toBe('startsWith');
    expect(Subject.endsWith('.pdf').comparator).toBe('endsWith');
    expect(Subject.endsWith('.pdf').argument).toBe('.pdf');
  });

  it('returns a fresh expression on every call', () => {
    const a = Subject.eq('x');
    const b = Subject.eq('x');
    expect(a).not.toBe(b);
    a.negate();
    expect(b.comparator).toBe('equals');
  });

  it('cannot be resolved on its own', () => {
    expect(() => Subject.resolve()).toThrow(AttributeUsageError);
    expect(() => Subject.resolve()).toThrow(
      'Attribute "subject" has no implicit truth value and must be compared before it is combined',
    );
  });

  it('cannot be combined before it is compared', () => {
    expect(() => Subject.and(IsRead)).toThrow(AttributeUsageError);
    expect(() => Subject.or(IsRead)).toThrow(AttributeUsageError);
  });

  it('asc() and desc() tag a sort direction', () => {
    const asc = Subject.asc();
    const desc = Subject.desc();
    expect(asc).toBeInstanceOf(OrderedAttribute);
    expect(asc.name).toBe('subject');
    expect(asc.ascending).toBe(true);
    expect(asc.direction).toBe('asc');
    expect(desc.ascending).toBe(false);
    expect(desc.direction).toBe('desc');
    expect(desc.attribute).toBe(Subject);
  });
});

describe('BooleanAttribute', () => {
  it('has kind boolean', () => {
    expect(IsRead.kind).toBe('boolean');
  });

  it('resolves to an is-true test', () => {
    const expr = IsRead.resolve();
    expect(expr.attribute).toBe('is_read');
    expect(expr.comparator).toBe('isTrue');
    expect(expr.argument).toBeUndefined();
  });

  it('not() builds the is-false test directly', () => {
    const expr = IsRead.not();
    expect(expr.comparator).toBe('isFalse');
    expect(expr.negated).toBe(false);
  });

  it('still supports explicit comparisons', () => {
    const expr = IsRead.eq(false);
    expect(expr.comparator).toBe('equals');
    expect(expr.argument).toBe(false);
  });

  it('combines directly with other elements', () => {
    const clause = IsRead.and(Subject.eq('x'));
    expect(clause.operator).toBe('and');
    expect(clause.left).toBeInstanceOf(BooleanExpression);
    expect(clause.left.kind).toBe('comparison');
  });
});

describe('EnumerativeAttribute', () => {
  it('has kind enumerative', () => {
    expect(Importance.kind).toBe('enumerative');
  });

  it('registers one accessor per member, lowercased', () => {
    expect(Importance.accessorNames).toEqual(['is_normal', 'is_low', 'is_high']);
  });

  it('accessors build equality tests against the member value', () => {
    const expr = Importance.is('is_high');
    expect(expr.attribute).toBe('importance');
    expect(expr.comparator).toBe('equals');
    expect(expr.argument).toBe('high');
  });

  it('accessors build a new expression each time', () => {
    expect(Importance.is('is_low')).not.toBe(Importance.is('is_low'));
  });

  it('accessors of one attribute do not leak into another', () => {
    const Flag = new EnumerativeAttribute('flag_status', { Flagged: 'flagged', Complete: 'complete' });
    expect(Flag.accessorNames).toEqual(['is_flagged', 'is_complete']);
    expect(Importance.accessorNames).not.toContain('is_flagged');
  });

  it('rejects an unknown accessor', () => {
    const Loose = new EnumerativeAttribute<EnumerationValues>('loose', { One: 'one' });
    expect(() => Loose.is('is_two')).toThrow(AttributeUsageError);
    expect(() => Loose.is('is_two')).toThrow('Attribute "loose" has no accessor "is_two" (known: is_one)');
  });

  it('supports eq() with a member value', () => {
    expect(Importance.eq('low').argument).toBe('low');
  });

  it('cannot be resolved on its own', () => {
    expect(() => Importance.resolve()).toThrow(
      'Attribute "importance" has no implicit truth value; use eq() or one of is_normal, is_low, is_high',
    );
  });
});

describe('NonFilterableAttribute', () => {
  it('exposes its name and kind', () => {
    expect(Body.name).toBe('body');
    expect(Body.kind).toBe('nonFilterable');
    expect(Body).toBeInstanceOf(NonFilterableAttribute);
  });

  it('stringifies to its name', () => {
    expect(String(Body)).toBe('body');
    expect(`${Body}`).toBe('body');
  });

  it.each(['eq', 'contains', 'asc', 'and', 'resolve', 'not'])('throws when %s is accessed', (property) => {
    expect(() => Reflect.get(Body, property)).toThrow(AttributeUsageError);
  });

  it('reports the attribute in the error', () => {
    try {
      Reflect.get(Body, 'eq');
      expect.unreachable('expected AttributeUsageError');
    } catch (err) {
      expect(err).toBeInstanceOf(AttributeUsageError);
      if (err instanceof AttributeUsageError) {
        expect(err.attribute).toBe('body');
        expect(err.message).toBe('Attribute "body" cannot be used in the filter/where/order clause of a query');
      }
    }
  });

  it('is not mistaken for a promise', () => {
    expect(Reflect.get(Body, 'then')).toBeUndefined();
  });
});
