import { describe, it, expect } from 'vitest';
import { evaluateCondition, looseEquals } from './workflows.condition';
import { ConditionError } from './workflows.errors';

describe('evaluateCondition', () => {
  it('compares numbers, including numeric strings', () => {
    expect(evaluateCondition('$score > 10', { score: 12 })).toBe(true);
    expect(evaluateCondition('$score <= 10', { score: 12 })).toBe(false);
    expect(evaluateCondition('$n == 5', { n: '5' })).toBe(true);
    expect(evaluateCondition('$t > -5', { t: -3 })).toBe(true);
  });

  it('accepts bare paths and quoted strings', () => {
    expect(evaluateCondition('status == "active"', { status: 'active' })).toBe(true);
    expect(evaluateCondition("status != 'active'", { status: 'active' })).toBe(false);
  });

  it('combines with word and symbol connectives', () => {
    const context = { status: 'active', blocked: false, a: 1, b: 0, c: 0 };
    expect(evaluateCondition('status == "active" and not $blocked', context)).toBe(true);
    expect(evaluateCondition('$a == 1 || $b == 2 && $c == 3', context)).toBe(true);
    expect(evaluateCondition('($a == 1 || $b == 2) && $c == 3', context)).toBe(false);
    expect(evaluateCondition('!($a == 2)', context)).toBe(true);
  });

  it('supports contains and matches', () => {
    expect(evaluateCondition('$tags contains "vip"', { tags: ['vip', 'new'] })).toBe(true);
    expect(evaluateCondition('$name contains "LOVE"', { name: 'Ada Lovelace' })).toBe(true);
    expect(evaluateCondition('$email matches "^ada@"', { email: 'ADA@example.com' })).toBe(true);
  });

  it('treats empty collections and missing values as false', () => {
    expect(evaluateCondition('$items', { items: [] })).toBe(false);
    expect(evaluateCondition('!$items', { items: [] })).toBe(true);
    expect(evaluateCondition('$profile', { profile: {} })).toBe(false);
    expect(evaluateCondition('$missing', {})).toBe(false);
    expect(evaluateCondition('$missing == null', {})).toBe(true);
  });

  it('orders non-numeric values as strings', () => {
    expect(evaluateCondition('$day >= "2024-01-01"', { day: '2024-05-01' })).toBe(true);
  });

  it('reads projected array fields', () => {
    expect(evaluateCondition('$orders.length > 1', { orders: [{ id: 1 }, { id: 2 }] })).toBe(true);
  });

  it('rejects malformed expressions', () => {
    expect(() => evaluateCondition('$a ==', {})).toThrow(ConditionError);
    expect(() => evaluateCondition('($a', { a: 1 })).toThrow(ConditionError);
    expect(() => evaluateCondition('$a # 1', { a: 1 })).toThrow(ConditionError);
    expect(() => evaluateCondition('   ', {})).toThrow(ConditionError);
    expect(() => evaluateCondition('"open', {})).toThrow(ConditionError);
  });

  it('only takes quoted patterns of bounded length for matches', () => {
    const context = { name: 'a'.repeat(200), pattern: '(a+)+$' };
    expect(() => evaluateCondition('$name matches $pattern', context)).toThrow(
      '"matches" needs a quoted pattern in condition: $name matches $pattern',
    );
    expect(evaluateCondition(`$name matches "${'a'.repeat(200)}"`, context)).toBe(true);
    expect(() => evaluateCondition(`$name matches "${'a'.repeat(201)}"`, context)).toThrow(
      'Pattern is longer than 200 characters',
    );
  });
});

describe('looseEquals', () => {
  it('compares objects structurally', () => {
    expect(looseEquals({ a: 1 }, { a: 1 })).toBe(true);
    expect(looseEquals(null, undefined)).toBe(true);
    expect(looseEquals(0, null)).toBe(false);
  });
});
