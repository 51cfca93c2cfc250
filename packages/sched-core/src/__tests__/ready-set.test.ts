import { describe, it, expect } from 'vitest';
import { compareKeys, createFifoReadySet, createKeyedReadySet } from '../ready-set/index.js';
import { InvariantError } from '../errors.js';

function drain(set: ReturnType<typeof createFifoReadySet>): number[] {
  const out: number[] = [];
  while (set.size() > 0) out.push(set.pop());
  return out;
}

describe('compareKeys', () => {
  it('orders tuples lexicographically', () => {
    expect(compareKeys([1, 5], [2, 0])).toBe(-1);
    expect(compareKeys([2, 0], [1, 5])).toBe(1);
    expect(compareKeys([3, 1, 7], [3, 1, 7])).toBe(0);
    expect(compareKeys([3, 1, 2], [3, 1, 7])).toBe(-1);
  });

  it('sorts a prefix before the longer key', () => {
    expect(compareKeys([4], [4, 0])).toBeLessThan(0);
  });
});

describe('KeyedReadySet', () => {
  it('pops handles in key order', () => {
    const keys = new Map<number, number[]>([
      [0, [10]],
      [1, [1]],
      [2, [5]],
    ]);
    const set = createKeyedReadySet((h) => keys.get(h) ?? []);
    set.insert(0);
    set.insert(1);
    set.insert(2);

    expect(set.peek()).toBe(1);
    expect(set.size()).toBe(3);
    expect(drain(set)).toEqual([1, 2, 0]);
  });

  it('breaks equal keys by insertion order', () => {
    const set = createKeyedReadySet(() => [7]);
    for (const h of [4, 2, 9, 0]) set.insert(h);
    expect(drain(set)).toEqual([4, 2, 9, 0]);
  });

  it('uses secondary key components before insertion order', () => {
    const keys: Record<number, number[]> = { 0: [3, 2, 0], 1: [3, 1, 1], 2: [3, 1, 0] };
    const set = createKeyedReadySet((h) => keys[h] ?? []);
    set.insert(0);
    set.insert(1);
    set.insert(2);
    expect(drain(set)).toEqual([2, 1, 0]);
  });

  it('derives the key at insertion time', () => {
    const value = [5, 5];
    const set = createKeyedReadySet((h) => [value[h] ?? 0]);
    set.insert(0);
    set.insert(1);
    expect(set.pop()).toBe(0);

    // Handle 0 comes back with a larger key after "running".
    value[0] = 9;
    set.insert(0);
    expect(drain(set)).toEqual([1, 0]);
  });

  it('visits every handle except the given one', () => {
    const set = createKeyedReadySet((h) => [h]);
    for (const h of [3, 1, 2]) set.insert(h);
    const seen: number[] = [];
    set.forEachExcept(1, (h) => seen.push(h));
    expect(seen.sort()).toEqual([2, 3]);
  });

  it('throws an InvariantError on peek or pop when empty', () => {
    const set = createKeyedReadySet(() => [0]);
    expect(() => set.peek()).toThrow(InvariantError);
    expect(() => set.pop()).toThrow(InvariantError);
  });
});

describe('FifoReadySet', () => {
  it('pops in insertion order regardless of handle value', () => {
    const set = createFifoReadySet();
    for (const h of [5, 0, 3]) set.insert(h);
    expect(set.peek()).toBe(5);
    expect(drain(set)).toEqual([5, 0, 3]);
  });

  it('keeps order across many rotations', () => {
    const set = createFifoReadySet();
    set.insert(0);
    set.insert(1);
    set.insert(2);
    const order: number[] = [];
    for (let i = 0; i < 300; i++) {
      const h = set.pop();
      order.push(h);
      set.insert(h);
    }
    expect(set.size()).toBe(3);
    expect(order.slice(0, 6)).toEqual([0, 1, 2, 0, 1, 2]);
    expect(order.slice(-3)).toEqual([0, 1, 2]);
    expect(drain(set)).toEqual([0, 1, 2]);
  });

  it('visits queued handles except the given one', () => {
    const set = createFifoReadySet();
    for (const h of [7, 8, 9]) set.insert(h);
    set.pop();
    const seen: number[] = [];
    set.forEachExcept(9, (h) => seen.push(h));
    expect(seen).toEqual([8]);
  });

  it('throws an InvariantError on peek or pop when empty', () => {
    const set = createFifoReadySet();
    expect(() => set.peek()).toThrow(InvariantError);
    expect(() => set.pop()).toThrow(InvariantError);
  });
});
