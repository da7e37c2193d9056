import { describe, expect, it, vi } from 'vitest';

import { LineageCache, classParents } from '../src/core/lineage-cache.js';

class Animal {}
class Mammal extends Animal {}
class Dog extends Mammal {}

describe('classParents()', () => {
  it('walks ancestors nearest first, excluding the class itself', () => {
    expect(classParents(Dog)).toEqual([Mammal, Animal]);
  });

  it('returns an empty list for root classes', () => {
    expect(classParents(Animal)).toEqual([]);
  });
});

describe('LineageCache', () => {
  it('computes each lineage once and serves the same frozen list', () => {
    const lookup = vi.fn(classParents);
    const cache = new LineageCache(lookup);

    const first = cache.parentsOf(Dog);
    const second = cache.parentsOf(Dog);

    expect(first).toEqual([Mammal, Animal]);
    expect(second).toBe(first);
    expect(Object.isFrozen(first)).toBe(true);
    expect(lookup).toHaveBeenCalledTimes(1);
    expect(lookup).toHaveBeenCalledWith(Dog);
  });

  it('keys entries by class identity', () => {
    const cache = new LineageCache();
    cache.parentsOf(Dog);
    cache.parentsOf(Mammal);

    expect(cache.size).toBe(2);
    expect(cache.has(Dog)).toBe(true);
    expect(cache.has(Animal)).toBe(false);
  });

  it('does not let callers mutate the cached lineage through the lookup result', () => {
    const shared = [Animal];
    const cache = new LineageCache(() => shared);

    cache.parentsOf(Mammal);
    shared.push(Mammal);

    expect(cache.parentsOf(Mammal)).toEqual([Animal]);
  });

  it('forgets everything on clear()', () => {
    const lookup = vi.fn(classParents);
    const cache = new LineageCache(lookup);

    cache.parentsOf(Dog);
    cache.clear();
    cache.parentsOf(Dog);

    expect(cache.size).toBe(1);
    expect(lookup).toHaveBeenCalledTimes(2);
  });
});
