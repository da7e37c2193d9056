import type { Constructor } from '../types';

function isConstructor(value: unknown): value is Constructor {
  return typeof value === 'function' && value.prototype !== undefined;
}

/**
 * Ancestor classes of `ctor`, nearest parent first.
 *
 * The walk stops at the first link that is not a class, so the result never
 * includes `Function.prototype` and never includes `ctor` itself.
 */
export function classParents(ctor: object): Constructor[] {
  const parents: Constructor[] = [];
  let current: unknown = Object.getPrototypeOf(ctor);
  while (isConstructor(current)) {
    parents.push(current);
    current = Object.getPrototypeOf(current);
  }
  return parents;
}

/**
 * Ancestor lookup memo keyed by class identity.
 *
 * Each class is resolved once through `lookup` and the frozen result is
 * served from then on. Entries are never invalidated: class hierarchies do
 * not change after definition.
 */
export class LineageCache {
  /**
   * class → frozen ancestor list
   */
  private readonly index = new Map<object, readonly Constructor[]>();

  /**
   * @param lookup - Ancestor primitive, `classParents` unless replaced
   */
  constructor(private readonly lookup: (ctor: object) => readonly Constructor[] = classParents) {}

  /**
   * Ancestors of `ctor`, computed on first access.
   */
  parentsOf(ctor: object): readonly Constructor[] {
    let parents = this.index.get(ctor);
    if (!parents) {
      parents = Object.freeze([...this.lookup(ctor)]);
      this.index.set(ctor, parents);
    }
    return parents;
  }

  has(ctor: object): boolean {
    return this.index.has(ctor);
  }

  get size(): number {
    return this.index.size;
  }

  /**
   * Forget every cached lineage.
   *
   * ⚠️ For test environments only.
   */
  clear(): void {
    this.index.clear();
  }
}
