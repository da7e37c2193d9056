import type { Filter, FilterNext, FilterParams } from '../types';
import { LineageCache } from './lineage-cache.js';

type MethodFilters = Map<string, Filter[]>;

/**
 * Method interception registry.
 *
 * Filters are applied to an instance or to a class under a method name. When
 * a filterable method runs through `run()`, the chain is built from the
 * filters of every class in the target's lineage (root first), then those of
 * the target itself, each group in the order it was applied. The first filter
 * in the chain is the outermost; the method's implementation sits at the end.
 *
 * @example
 * ```typescript
 * filters.apply(Post, 'save', (params, next) => {
 *   params.data = { ...params.data, updated: Date.now() };
 *   return next(params);
 * });
 *
 * filters.run(post, 'save', { data }, ({ data }) => storage.write(data));
 * ```
 */
export class Filters {
  private store = new WeakMap<object, MethodFilters>();

  /**
   * @param lineage - Ancestor lookup used to collect class-level filters
   */
  constructor(private readonly lineage: LineageCache = new LineageCache()) {}

  /**
   * Append `filter` to the chain of `target.method`.
   *
   * @param target - Instance, or class to filter every instance of it
   */
  apply(target: object, method: string, filter: Filter): void {
    let methods = this.store.get(target);
    if (!methods) {
      methods = new Map();
      this.store.set(target, methods);
    }
    const chain = methods.get(method);
    if (chain) chain.push(filter);
    else methods.set(method, [filter]);
  }

  /**
   * Remove filters.
   *
   * - `clear()` removes every filter of every target
   * - `clear(target)` removes every filter applied to `target`
   * - `clear(target, method)` removes the filters of one method
   */
  clear(target?: object, method?: string): void {
    if (target === undefined) {
      this.store = new WeakMap();
      return;
    }
    if (method === undefined) {
      this.store.delete(target);
      return;
    }
    this.store.get(target)?.delete(method);
  }

  /**
   * Whether filters were applied to `target.method` directly.
   */
  hasApplied(target: object, method: string): boolean {
    return (this.store.get(target)?.get(method)?.length ?? 0) > 0;
  }

  /**
   * Run `implementation` wrapped in every filter that applies to
   * `target.method`.
   *
   * @param target - Instance, or class for static methods
   * @param params - Named parameters handed to the first filter
   * @param implementation - The method body, called by the innermost `next`
   * @returns Whatever the outermost filter returns
   */
  run(
    target: object,
    method: string,
    params: FilterParams,
    implementation: (params: FilterParams) => unknown
  ): unknown {
    const chain = this.collect(target, method);
    if (chain.length === 0) return implementation(params);

    const step = (index: number): FilterNext => {
      if (index === chain.length) return implementation;
      const filter = chain[index];
      return (current) => filter(current, step(index + 1));
    };
    return step(0)(params);
  }

  // ---- internals ----

  private collect(target: object, method: string): Filter[] {
    const owners: object[] = [];
    const ctor: unknown =
      typeof target === 'function' ? target : Reflect.get(target, 'constructor');
    if (typeof ctor === 'function') {
      owners.push(...[...this.lineage.parentsOf(ctor)].reverse(), ctor);
    }
    if (target !== ctor) owners.push(target);

    const chain: Filter[] = [];
    for (const owner of owners) {
      const filters = this.store.get(owner)?.get(method);
      if (filters) chain.push(...filters);
    }
    return chain;
  }
}
