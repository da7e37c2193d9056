import type { AutoConfigBinding } from '../types';

/**
 * Sentinel for classes without any auto-configuration directive.
 * Avoids allocating an empty table for every undecorated class.
 */
const EMPTY_TABLE: readonly AutoConfigBinding[] = Object.freeze([]);

/**
 * Mutable record storing decorator metadata for one prototype (or, for
 * static members, one constructor).
 *
 * Fields:
 * - directives: property name → binding, in decoration order
 * - internals: member names marked with @Internal()
 */
type MutableClassRecord = {
  directives: Map<string, AutoConfigBinding>;
  internals: Set<string>;
};

/**
 * Dispatch table cached for one concrete prototype, stamped with the store
 * generation it was computed at.
 */
type CachedTable = {
  generation: number;
  table: readonly AutoConfigBinding[];
};

/**
 * Registry structure stored on globalThis.
 *
 * `generation` increments on every registration so tables computed before a
 * late decoration are recomputed instead of served stale.
 */
type RegistryStore = {
  records: WeakMap<object, MutableClassRecord>;
  tables: WeakMap<object, CachedTable>;
  generation: number;
};

/**
 * Global symbol for storing the class registry on globalThis.
 *
 * This ensures a single registry per process, even if the module is bundled
 * more than once.
 */
const GLOBAL_SYMBOL = Symbol.for('armature.classRegistry');

function createStore(): RegistryStore {
  return { records: new WeakMap(), tables: new WeakMap(), generation: 0 };
}

function isRegistryStore(value: unknown): value is RegistryStore {
  return (
    typeof value === 'object' &&
    value !== null &&
    'records' in value &&
    value.records instanceof WeakMap &&
    'tables' in value &&
    value.tables instanceof WeakMap &&
    'generation' in value &&
    typeof value.generation === 'number'
  );
}

function ensureStore(): RegistryStore {
  const existing: unknown = Reflect.get(globalThis, GLOBAL_SYMBOL);
  if (isRegistryStore(existing)) return existing;
  const fresh = createStore();
  Reflect.set(globalThis, GLOBAL_SYMBOL, fresh);
  return fresh;
}

function isObjectLike(value: unknown): value is object {
  return (typeof value === 'object' && value !== null) || typeof value === 'function';
}

/**
 * Objects on the prototype chain of `target`, starting with `target` itself.
 */
export function prototypeChain(target: object): object[] {
  const chain: object[] = [];
  let current: unknown = target;
  while (isObjectLike(current)) {
    chain.push(current);
    current = Object.getPrototypeOf(current);
  }
  return chain;
}

/**
 * The first object on the prototype chain of `target` that holds `member` as
 * an own property, or `undefined` when nothing does.
 */
export function ownerOf(target: object, member: string): object | undefined {
  return prototypeChain(target).find((link) =>
    Object.prototype.hasOwnProperty.call(link, member)
  );
}

/**
 * Global registry for decorator metadata.
 *
 * This registry stores what @AutoConfig() and @Internal() declare. Records are
 * keyed by the object the decorator receives: the prototype for instance
 * members, the constructor for static members.
 *
 * Architecture:
 * - Decorators call registerDirective() / registerInternal() at class definition
 * - BaseObject calls directivesOf() during construction to get its dispatch table
 * - Inspector calls isInternal() to answer capability queries
 */
export class ClassRegistry {
  /**
   * Register an auto-configuration binding for a property.
   *
   * Re-decorating the same property on the same prototype replaces the
   * earlier binding.
   */
  static registerDirective(prototype: object, binding: AutoConfigBinding): void {
    const store = ensureStore();
    this.recordFor(store, prototype).directives.set(binding.property, binding);
    store.generation++;
  }

  /**
   * Mark a member as non-public for capability queries.
   */
  static registerInternal(target: object, member: string): void {
    const store = ensureStore();
    this.recordFor(store, target).internals.add(member);
    store.generation++;
  }

  /**
   * Dispatch table for an instance's concrete class.
   *
   * Directives of ancestor classes come first. A subclass re-declaring a
   * property keeps the ancestor's position but replaces its binding. The
   * table is computed once per concrete prototype.
   */
  static directivesOf(instance: object): readonly AutoConfigBinding[] {
    const store = ensureStore();
    const prototype: unknown = Object.getPrototypeOf(instance);
    if (!isObjectLike(prototype)) return EMPTY_TABLE;

    const cached = store.tables.get(prototype);
    if (cached && cached.generation === store.generation) return cached.table;

    const table = this.buildTable(store, prototype);
    store.tables.set(prototype, { generation: store.generation, table });
    return table;
  }

  /**
   * Whether the definition of `member` that `target` resolves to was marked
   * internal. Only the class owning that definition is consulted, so an
   * override without `@Internal()` is public again.
   */
  static isInternal(target: object, member: string): boolean {
    const owner = ownerOf(target, member);
    if (owner === undefined) return false;
    return ensureStore().records.get(owner)?.internals.has(member) ?? false;
  }

  /**
   * Test helper to reset the registry.
   *
   * ⚠️ For test environments only. Decorator metadata of already evaluated
   * classes is lost.
   */
  static resetForTests(): void {
    Reflect.set(globalThis, GLOBAL_SYMBOL, createStore());
  }

  // ---- internals ----

  private static recordFor(store: RegistryStore, target: object): MutableClassRecord {
    let rec = store.records.get(target);
    if (!rec) {
      rec = { directives: new Map(), internals: new Set() };
      store.records.set(target, rec);
    }
    return rec;
  }

  private static buildTable(
    store: RegistryStore,
    prototype: object
  ): readonly AutoConfigBinding[] {
    const merged = new Map<string, AutoConfigBinding>();
    const chain = prototypeChain(prototype);
    for (let i = chain.length - 1; i >= 0; i--) {
      const rec = store.records.get(chain[i]);
      if (!rec) continue;
      for (const [property, binding] of rec.directives) merged.set(property, binding);
    }
    if (merged.size === 0) return EMPTY_TABLE;
    return Object.freeze(Array.from(merged.values()));
  }
}
