import { defaultContext } from '../api/context.js';
import { Internal } from '../decorators';
import type {
  ClassMap,
  ClassRef,
  Constructor,
  Filter,
  FilterParams,
  InvocableName,
  MethodArgs,
  MethodResult,
  ObjectConfig,
  ObjectContext,
} from '../types';
import {
  applyFilterShim,
  instantiate,
  methodOf,
  runFilteredShim,
  terminate,
} from './dispatch.js';
import type { LineageCache } from './lineage-cache.js';

/**
 * Base class for classes used only through static members.
 *
 * Mirrors `BaseObject` at class level: name-based invocation, capability
 * queries, class lookup through `classes`, ancestor lookup, and an
 * overridable `stop()`.
 *
 * @example
 * ```typescript
 * class Formats extends StaticObject {
 *   protected static override classes: ClassMap = { json: JsonFormat };
 *
 *   static json(data: unknown): string {
 *     return this.instance<JsonFormat>('json').encode(data);
 *   }
 * }
 * ```
 */
export class StaticObject {
  /**
   * Alias → class table consulted by `instance()`.
   */
  protected static classes: ClassMap = {};

  /**
   * Collaborators for this class. Falls back to `defaultContext()`.
   */
  protected static context?: ObjectContext;

  @Internal()
  protected static resolveContext(): ObjectContext {
    return this.context ?? defaultContext();
  }

  /**
   * Calls a static method of this class by name.
   *
   * @throws MethodNotFoundError if no such method exists at runtime
   */
  static invokeMethod<T extends object, K extends InvocableName<T>>(
    this: T,
    method: K,
    params?: MethodArgs<T, K>
  ): MethodResult<T, K> {
    return Reflect.apply(methodOf(this, method), this, params ?? []);
  }

  /**
   * Determines if a given static method can be called.
   *
   * @param internal - Check from inside the class: when `false`, methods
   *   marked `@Internal()` count as not callable
   */
  static respondsTo(method: string, internal = false): boolean {
    return this.resolveContext().inspector.isCallable(this, method, internal);
  }

  /**
   * Returns an instance of a class built with `options`; see
   * `BaseObject.instance()`.
   */
  @Internal()
  protected static instance<T extends object>(
    name: ClassRef<T> | T,
    options: ObjectConfig = {}
  ): T {
    return instantiate(this.resolveContext(), this.classes, name, options);
  }

  /**
   * Ancestor classes of the calling class, nearest first, cached per class.
   */
  static parents(lineage?: LineageCache): readonly Constructor[] {
    return (lineage ?? this.resolveContext().lineage).parentsOf(this);
  }

  /**
   * Exit immediately. Override in tests.
   */
  @Internal()
  protected static stop(status: number | string = 0): never {
    return terminate(status);
  }

  /**
   * @deprecated Use `context.filters.apply()` and `context.filters.clear()`.
   */
  static applyFilter(method: string | readonly string[] | false, filter?: Filter | false): void {
    applyFilterShim(this.resolveContext(), this, '`StaticObject.applyFilter()`', method, filter);
  }

  /**
   * @deprecated Use `context.filters.run()`.
   */
  @Internal()
  protected static runFiltered(
    method: string,
    params: FilterParams,
    callback: (params: FilterParams) => unknown,
    filters: readonly Filter[] = []
  ): unknown {
    return runFilteredShim(
      this.resolveContext(),
      this,
      '`StaticObject.runFiltered()`',
      method,
      params,
      callback,
      filters
    );
  }
}
