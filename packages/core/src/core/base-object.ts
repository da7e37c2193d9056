import { defaultContext } from '../api/context.js';
import { Internal } from '../decorators';
import { ClassRegistry } from '../registry';
import type {
  AutoConfigDirective,
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
  ObjectState,
  ResolvedConfig,
} from '../types';
import { applyAutoConfig, seedDefaults } from './auto-config.js';
import {
  applyFilterShim,
  instantiate,
  methodOf,
  runFilteredShim,
  terminate,
} from './dispatch.js';
import type { LineageCache } from './lineage-cache.js';

/*
 * BaseObject: the root of configurable classes.
 *
 * Conventions every subclass follows:
 *
 * - Universal constructor: the constructor takes one options object, stored
 *   read-only as `config`. Subclasses that declare a constructor pass the
 *   options on to `super()`.
 * - Initialization / automatic configuration: after storing the options the
 *   constructor calls `init()`, unless `{ init: false }` was passed. `init()`
 *   copies or merges options into the properties declared with
 *   `@AutoConfig()`, and is where subclasses put setup that is expensive or
 *   hard to test, so it can be skipped and run later by hand.
 * - Testing / misc.: `fromState()` rebuilds an instance from a property
 *   snapshot, and `stop()` is called instead of `process.exit()` so tests can
 *   override it.
 */

export class BaseObject<C extends ObjectConfig = ObjectConfig> {
  /**
   * Options the object was constructed with, over `{ init: true }`.
   * Do not reassign; pass extra options on to `super()`.
   */
  protected readonly config: Readonly<ResolvedConfig<C>>;

  /**
   * Collaborators: locator, inspector, filters and lineage cache.
   */
  protected readonly context: ObjectContext;

  /**
   * Alias → class table consulted by `instance()`. Subclasses usually
   * redeclare it with a merge directive so options can swap dependencies:
   *
   * ```typescript
   * @AutoConfig({ effect: AutoConfigEffect.Merge, initial: () => ({ entity: Entity }) })
   * protected override classes!: ClassMap;
   * ```
   */
  protected classes: ClassMap = {};

  /**
   * @param config - Options for this object. Recognised here:
   *   - `init`: call `init()` before returning. Defaults to `true`.
   *   - `context`: collaborators. Defaults to `defaultContext()`.
   */
  constructor(config: Partial<C> = {}) {
    this.config = { init: true, ...config };
    this.context = config.context ?? defaultContext();

    seedDefaults(this, ClassRegistry.directivesOf(this));
    if (this.config.init) this.init();
  }

  /**
   * Initializer called by the constructor unless `init` is `false`.
   *
   * Applies every `@AutoConfig()` directive of the concrete class, in
   * declaration order with ancestor classes first. Given:
   *
   * ```typescript
   * class Bar extends BaseObject<{ foo?: string }> {
   *   @AutoConfig()
   *   protected foo?: string;
   * }
   *
   * new Bar({ foo: 'value' });
   * ```
   *
   * the instance's `foo` is `'value'`. Declared with
   * `{ effect: 'merge', initial: () => ({ ... }) }`, the option would be merged
   * over the default mapping instead.
   *
   * Overrides call `super.init()` to keep auto-configuration, and repeat
   * `@Internal()` to stay hidden from `respondsTo()`.
   */
  @Internal()
  protected init(): void {
    applyAutoConfig(this, this.config, ClassRegistry.directivesOf(this));
  }

  /**
   * The auto-configuration directives this object's class declares, in the
   * order `init()` applies them.
   */
  autoConfigDirectives(): AutoConfigDirective[] {
    return ClassRegistry.directivesOf(this).map(({ property, key, trigger, effect }) => ({
      property,
      key,
      trigger,
      effect,
    }));
  }

  /**
   * Calls a method on this object by name.
   *
   * @param method - Name of a public method
   * @param params - Positional arguments
   * @returns The method's return value
   *
   * @throws MethodNotFoundError if no such method exists at runtime
   *
   * @example
   * ```typescript
   * const total = cart.invokeMethod('add', [item, 2]);
   * ```
   */
  invokeMethod<T extends object, K extends InvocableName<T>>(
    this: T,
    method: K,
    params?: MethodArgs<T, K>
  ): MethodResult<T, K> {
    return Reflect.apply(methodOf(this, method), this, params ?? []);
  }

  /**
   * Determines if a given method can be called.
   *
   * @param method - Name of the method
   * @param internal - Check from inside the class: when `false`, methods
   *   marked `@Internal()` count as not callable
   */
  respondsTo(method: string, internal = false): boolean {
    return this.context.inspector.isCallable(this, method, internal);
  }

  /**
   * Returns an instance of a class built with `options`. `name` may be a key
   * of `classes`, a name registered with the locator, a class, or an object
   * (returned as is). Typically called from `init()` to create dependencies.
   *
   * @throws ClassNotFoundError if a name resolves to nothing
   */
  @Internal()
  protected instance<T extends object>(name: ClassRef<T> | T, options: ObjectConfig = {}): T {
    return instantiate(this.context, this.classes, name, options);
  }

  /**
   * Ancestor classes of the calling class, nearest first, cached per class.
   *
   * @param lineage - Cache to read through. Defaults to the default context's.
   */
  static parents(lineage: LineageCache = defaultContext().lineage): readonly Constructor[] {
    return lineage.parentsOf(this);
  }

  /**
   * Exit immediately. Override in tests.
   *
   * @param status - Exit code, or a message printed before exiting with 0
   */
  @Internal()
  protected stop(status: number | string = 0): never {
    return terminate(status);
  }

  /**
   * Rebuild an instance from a property snapshot: the class is constructed
   * with no options, then every property in `state` is written, protected
   * ones included.
   *
   * @example
   * ```typescript
   * const copy = Session.fromState(session.toState());
   * ```
   */
  static fromState<T extends object>(this: new () => T, state: ObjectState): T {
    const object = new this();
    for (const [property, value] of Object.entries(state)) Reflect.set(object, property, value);
    return object;
  }

  /**
   * Snapshot of the object's own properties, protected ones included.
   */
  toState(): ObjectState {
    return Object.fromEntries(Object.entries(this));
  }

  /* Deprecated */

  /**
   * Apply a filter to one or more methods of this object.
   *
   * @deprecated Use `context.filters.apply()` and `context.filters.clear()`.
   * @param method - Method name or names, or `false` to remove every filter
   *   of this object
   * @param filter - The filter, or `false` to remove the methods' filters
   *
   * @throws InvalidFilterError if `filter` is missing
   */
  applyFilter(method: string | readonly string[] | false, filter?: Filter | false): void {
    applyFilterShim(this.context, this, '`BaseObject.applyFilter()`', method, filter);
  }

  /**
   * Run a method implementation through the filters applied to it.
   *
   * @deprecated Use `context.filters.run()`.
   * @param method - Method name, optionally qualified as 'Class::method'
   * @param params - Named parameters handed to the first filter
   * @param callback - The method's implementation
   * @param filters - Extra filters, applied to the method before running
   * @returns The value returned through the filter chain
   */
  @Internal()
  protected runFiltered(
    method: string,
    params: FilterParams,
    callback: (params: FilterParams) => unknown,
    filters: readonly Filter[] = []
  ): unknown {
    return runFilteredShim(
      this.context,
      this,
      '`BaseObject.runFiltered()`',
      method,
      params,
      callback,
      filters
    );
  }
}
