import type { Filters } from '../core/filters.js';
import type { Inspector } from '../core/inspector.js';
import type { LineageCache } from '../core/lineage-cache.js';
import type { Locator } from '../core/locator.js';

/**
 * Generic constructor signature used by the locator and the lineage cache.
 *
 * @template T - Type produced by the constructor
 */
// eslint-disable-next-line @typescript-eslint/no-explicit-any
export type Constructor<T = any> = new (...args: any[]) => T;

/**
 * A class the locator can build: either a registered name or the class itself.
 */
export type ClassRef<T = unknown> = string | Constructor<T>;

/**
 * Short alias → class reference table consulted by `instance()`.
 */
export type ClassMap = Record<string, string | Constructor>;

/**
 * Options accepted by every `BaseObject` constructor.
 *
 * Subclasses extend this interface with their own keys; anything not listed
 * here is only meaningful to auto-configuration directives or to the
 * subclass itself.
 */
export interface ObjectConfig {
  /**
   * Run `init()` during construction.
   *
   * @default true
   */
  init?: boolean;

  /**
   * Collaborators used by the instance. Falls back to `defaultContext()`.
   */
  context?: ObjectContext;

  [option: string]: unknown;
}

/**
 * Configuration as stored on the instance: supplied options over the defaults.
 */
export type ResolvedConfig<C extends ObjectConfig> = Partial<C> & { init: boolean };

/**
 * Supported auto-configuration effects.
 *
 *   - **Assign**: the config value replaces the property
 *   - **Merge**: the config mapping is merged over the property's mapping,
 *     config keys first, property keys filling in the rest
 *
 * @example
 * ```typescript
 * class Router extends BaseObject<RouterConfig> {
 *   @AutoConfig({ effect: AutoConfigEffect.Merge, initial: () => ({ route: Route }) })
 *   protected classes!: ClassMap;
 * }
 * ```
 */
export const AutoConfigEffect = {
  Assign: 'assign',
  Merge: 'merge',
} as const;

export type AutoConfigEffectType = (typeof AutoConfigEffect)[keyof typeof AutoConfigEffect];
export type AutoConfigEffect = AutoConfigEffectType;

/**
 * Options accepted by the `@AutoConfig()` property decorator.
 */
export interface AutoConfigOptions<V = unknown> {
  /** @default 'assign' */
  effect?: AutoConfigEffectType;

  /**
   * Config key whose value is read. Defaults to the property name with any
   * leading underscore removed.
   */
  key?: string;

  /**
   * Another config key whose presence alone also fires an `assign`
   * directive. The value written is still `config[key]`.
   */
  trigger?: string;

  /**
   * Default written to the property before initialization. Functions are
   * called once per instance so mappings are never shared.
   */
  initial?: V | (() => V);
}

/**
 * A resolved auto-configuration rule for one property.
 */
export interface AutoConfigDirective {
  /** Instance property written by the directive */
  readonly property: string;
  /** Config key whose value is read */
  readonly key: string;
  /** Config key whose presence alone also fires the directive */
  readonly trigger: string;
  readonly effect: AutoConfigEffectType;
}

/**
 * Directive plus the closures that read and write its property.
 *
 * Bindings are produced once per decorated property and collected into a
 * per-class dispatch table by the class registry.
 */
export interface AutoConfigBinding extends AutoConfigDirective {
  read(target: object): unknown;
  write(target: object, value: unknown): void;
  /** Seeds the default value, when the directive declares one */
  seed?: (target: object) => void;
}

/**
 * Names of the public methods of `T`.
 */
export type MethodName<T> = {
  [K in keyof T]-?: T[K] extends (...args: never[]) => unknown ? K : never;
}[keyof T] &
  string;

/**
 * Method names `invokeMethod()` accepts on `T`: its public methods, less
 * `invokeMethod` itself, whose signature refers back to this type.
 */
export type InvocableName<T> = MethodName<Omit<T, 'invokeMethod'>>;

/**
 * Parameter tuple of method `K` on `T`.
 */
export type MethodArgs<T, K> = K extends keyof T
  ? T[K] extends (...args: infer A extends readonly unknown[]) => unknown
    ? A
    : never
  : never;

/**
 * Return type of method `K` on `T`.
 */
export type MethodResult<T, K> = K extends keyof T
  ? T[K] extends (...args: never[]) => infer R
    ? R
    : never
  : never;

/**
 * Property name → value snapshot used by `toState()` / `fromState()`.
 */
export type ObjectState = Record<string, unknown>;

/**
 * Named parameters handed through a filter chain.
 */
export type FilterParams = Record<string, unknown>;

/**
 * Continuation passed to each filter. Calling it runs the rest of the chain.
 */
export type FilterNext = (params: FilterParams) => unknown;

/**
 * A method filter. It may inspect or replace the parameters before calling
 * `next`, and inspect or replace the value `next` returns.
 */
export type Filter = (params: FilterParams, next: FilterNext) => unknown;

/**
 * How deprecated entry points report their use.
 * - 'warn' (default): forward a warning to the context's `onWarning` handler
 * - 'allow': stay silent
 * - 'error': throw `DeprecatedApiError`
 */
export type DeprecationPolicy = 'warn' | 'allow' | 'error';

export interface Warning {
  code: 'DEPRECATED';
  message: string;
}

export type WarningHandler = (warning: Warning) => void;

/**
 * Collaborators shared by a group of objects.
 */
export interface ObjectContext {
  readonly locator: Locator;
  readonly filters: Filters;
  readonly inspector: Inspector;
  readonly lineage: LineageCache;
  readonly deprecations: DeprecationPolicy;
  readonly onWarning: WarningHandler;
}

/**
 * Options accepted by `createContext()`. Omitted collaborators are created
 * fresh.
 */
export interface ContextConfig {
  locator?: Locator;
  filters?: Filters;
  inspector?: Inspector;
  lineage?: LineageCache;

  /**
   * Defaults to `ARMATURE_DEPRECATIONS`, then to 'allow' under
   * `NODE_ENV=production` and 'warn' otherwise.
   */
  deprecations?: DeprecationPolicy;

  /**
   * Receives deprecation warnings under the 'warn' policy.
   * Defaults to a `console.warn` writer.
   */
  onWarning?: WarningHandler;
}
