import { InvalidAutoConfigError } from '../errors';
import { ClassRegistry } from '../registry';
import { AutoConfigEffect, type AutoConfigBinding, type AutoConfigOptions } from '../types';
import { classNameOf } from './class-name.js';

/**
 * Marks a property as configured from the constructor's options.
 *
 * When the object initializes, the property receives the config value named
 * by `key` (assign), or that value merged over the property's current
 * mapping (merge). A directive fires when `config[key]` is set, or when
 * `config[trigger]` is set: for merge directives the trigger is the literal
 * key `'merge'`.
 *
 * Field initializers run after the base constructor, so a decorated property
 * takes its default from `initial` and is declared without an initializer.
 *
 * @example
 * ```typescript
 * class Connection extends BaseObject<ConnectionConfig> {
 *   @AutoConfig({ initial: 'localhost' })
 *   protected host!: string;
 *
 *   @AutoConfig({ effect: AutoConfigEffect.Merge, initial: () => ({ retries: 3 }) })
 *   protected options!: Record<string, unknown>;
 *
 *   // fires on { port } or { address }, always reads config.port
 *   @AutoConfig({ trigger: 'address' })
 *   protected port?: number;
 * }
 * ```
 */
export function AutoConfig<V>(
  options: AutoConfigOptions<V> = {}
): (target: object, propertyKey: string | symbol) => void {
  return (target, propertyKey) => {
    if (typeof propertyKey !== 'string') {
      throw new InvalidAutoConfigError(
        classNameOf(target),
        'symbol-keyed properties cannot be auto-configured'
      );
    }

    const effect = options.effect ?? AutoConfigEffect.Assign;
    if (effect === AutoConfigEffect.Merge && options.trigger !== undefined) {
      throw new InvalidAutoConfigError(
        classNameOf(target),
        `merge directive '${propertyKey}' cannot declare a trigger`
      );
    }

    const key = options.key ?? propertyKey.replace(/^_/, '');
    const trigger =
      effect === AutoConfigEffect.Merge ? AutoConfigEffect.Merge : (options.trigger ?? key);
    const initial = options.initial;

    const binding: AutoConfigBinding = {
      property: propertyKey,
      key,
      trigger,
      effect,
      read: (instance) => Reflect.get(instance, propertyKey),
      write: (instance, value) => {
        Reflect.set(instance, propertyKey, value);
      },
    };
    if (initial !== undefined) {
      binding.seed = (instance) => {
        const value: unknown =
          typeof initial === 'function' ? Reflect.apply(initial, undefined, []) : initial;
        Reflect.set(instance, propertyKey, value);
      };
    }

    ClassRegistry.registerDirective(target, Object.freeze(binding));
  };
}
