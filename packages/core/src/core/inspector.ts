import { ClassRegistry, ownerOf } from '../registry';

/**
 * Members every object or class inherits from the language itself. They are
 * never reported as callable unless a class in the hierarchy redefines them.
 */
const BUILT_IN_OWNERS: readonly object[] = [Object.prototype, Function.prototype];

/**
 * Capability queries over objects and classes.
 *
 * Visibility is what `@Internal()` declared: TypeScript access modifiers do
 * not survive compilation, so they cannot be consulted here.
 */
export class Inspector {
  /**
   * Determines if a given method can be called on `target`.
   *
   * The answer follows the definition `target[method]` resolves to: it must
   * be a function defined by the target or its classes, not one inherited
   * from `Object.prototype` or `Function.prototype`.
   *
   * @param target - Instance, or class for static methods
   * @param method - Method name
   * @param internal - Check from inside the class: when `false`, methods
   *   marked `@Internal()` are reported as not callable
   */
  isCallable(target: object, method: string, internal = false): boolean {
    const owner = ownerOf(target, method);
    if (owner === undefined || BUILT_IN_OWNERS.includes(owner)) return false;
    if (typeof Reflect.get(target, method) !== 'function') return false;
    return internal || !this.isInternal(target, method);
  }

  /**
   * Whether the definition of `method` that `target` resolves to was marked
   * `@Internal()`.
   */
  isInternal(target: object, method: string): boolean {
    return ClassRegistry.isInternal(target, method);
  }
}
