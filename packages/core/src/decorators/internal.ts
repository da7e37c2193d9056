import { InvalidInternalError } from '../errors';
import { ClassRegistry } from '../registry';
import { classNameOf } from './class-name.js';

/**
 * Marks a method as non-public for capability queries.
 *
 * TypeScript's `protected` and `private` modifiers vanish at runtime, so the
 * inspector cannot see them. `respondsTo(name)` reports `false` for a method
 * whose resolved definition carries this decorator, while
 * `respondsTo(name, true)` still reports `true`. The mark belongs to the
 * definition: an override stays hidden only if it is decorated as well.
 *
 * Works on instance and static methods alike: the registry keys the mark on
 * the prototype or on the constructor the decorator receives.
 *
 * @example
 * ```typescript
 * class Dispatcher extends BaseObject {
 *   @Internal()
 *   protected callable(request: Request): Controller { ... }
 * }
 *
 * dispatcher.respondsTo('callable');       // false
 * dispatcher.respondsTo('callable', true); // true
 * ```
 *
 * @throws InvalidInternalError when applied to a symbol-keyed method
 */
export function Internal(): (
  target: object,
  propertyKey: string | symbol,
  descriptor: PropertyDescriptor
) => void {
  return function (target: object, propertyKey: string | symbol) {
    if (typeof propertyKey !== 'string') {
      throw new InvalidInternalError(
        classNameOf(target),
        'symbol-keyed methods cannot be marked internal'
      );
    }
    ClassRegistry.registerInternal(target, propertyKey);
  };
}
