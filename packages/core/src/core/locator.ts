import { ClassNotFoundError } from '../errors';
import type { ClassRef, Constructor, ObjectConfig } from '../types';

function isConstructor<T>(value: unknown): value is Constructor<T> {
  return typeof value === 'function' && value.prototype !== undefined;
}

/**
 * Name → class registry and factory.
 *
 * `instance()` is the single construction path used by `BaseObject` and
 * `StaticObject`: names are located here, classes are constructed with the
 * options as their only argument, and ready-made objects pass through.
 *
 * @example
 * ```typescript
 * const locator = new Locator();
 * locator.register('cache', MemoryCache);
 *
 * const cache = locator.instance<MemoryCache>('cache', { ttl: 60 });
 * ```
 */
export class Locator {
  private readonly classes = new Map<string, Constructor>();

  /**
   * Register a class under `name`, replacing any earlier registration.
   */
  register(name: string, ctor: Constructor): this {
    this.classes.set(name, ctor);
    return this;
  }

  /**
   * Register every entry of a name → class table.
   */
  registerAll(classes: Record<string, Constructor>): this {
    for (const [name, ctor] of Object.entries(classes)) this.register(name, ctor);
    return this;
  }

  unregister(name: string): boolean {
    return this.classes.delete(name);
  }

  has(name: string): boolean {
    return this.classes.has(name);
  }

  /**
   * Registered names in registration order.
   */
  names(): string[] {
    return Array.from(this.classes.keys());
  }

  /**
   * Find the class registered under `name`.
   */
  locate(name: string): Constructor | undefined {
    return this.classes.get(name);
  }

  /**
   * Resolve a class reference and construct it with `options`.
   *
   * @param ref - Registered name, class, or an already built object
   * @param options - Passed to the constructor as its only argument
   * @returns The new instance, or `ref` itself when it is already an object
   *
   * @throws ClassNotFoundError if `ref` is a name nothing is registered under
   */
  instance<T extends object>(ref: ClassRef<T> | T, options: ObjectConfig = {}): T {
    if (typeof ref === 'string') {
      const ctor = this.locate(ref);
      if (!ctor) throw new ClassNotFoundError(ref, this.names());
      return new ctor(options);
    }
    if (isConstructor<T>(ref)) return new ref(options);
    return ref;
  }
}
