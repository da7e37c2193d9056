/**
 * Name of the class a decorator was applied to. Instance members receive the
 * prototype, static members the constructor.
 */
export function classNameOf(target: object): string {
  const ctor: unknown = typeof target === 'function' ? target : Reflect.get(target, 'constructor');
  return typeof ctor === 'function' && ctor.name ? ctor.name : 'anonymous class';
}
