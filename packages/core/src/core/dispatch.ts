import { deprecate } from '../diagnostics';
import { InvalidFilterError, MethodNotFoundError } from '../errors';
import type {
  ClassMap,
  ClassRef,
  Filter,
  FilterParams,
  ObjectConfig,
  ObjectContext,
} from '../types';

const ownerName = (target: object): string => {
  if (typeof target === 'function') return target.name || 'anonymous class';
  const ctor: unknown = Reflect.get(target, 'constructor');
  return typeof ctor === 'function' && ctor.name ? ctor.name : 'object';
};

/**
 * The function stored under `method` on `target` or its prototype chain.
 *
 * @throws MethodNotFoundError if `target[method]` is not a function
 */
export function methodOf(target: object, method: string): Function {
  const fn: unknown = Reflect.get(target, method);
  if (typeof fn !== 'function') throw new MethodNotFoundError(ownerName(target), method);
  return fn;
}

/**
 * Resolve `name` through an alias table, then build it with the locator.
 */
export function instantiate<T extends object>(
  context: ObjectContext,
  classes: ClassMap,
  name: ClassRef<T> | T,
  options: ObjectConfig
): T {
  if (typeof name === 'string' && Object.prototype.hasOwnProperty.call(classes, name)) {
    return context.locator.instance<T>(classes[name], options);
  }
  return context.locator.instance<T>(name, options);
}

/**
 * Terminate the process. A string status is written to stdout and the
 * process exits with 0.
 */
export function terminate(status: number | string): never {
  if (typeof status === 'string') {
    process.stdout.write(status);
    return process.exit(0);
  }
  return process.exit(status);
}

/**
 * Body of the deprecated `applyFilter()` shims.
 *
 * @throws InvalidFilterError if `filter` is neither a function nor `false`
 */
export function applyFilterShim(
  context: ObjectContext,
  target: object,
  api: string,
  method: string | readonly string[] | false,
  filter: Filter | false | undefined
): void {
  deprecate(context, api, '`Filters.apply()` and `Filters.clear()`');

  if (method === false) {
    context.filters.clear(target);
    return;
  }
  for (const name of typeof method === 'string' ? [method] : method) {
    if (filter === false) context.filters.clear(target, name);
    else if (typeof filter === 'function') context.filters.apply(target, name, filter);
    else throw new InvalidFilterError(name, filter);
  }
}

/**
 * Body of the deprecated `runFiltered()` shims.
 *
 * `method` may be qualified as 'Class::method'; only the method part is used.
 * Extra filters are applied through the registry and stay applied.
 */
export function runFilteredShim(
  context: ObjectContext,
  target: object,
  api: string,
  method: string,
  params: FilterParams,
  callback: (params: FilterParams) => unknown,
  filters: readonly Filter[]
): unknown {
  deprecate(context, api, '`Filters.run()` and `Filters.apply()`');

  const separator = method.lastIndexOf('::');
  const name = separator === -1 ? method : method.slice(separator + 2);
  for (const filter of filters) context.filters.apply(target, name, filter);
  return context.filters.run(target, name, params, callback);
}
