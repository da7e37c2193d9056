import { AutoConfigMergeError } from '../errors';
import { AutoConfigEffect, type AutoConfigBinding } from '../types';

type Mapping = Record<string, unknown>;

const hasOwn = (target: object, key: string): boolean =>
  Object.prototype.hasOwnProperty.call(target, key);

function isMapping(value: unknown): value is Mapping {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) return false;
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

/**
 * Whether `config` holds `key` with a value other than `undefined` or `null`.
 */
export function isSet(config: object, key: string): boolean {
  if (!hasOwn(config, key)) return false;
  const value: unknown = Reflect.get(config, key);
  return value !== undefined && value !== null;
}

/**
 * Key union with the left operand winning.
 *
 * Every key of `left` is kept with its value; keys of `right` that `left`
 * lacks are appended in their own order. Presence is by key, so a `left` key
 * holding `undefined` still shadows `right`.
 *
 * @example
 * ```typescript
 * union({ a: 9, c: 3 }, { a: 1, b: 2 }); // { a: 9, c: 3, b: 2 }
 * ```
 */
export function union(left: Mapping, right: Mapping): Mapping {
  const result: Mapping = { ...left };
  for (const key of Object.keys(right)) {
    if (!hasOwn(result, key)) result[key] = right[key];
  }
  return result;
}

function toMapping(value: unknown, binding: AutoConfigBinding): Mapping {
  if (value === undefined || value === null) return {};
  if (!isMapping(value)) throw new AutoConfigMergeError(binding.property, binding.key, value);
  return value;
}

/**
 * Write each directive's default value onto `target`.
 */
export function seedDefaults(target: object, bindings: readonly AutoConfigBinding[]): void {
  for (const binding of bindings) binding.seed?.(target);
}

/**
 * Apply auto-configuration directives to `target` in table order.
 *
 * A directive fires when `config[key]` is set or `config[trigger]` is set.
 * Assign directives write `config[key]`, which is `undefined` when only the
 * trigger was present. Merge directives write `union(config[key], current)`.
 *
 * @throws AutoConfigMergeError if either side of a merge is not a plain object
 */
export function applyAutoConfig(
  target: object,
  config: object,
  bindings: readonly AutoConfigBinding[]
): void {
  for (const binding of bindings) {
    if (!isSet(config, binding.key) && !isSet(config, binding.trigger)) continue;

    const value: unknown = hasOwn(config, binding.key)
      ? Reflect.get(config, binding.key)
      : undefined;
    if (binding.effect === AutoConfigEffect.Merge) {
      const current = toMapping(binding.read(target), binding);
      binding.write(target, union(toMapping(value, binding), current));
    } else {
      binding.write(target, value);
    }
  }
}
