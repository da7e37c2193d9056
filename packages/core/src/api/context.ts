import { Filters } from '../core/filters.js';
import { Inspector } from '../core/inspector.js';
import { LineageCache } from '../core/lineage-cache.js';
import { Locator } from '../core/locator.js';
import {
  consoleWarningHandler,
  deprecationPolicyFromEnv,
  isDeprecationPolicy,
} from '../diagnostics';
import { InvalidContextConfigError } from '../errors';
import type { ContextConfig, ObjectContext } from '../types';

/**
 * Global symbol for the process-wide default context.
 */
const GLOBAL_SYMBOL = Symbol.for('armature.defaultContext');

const COLLABORATORS = ['locator', 'filters', 'inspector', 'lineage'] as const;

function isObjectContext(value: unknown): value is ObjectContext {
  if (typeof value !== 'object' || value === null) return false;
  for (const name of COLLABORATORS) {
    const collaborator: unknown = Reflect.get(value, name);
    if (typeof collaborator !== 'object' || collaborator === null) return false;
  }
  return (
    typeof Reflect.get(value, 'onWarning') === 'function' &&
    isDeprecationPolicy(Reflect.get(value, 'deprecations'))
  );
}

/**
 * Build a context from explicit collaborators, creating fresh ones for
 * anything omitted.
 *
 * When no lineage cache is supplied, the new cache is shared with the new
 * filter registry so class-level filters and `parents()` read the same memo.
 *
 * @throws InvalidContextConfigError if `deprecations` is not a known policy
 *
 * @example
 * ```typescript
 * const context = createContext({ deprecations: 'error' });
 * context.locator.register('mailer', SmtpMailer);
 *
 * const app = new Application({ context });
 * ```
 */
export function createContext(config: ContextConfig = {}): ObjectContext {
  if (config.deprecations !== undefined && !isDeprecationPolicy(config.deprecations)) {
    throw new InvalidContextConfigError(
      `deprecations must be 'warn', 'allow' or 'error'; received '${String(config.deprecations)}'`
    );
  }

  const lineage = config.lineage ?? new LineageCache();
  return Object.freeze({
    locator: config.locator ?? new Locator(),
    filters: config.filters ?? new Filters(lineage),
    inspector: config.inspector ?? new Inspector(),
    lineage,
    deprecations: config.deprecations ?? deprecationPolicyFromEnv(),
    onWarning: config.onWarning ?? consoleWarningHandler,
  });
}

/**
 * The process-wide context used by objects constructed without one.
 *
 * Created on first access and kept on globalThis, so every copy of this
 * module in a process shares it.
 */
export function defaultContext(): ObjectContext {
  const existing: unknown = Reflect.get(globalThis, GLOBAL_SYMBOL);
  if (isObjectContext(existing)) return existing;
  const fresh = createContext();
  Reflect.set(globalThis, GLOBAL_SYMBOL, fresh);
  return fresh;
}

/**
 * Replace the process-wide context. Without an argument the next
 * `defaultContext()` call builds a fresh one.
 */
export function setDefaultContext(context?: ObjectContext): void {
  if (context) Reflect.set(globalThis, GLOBAL_SYMBOL, context);
  else Reflect.deleteProperty(globalThis, GLOBAL_SYMBOL);
}
