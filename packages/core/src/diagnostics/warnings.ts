import { DeprecatedApiError, InvalidContextConfigError } from '../errors';
import type { DeprecationPolicy, ObjectContext, WarningHandler } from '../types';

const POLICIES: readonly DeprecationPolicy[] = ['warn', 'allow', 'error'];

export function isDeprecationPolicy(value: unknown): value is DeprecationPolicy {
  return typeof value === 'string' && POLICIES.some((policy) => policy === value);
}

/**
 * Default warning handler.
 */
export const consoleWarningHandler: WarningHandler = (warning) => {
  console.warn(`[Armature] ${warning.message}`);
};

/**
 * Deprecation policy from the environment.
 *
 * `ARMATURE_DEPRECATIONS` wins when set; otherwise production builds stay
 * silent and everything else warns.
 *
 * @throws InvalidContextConfigError if `ARMATURE_DEPRECATIONS` holds an unknown policy
 */
export function deprecationPolicyFromEnv(
  env: NodeJS.ProcessEnv = process.env
): DeprecationPolicy {
  const raw = env.ARMATURE_DEPRECATIONS;
  if (raw === undefined || raw === '') return env.NODE_ENV === 'production' ? 'allow' : 'warn';
  if (!isDeprecationPolicy(raw)) {
    throw new InvalidContextConfigError(
      `ARMATURE_DEPRECATIONS must be one of ${POLICIES.join(', ')}; received '${raw}'`
    );
  }
  return raw;
}

/**
 * Report use of a deprecated entry point according to the context's policy.
 *
 * @param api - What was called, e.g. '`BaseObject.applyFilter()`'
 * @param replacement - What to call instead
 * @throws DeprecatedApiError under the 'error' policy
 */
export function deprecate(context: ObjectContext, api: string, replacement: string): void {
  switch (context.deprecations) {
    case 'allow':
      return;
    case 'error':
      throw new DeprecatedApiError(api, replacement);
    case 'warn':
      context.onWarning({
        code: 'DEPRECATED',
        message: `${api} has been deprecated in favor of ${replacement}.`,
      });
  }
}
