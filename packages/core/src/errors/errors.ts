const IS_PROD = typeof process !== 'undefined' && process.env?.NODE_ENV === 'production';

const join = (lines: string[]): string => lines.join('\n');
const format = (prod: string, devLines: string[]): string => (IS_PROD ? prod : join(devLines));

const describe = (value: unknown): string => {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'array';
  return typeof value;
};

/**
 * Method not found error, raised by `invokeMethod()`.
 */
export class MethodNotFoundError extends Error {
  constructor(
    public className: string,
    public method: string
  ) {
    const dev = [
      `Method '${method}' is not defined on ${className}.`,
      '',
      `invokeMethod() dispatches by name, so '${method}' must be a function`,
      `on the instance or somewhere in its prototype chain.`,
      '',
      'To fix this:',
      `  1. Check the spelling of '${method}'`,
      `  2. Use respondsTo('${method}', true) to check before invoking`,
    ];
    super(format(`Method '${method}' is not defined on ${className}.`, dev));
    this.name = 'MethodNotFoundError';
  }
}

/**
 * Class not found error with the registered names as suggestions.
 */
export class ClassNotFoundError extends Error {
  constructor(
    public className: string,
    public registered: string[]
  ) {
    const parts: string[] = [`Class '${className}' not found.`, ''];

    if (registered.length > 0 && registered.length <= 10) {
      parts.push('Registered classes:');
      registered.forEach((name) => parts.push(`  - ${name}`));
      parts.push('');
    } else if (registered.length > 10) {
      parts.push(`${registered.length} classes are registered.`, '');
    }

    parts.push('To fix this:');
    parts.push(`  1. Register it: locator.register('${className}', SomeClass)`);
    parts.push(`  2. Or map the alias in the object's 'classes' table`);
    parts.push(`  3. Or pass the class itself instead of its name`);

    super(format(`Class '${className}' not found.`, parts));
    this.name = 'ClassNotFoundError';
  }
}

/**
 * Raised when a merge directive meets a value that is not a plain mapping.
 */
export class AutoConfigMergeError extends Error {
  constructor(
    public property: string,
    public key: string,
    public received: unknown
  ) {
    const kind = describe(received);
    const dev = [
      `Cannot merge config '${key}' into '${property}'.`,
      '',
      `Merge directives combine plain objects, but received ${kind}.`,
      '',
      'To fix this:',
      `  1. Pass an object for '${key}'`,
      `  2. Or declare '${property}' with effect 'assign'`,
    ];
    super(format(`Cannot merge config '${key}' into '${property}': received ${kind}.`, dev));
    this.name = 'AutoConfigMergeError';
  }
}

export class InvalidAutoConfigError extends Error {
  constructor(
    public className: string,
    public reason: string
  ) {
    const dev = ['Invalid @AutoConfig() declaration', '', `${className}: ${reason}`];
    super(format(`Invalid @AutoConfig() on ${className}: ${reason}`, dev));
    this.name = 'InvalidAutoConfigError';
  }
}

export class InvalidInternalError extends Error {
  constructor(
    public className: string,
    public reason: string
  ) {
    const dev = ['Invalid @Internal() declaration', '', `${className}: ${reason}`];
    super(format(`Invalid @Internal() on ${className}: ${reason}`, dev));
    this.name = 'InvalidInternalError';
  }
}

export class InvalidFilterError extends Error {
  constructor(
    public method: string,
    public filter: unknown
  ) {
    const dev = [
      'Invalid filter',
      '',
      `The filter for '${method}' must be a function (params, next) => result,`,
      `or false to clear the method's filters. Received ${describe(filter)}.`,
    ];
    super(format(`Invalid filter for '${method}'.`, dev));
    this.name = 'InvalidFilterError';
  }
}

/**
 * Raised by deprecated entry points under the 'error' deprecation policy.
 */
export class DeprecatedApiError extends Error {
  constructor(
    public api: string,
    public replacement: string
  ) {
    const dev = [
      `${api} is deprecated.`,
      '',
      `Use ${replacement} instead.`,
      '',
      `Deprecated calls are rejected because the deprecation policy is 'error'.`,
      `Set ARMATURE_DEPRECATIONS=warn (or pass { deprecations: 'warn' } to createContext())`,
      'to downgrade them to warnings.',
    ];
    super(format(`${api} is deprecated; use ${replacement}.`, dev));
    this.name = 'DeprecatedApiError';
  }
}

export class InvalidContextConfigError extends Error {
  constructor(public reason: string) {
    const dev = ['Invalid context configuration', '', `Invalid context configuration: ${reason}`];
    super(format(`Invalid context configuration: ${reason}`, dev));
    this.name = 'InvalidContextConfigError';
  }
}
