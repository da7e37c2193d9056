import { afterEach, describe, expect, it, vi } from 'vitest';

const originalEnv = process.env.NODE_ENV;

describe('Production environment branches', () => {
  afterEach(() => {
    process.env.NODE_ENV = originalEnv;
    vi.resetModules();
  });

  it('uses one-line error messages', async () => {
    process.env.NODE_ENV = 'production';
    vi.resetModules();

    const {
      AutoConfigMergeError,
      ClassNotFoundError,
      DeprecatedApiError,
      InvalidAutoConfigError,
      InvalidContextConfigError,
      InvalidFilterError,
      InvalidInternalError,
      MethodNotFoundError,
    } = await import('../src/errors/errors.js');

    expect(new MethodNotFoundError('Cart', 'checkout').message).toBe(
      "Method 'checkout' is not defined on Cart."
    );
    expect(new ClassNotFoundError('queue', ['cache']).message).toBe("Class 'queue' not found.");
    expect(new AutoConfigMergeError('options', 'options', 5).message).toBe(
      "Cannot merge config 'options' into 'options': received number."
    );
    expect(new InvalidAutoConfigError('Router', 'bad trigger').message).toBe(
      'Invalid @AutoConfig() on Router: bad trigger'
    );
    expect(new InvalidInternalError('Router', 'bad key').message).toBe(
      'Invalid @Internal() on Router: bad key'
    );
    expect(new InvalidFilterError('save', null).message).toBe("Invalid filter for 'save'.");
    expect(new DeprecatedApiError('old()', 'new()').message).toBe(
      'old() is deprecated; use new().'
    );
    expect(new InvalidContextConfigError('bad policy').message).toBe(
      'Invalid context configuration: bad policy'
    );
  });

  it('keeps deprecations silent by default', async () => {
    process.env.NODE_ENV = 'production';
    vi.resetModules();

    const { createContext } = await import('../src/api/context.js');
    const { BaseObject } = await import('../src/core/base-object.js');

    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const target = new BaseObject({ context: createContext() });
    target.applyFilter('save', (params, next) => next(params));

    expect(warn).not.toHaveBeenCalled();
  });
});
