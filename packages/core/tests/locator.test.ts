import { describe, expect, it } from 'vitest';

import { Locator } from '../src/core/locator.js';
import { ClassNotFoundError } from '../src/errors/errors.js';
import type { ObjectConfig } from '../src/types/types.js';

class Cache {
  constructor(readonly options: ObjectConfig = {}) {}
}

class Mailer {
  constructor(readonly options: ObjectConfig = {}) {}
}

describe('Locator', () => {
  it('registers, locates and unregisters classes', () => {
    const locator = new Locator().register('cache', Cache);

    expect(locator.has('cache')).toBe(true);
    expect(locator.locate('cache')).toBe(Cache);
    expect(locator.unregister('cache')).toBe(true);
    expect(locator.unregister('cache')).toBe(false);
    expect(locator.locate('cache')).toBeUndefined();
  });

  it('registers tables and lists names in registration order', () => {
    const locator = new Locator().registerAll({ mailer: Mailer, cache: Cache });
    expect(locator.names()).toEqual(['mailer', 'cache']);
  });

  it('replaces an earlier registration', () => {
    const locator = new Locator().register('service', Cache).register('service', Mailer);
    expect(locator.locate('service')).toBe(Mailer);
    expect(locator.names()).toEqual(['service']);
  });

  describe('instance()', () => {
    const locator = new Locator().register('cache', Cache);

    it('constructs registered names with the options', () => {
      const cache = locator.instance<Cache>('cache', { ttl: 60 });
      expect(cache).toBeInstanceOf(Cache);
      expect(cache.options).toEqual({ ttl: 60 });
    });

    it('constructs classes with empty options by default', () => {
      const mailer = locator.instance(Mailer);
      expect(mailer).toBeInstanceOf(Mailer);
      expect(mailer.options).toEqual({});
    });

    it('returns objects unchanged', () => {
      const mailer = new Mailer();
      expect(locator.instance(mailer)).toBe(mailer);
    });

    it('throws ClassNotFoundError listing registered names', () => {
      expect(() => locator.instance('queue')).toThrow(ClassNotFoundError);

      try {
        locator.instance('queue');
      } catch (error) {
        expect(error).toBeInstanceOf(ClassNotFoundError);
        if (error instanceof ClassNotFoundError) {
          expect(error.className).toBe('queue');
          expect(error.registered).toEqual(['cache']);
        }
      }
    });
  });
});
