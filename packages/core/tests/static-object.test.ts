import { describe, expect, expectTypeOf, it, vi } from 'vitest';

import { createContext } from '../src/api/context.js';
import { StaticObject } from '../src/core/static-object.js';
import { ClassNotFoundError, MethodNotFoundError } from '../src/errors/errors.js';
import type { ClassMap, ObjectConfig, ObjectContext } from '../src/types/types.js';

const context = createContext({ deprecations: 'allow' });

class JsonFormat {
  constructor(readonly options: ObjectConfig = {}) {}

  encode(data: unknown): string {
    return JSON.stringify(data);
  }
}

class Formats extends StaticObject {
  protected static override classes: ClassMap = { json: JsonFormat };
  protected static override context?: ObjectContext = context;

  static kinds(): string[] {
    return Object.keys(this.classes);
  }

  static double(n: number): number {
    return n * 2;
  }

  static json(data: unknown): string {
    return this.instance<JsonFormat>('json', { pretty: false }).encode(data);
  }

  static make(name: string): object {
    return this.instance(name);
  }

  static halt(status?: number | string): never {
    return this.stop(status);
  }

  static label(text: string): unknown {
    return this.runFiltered('Formats::label', { text }, (params) => params.text);
  }
}

describe('StaticObject', () => {
  it('calls static methods by name', () => {
    expect(Formats.invokeMethod('double', [4])).toBe(8);
  });

  it('calls zero-argument static methods without params', () => {
    expect(Formats.invokeMethod('kinds')).toEqual(['json']);
  });

  it('types static calls by method name', () => {
    expectTypeOf(Formats.invokeMethod('kinds')).toEqualTypeOf<string[]>();
    expectTypeOf(Formats.invokeMethod('double', [4])).toEqualTypeOf<number>();
  });

  it('throws MethodNotFoundError for unknown static methods', () => {
    expect(() => Reflect.apply(Formats.invokeMethod, Formats, ['missing'])).toThrow(
      MethodNotFoundError
    );
    expect(() => Reflect.apply(Formats.invokeMethod, Formats, ['missing'])).toThrow(
      /^Method 'missing' is not defined on Formats\./
    );
  });

  it('hides internal static methods unless asked from inside', () => {
    expect(Formats.respondsTo('double')).toBe(true);
    expect(Formats.respondsTo('missing')).toBe(false);
    expect(Formats.respondsTo('stop')).toBe(false);
    expect(Formats.respondsTo('stop', true)).toBe(true);
    expect(Formats.respondsTo('resolveContext')).toBe(false);
  });

  it('ignores members every function inherits', () => {
    expect(Formats.respondsTo('call')).toBe(false);
    expect(Formats.respondsTo('bind', true)).toBe(false);
    expect(Formats.respondsTo('apply')).toBe(false);
  });

  it('builds aliased classes with options', () => {
    expect(Formats.json({ a: 1 })).toBe('{"a":1}');
  });

  it('falls through to the locator for other names', () => {
    context.locator.register('format', JsonFormat);
    expect(Formats.make('format')).toBeInstanceOf(JsonFormat);
    expect(() => Formats.make('yaml')).toThrow(ClassNotFoundError);
  });

  it('lists ancestors through the context lineage', () => {
    class Binary extends Formats {}
    expect(Binary.parents()).toEqual([Formats, StaticObject]);
    expect(context.lineage.has(Binary)).toBe(true);
  });

  it('exits through stop()', () => {
    vi.spyOn(process, 'exit').mockImplementation((code) => {
      throw new Error(`exit ${String(code)}`);
    });
    expect(() => Formats.halt(2)).toThrow('exit 2');
  });

  it('filters static methods with the class as target', () => {
    Formats.applyFilter('label', (params, next) => String(next(params)).toUpperCase());

    expect(Formats.label('hi')).toBe('HI');
    expect(context.filters.hasApplied(Formats, 'label')).toBe(true);

    Formats.applyFilter(false);
    expect(Formats.label('hi')).toBe('hi');
  });
});
