import { describe, expect, it } from 'vitest';

import { Inspector } from '../src/core/inspector.js';
import { Internal } from '../src/decorators/internal.js';

class Service {
  static version = '1';

  name = 'service';

  start(): string {
    return 'started';
  }

  @Internal()
  protected connect(): string {
    return 'connected';
  }

  @Internal()
  protected static boot(): string {
    return 'booted';
  }

  static create(): Service {
    return new Service();
  }
}

class ExtendedService extends Service {
  // redefined without the mark: public again
  override connect(): string {
    return super.connect();
  }

  override toString(): string {
    return 'ExtendedService';
  }
}

class LoggedService extends Service {}

describe('Inspector', () => {
  const inspector = new Inspector();

  it('reports public instance methods, own or inherited', () => {
    const service = new ExtendedService();
    expect(inspector.isCallable(service, 'start')).toBe(true);
    expect(inspector.isCallable(new LoggedService(), 'start')).toBe(true);
  });

  it('rejects missing members and non-function properties', () => {
    const service = new Service();
    expect(inspector.isCallable(service, 'stop')).toBe(false);
    expect(inspector.isCallable(service, 'name')).toBe(false);
    expect(inspector.isCallable(service, 'name', true)).toBe(false);
  });

  it('ignores members the language provides unless a class redefines them', () => {
    expect(inspector.isCallable(new Service(), 'toString')).toBe(false);
    expect(inspector.isCallable(new Service(), 'valueOf', true)).toBe(false);
    expect(inspector.isCallable(new ExtendedService(), 'toString')).toBe(true);
    expect(inspector.isCallable(Service, 'call')).toBe(false);
    expect(inspector.isCallable(Service, 'bind')).toBe(false);
    expect(inspector.isCallable(Service, 'apply', true)).toBe(false);
  });

  it('hides internal methods from outside callers', () => {
    const service = new Service();
    expect(inspector.isCallable(service, 'connect')).toBe(false);
    expect(inspector.isCallable(service, 'connect', true)).toBe(true);
  });

  it('inherits internal marks through subclasses that keep the definition', () => {
    const service = new LoggedService();
    expect(inspector.isInternal(service, 'connect')).toBe(true);
    expect(inspector.isCallable(service, 'connect')).toBe(false);
  });

  it('follows the mark of the definition that resolves', () => {
    const service = new ExtendedService();
    expect(inspector.isInternal(service, 'connect')).toBe(false);
    expect(inspector.isCallable(service, 'connect')).toBe(true);
  });

  it('inspects static members on classes', () => {
    expect(inspector.isCallable(Service, 'create')).toBe(true);
    expect(inspector.isCallable(Service, 'boot')).toBe(false);
    expect(inspector.isCallable(Service, 'boot', true)).toBe(true);
    expect(inspector.isCallable(ExtendedService, 'boot')).toBe(false);
    expect(inspector.isCallable(Service, 'version')).toBe(false);
  });

  it('keeps instance and static marks apart', () => {
    expect(inspector.isInternal(Service, 'connect')).toBe(false);
    expect(inspector.isInternal(new Service(), 'boot')).toBe(false);
  });
});
