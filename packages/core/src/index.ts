export { BaseObject } from './core/base-object.js';
export { StaticObject } from './core/static-object.js';

export { AutoConfig, Internal } from './decorators/index.js';
export { ClassRegistry } from './registry/class-registry.js';

export { createContext, defaultContext, setDefaultContext } from './api/context.js';
export { Filters } from './core/filters.js';
export { Inspector } from './core/inspector.js';
export { LineageCache, classParents } from './core/lineage-cache.js';
export { Locator } from './core/locator.js';
export { union } from './core/auto-config.js';

export { AutoConfigEffect } from './types/types.js';
export type {
  AutoConfigDirective,
  AutoConfigOptions,
  ClassMap,
  ClassRef,
  Constructor,
  ContextConfig,
  DeprecationPolicy,
  Filter,
  FilterNext,
  FilterParams,
  InvocableName,
  MethodArgs,
  MethodName,
  MethodResult,
  ObjectConfig,
  ObjectContext,
  ObjectState,
  ResolvedConfig,
  Warning,
  WarningHandler,
} from './types/types.js';

export { consoleWarningHandler, deprecationPolicyFromEnv } from './diagnostics/index.js';

// Errors
export {
  AutoConfigMergeError,
  ClassNotFoundError,
  DeprecatedApiError,
  InvalidAutoConfigError,
  InvalidContextConfigError,
  InvalidFilterError,
  InvalidInternalError,
  MethodNotFoundError,
} from './errors/errors.js';
