export {
  consoleWarningHandler,
  deprecate,
  deprecationPolicyFromEnv,
  isDeprecationPolicy,
} from './warnings.js';
