export { AutoConfig } from './auto-config.js';
export { Internal } from './internal.js';
