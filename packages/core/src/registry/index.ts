export { ClassRegistry, ownerOf, prototypeChain } from './class-registry.js';
