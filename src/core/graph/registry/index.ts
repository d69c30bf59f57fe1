export { NodeRegistry } from './NodeRegistry.js';
