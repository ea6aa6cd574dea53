export { createServiceContainer, getServiceContainer, resetServiceContainer } from './container.js';
export type { ServiceContainer } from './container.js';
