export { default as eventRoutes } from './event-routes.js';
export type { EventRoutesOptions } from './event-routes.js';
export { default as queueRoutes } from './queue-routes.js';
export { default as healthRoutes, SERVICE_NAME, SERVICE_VERSION } from './health-routes.js';
