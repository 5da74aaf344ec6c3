export { default as eventRoutes } from './event-routes.js';
export type { EventRoutesOptions } from './event-routes.js';
