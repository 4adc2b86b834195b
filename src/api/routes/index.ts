export { healthRoutes } from './health.route.js';
export type { RouteOptions } from './health.route.js';
export { emailRoutes } from './emails.route.js';
export { timelineRoutes } from './timeline.route.js';
