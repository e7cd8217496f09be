export { default as statsRoutes } from './stats-routes.js';
export type { DaemonSnapshot, StatsRoutesOptions } from './stats-routes.js';
