export { default as healthRoutes } from './health-routes.js';
export { default as sensorRoutes } from './sensor-routes.js';
export { default as chronicleRoutes } from './chronicle-routes.js';
