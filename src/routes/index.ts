export { createQuestionRoutes } from './questions.js';
export { createCacheRoutes, type CacheRouteDeps } from './cache.js';
export { createTaskRoutes } from './tasks.js';
export { createModelRoutes, type ModelRouteOptions } from './models.js';
export { createHealthRoutes, type HealthResponse } from './health.js';
