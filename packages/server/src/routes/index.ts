/**
 * API routes
 */

export { rootRoutes, WELCOME_MESSAGE } from './root.js';
export { healthRoutes, type HealthResponse } from './health.js';
export { imageRoutes, UPLOAD_FIELD } from './images.js';
export { uploadRoutes } from './uploads.js';
