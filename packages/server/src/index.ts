/**
 * @photodrop/server
 *
 * HTTP API server for photodrop.
 *
 * Routes:
 * - GET  /                   - welcome message
 * - GET  /health, /health/ready
 * - POST /upload             - image + metadata upload
 * - GET  /images/, /images/:id
 * - GET  /uploads/:filename  - stored image bytes
 */

export * from './app.js';
export * from './error.js';
export * from './schemas.js';
export * from './routes/index.js';
