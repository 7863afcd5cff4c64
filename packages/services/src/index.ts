/**
 * @photodrop/services
 *
 * Configuration, storage layout and upload orchestration.
 */

export * from './config.js';
export * from './deployment.js';
export * from './errors.js';
export * from './image.js';
export * from './logger.js';
export * from './storage.js';
