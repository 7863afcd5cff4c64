/**
 * Database models
 */

export * from './image-metadata.js';
