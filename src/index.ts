/**
 * Root entrypoint: re-exports the web client, the sub-API bindings, the models and the error utilities.
 * Use this import if you want everything from a single module surface.
 * @module
 */

export * from './api/index.js';
export * from './core/index.js';
export * from './error/index.js';
export * from './models/index.js';
