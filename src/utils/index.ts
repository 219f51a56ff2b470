// src/utils/index.ts
export * from './xml-utils.js';
export * from './errors.js';
export * from './logger.js';
export * from './concurrency.js';
