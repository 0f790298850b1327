export * from './errors.js';
export * from './logger.js';
export * from './schemas/index.js';
export * from './utils/index.js';
