export * from './errors.js';
export * from './async-helpers.js';
export * from './circuit-breaker.js';
export * from './mac.js';
export * from './frequency.js';
export * from './ip.js';
export * from './metrics.js';
export * from './logger.js';
