export * from './actions.js';
export * from './router-pulse-service.js';
