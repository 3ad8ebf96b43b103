export * from './segment-parser.js';
export * from './device-reconciler.js';
export * from './rate-tracker.js';
export * from './traffic-classifier.js';
export * from './flow-parser.js';
export * from './system-readings.js';
export * from './router-monitor.js';
