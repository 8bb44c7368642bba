export * from './performance-metrics.js';
export * from './scoring.js';
