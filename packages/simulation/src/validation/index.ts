export * from './dataset.js';
export * from './signalValidation.js';
export * from './candleValidation.js';
export * from './tradeLogIntegrity.js';
export * from './activity.js';
