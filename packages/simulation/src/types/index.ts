/**
 * Types Module Index
 * ==================
 */

export * from './candle.js';
export * from './signal.js';
export * from './trade.js';
export * from './results.js';
