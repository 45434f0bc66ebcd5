/**
 * Indicators Module Index
 * =======================
 */

export * from './moving-averages.js';
