export * from './ma-crossover.js';
