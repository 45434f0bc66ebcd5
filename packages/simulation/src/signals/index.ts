export * from './crossover.js';
