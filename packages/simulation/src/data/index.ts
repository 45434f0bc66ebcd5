export * from './bar-loader.js';
