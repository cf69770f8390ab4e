export * from './accumulator.js';
