export * from './combinations.js';
