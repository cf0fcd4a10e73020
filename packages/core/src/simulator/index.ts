export * from './types.js';
export * from './ExactEnumerator.js';
export * from './MonteCarloSampler.js';
