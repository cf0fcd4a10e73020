// Poker odds and expected-value engine

// Errors
export * from './errors.js';

// Cards
export * from './cards/index.js';

// Hand evaluation
export * from './evaluator/index.js';

// Exact enumeration and Monte Carlo sampling
export * from './simulator/index.js';

// Distribution, EV and reporting
export * from './analyzer/index.js';

// Recompute sequencing
export * from './session/index.js';

// Utilities
export * from './utils/index.js';
