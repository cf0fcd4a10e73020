export * from './HandCategory.js';
export * from './HandEvaluator.js';
