import type { Card } from '../cards/Card.js';
import type { RandomSource } from '../cards/Deck.js';
import type { CategoryCounts, ProbabilityDistribution } from '../evaluator/HandCategory.js';

/**
 * How a distribution was obtained
 */
export type OddsMethod = 'deterministic' | 'exact' | 'monte-carlo';

/**
 * Cards known at the time of a request
 */
export interface BoardState {
  /** The player's two private cards */
  holeCards: readonly Card[];

  /** Revealed community cards (unset slots already removed) */
  knownCommunity: readonly Card[];
}

/**
 * Options for Monte Carlo sampling
 */
export interface SamplingOptions {
  /** Number of random board completions to evaluate (default 10,000) */
  iterations?: number;

  /** Random source; defaults to Math.random. Pass a seeded source for reproducible runs */
  rng?: RandomSource;

  /** Checked between trials; aborting rejects with ComputationAbortedError */
  signal?: AbortSignal;

  /** Trials between yields to the event loop (async variant only, default 500) */
  batchSize?: number;
}

/**
 * Category distribution over every way the unknown board cards could fall
 */
export interface OddsResult {
  /** Which strategy produced the numbers */
  method: OddsMethod;

  /** Community cards still unrevealed */
  missingCount: number;

  /** Number of evaluated completions (combinations, trials, or 1) */
  samples: number;

  /** Raw tallies; always sum to `samples` */
  counts: CategoryCounts;

  /** counts / samples */
  distribution: ProbabilityDistribution;
}
