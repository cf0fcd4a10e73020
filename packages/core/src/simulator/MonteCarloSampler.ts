import { setImmediate as yieldToEventLoop } from 'node:timers/promises';
import { Card } from '../cards/Card.js';
import { Deck, remainingDeck } from '../cards/Deck.js';
import { evaluate } from '../evaluator/HandEvaluator.js';
import { CategoryCounts, emptyCounts, normalizeCounts } from '../evaluator/HandCategory.js';
import { ComputationAbortedError } from '../errors.js';
import type { OddsResult, SamplingOptions } from './types.js';

export const DEFAULT_ITERATIONS = 10_000;
export const DEFAULT_BATCH_SIZE = 500;

/** How often, in trials, the progress callback fires */
const PROGRESS_INTERVAL = 1000;

export type ProgressCallback = (completed: number, total: number) => void;

/**
 * Monte Carlo estimator of the category distribution.
 * Each trial draws the missing community cards uniformly at random without
 * replacement from the remaining deck and classifies the resulting hand.
 *
 * The standard error of each probability is about sqrt(p(1-p)/N).
 */
export class MonteCarloSampler {
  private readonly known: Card[];
  private readonly deck: Deck;
  private readonly counts: CategoryCounts = emptyCounts();
  private completed = 0;

  readonly iterations: number;

  constructor(
    holeCards: readonly Card[],
    knownCommunity: readonly Card[],
    private readonly missingCount: number,
    private readonly options: SamplingOptions = {},
    private readonly onProgress?: ProgressCallback
  ) {
    const iterations = options.iterations ?? DEFAULT_ITERATIONS;
    if (!Number.isInteger(iterations) || iterations <= 0) {
      throw new RangeError(`Iterations must be a positive integer, got ${iterations}`);
    }
    this.iterations = iterations;
    this.known = [...holeCards, ...knownCommunity];
    this.deck = Deck.fromCards(remainingDeck(this.known), options.rng ?? Math.random);
  }

  /** Trials still to run */
  get pending(): number {
    return this.iterations - this.completed;
  }

  /**
   * Run up to `count` further trials. Returns the number actually run.
   */
  runTrials(count: number): number {
    const { signal } = this.options;
    const target = Math.min(this.iterations, this.completed + count);
    const start = this.completed;

    while (this.completed < target) {
      if (signal?.aborted) {
        throw new ComputationAbortedError();
      }
      const drawn = this.deck.drawRandom(this.missingCount);
      this.counts[evaluate([...this.known, ...drawn])]++;
      this.completed++;

      if (this.onProgress && this.completed % PROGRESS_INTERVAL === 0) {
        this.onProgress(this.completed, this.iterations);
      }
    }

    return this.completed - start;
  }

  /** Result over the trials run so far */
  result(): OddsResult {
    return {
      method: 'monte-carlo',
      missingCount: this.missingCount,
      samples: this.completed,
      counts: { ...this.counts },
      distribution: normalizeCounts(this.counts, this.completed)
    };
  }
}

/**
 * Estimate the distribution synchronously.
 */
export function sampleDistribution(
  holeCards: readonly Card[],
  knownCommunity: readonly Card[],
  missingCount: number,
  options: SamplingOptions = {},
  onProgress?: ProgressCallback
): OddsResult {
  const sampler = new MonteCarloSampler(holeCards, knownCommunity, missingCount, options, onProgress);
  sampler.runTrials(sampler.iterations);
  return sampler.result();
}

/**
 * Estimate the distribution, yielding to the event loop between batches.
 * Consumes the random source exactly as {@link sampleDistribution} does, so a
 * seeded run gives the same result either way.
 */
export async function sampleDistributionAsync(
  holeCards: readonly Card[],
  knownCommunity: readonly Card[],
  missingCount: number,
  options: SamplingOptions = {},
  onProgress?: ProgressCallback
): Promise<OddsResult> {
  const sampler = new MonteCarloSampler(holeCards, knownCommunity, missingCount, options, onProgress);
  const batchSize = options.batchSize ?? DEFAULT_BATCH_SIZE;
  if (!Number.isInteger(batchSize) || batchSize <= 0) {
    throw new RangeError(`Batch size must be a positive integer, got ${batchSize}`);
  }

  while (sampler.pending > 0) {
    sampler.runTrials(batchSize);
    await yieldToEventLoop();
  }
  if (options.signal?.aborted) {
    throw new ComputationAbortedError();
  }
  return sampler.result();
}
