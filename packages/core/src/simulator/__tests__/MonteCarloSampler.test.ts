import { describe, it, expect } from 'vitest';
import { Card } from '../../cards/Card.js';
import { createSeededRandom } from '../../cards/Deck.js';
import { ComputationAbortedError, DuplicateCardError } from '../../errors.js';
import { HAND_CATEGORIES, totalOf } from '../../evaluator/HandCategory.js';
import { exactDistribution } from '../ExactEnumerator.js';
import {
  DEFAULT_ITERATIONS,
  MonteCarloSampler,
  sampleDistribution,
  sampleDistributionAsync
} from '../MonteCarloSampler.js';

const hole = Card.parseMany('Ah Kh');
const flop = Card.parseMany('Qh 7c 2d');

describe('sampleDistribution', () => {
  it('runs 10,000 trials by default and tallies each once', () => {
    const result = sampleDistribution(hole, [], 5, { rng: createSeededRandom(1) });
    expect(result.method).toBe('monte-carlo');
    expect(result.missingCount).toBe(5);
    expect(result.samples).toBe(DEFAULT_ITERATIONS);
    expect(totalOf(result.counts)).toBe(DEFAULT_ITERATIONS);
    expect(Math.abs(totalOf(result.distribution) - 1)).toBeLessThan(1e-9);
  });

  it('is reproducible with the same seeded source', () => {
    const a = sampleDistribution(hole, [], 5, { iterations: 2000, rng: createSeededRandom(99) });
    const b = sampleDistribution(hole, [], 5, { iterations: 2000, rng: createSeededRandom(99) });
    expect(a).toEqual(b);
  });

  it('converges to the exact distribution', () => {
    const exact = exactDistribution(hole, flop, 2);
    const sampled = sampleDistribution(hole, flop, 2, {
      iterations: 10_000,
      rng: createSeededRandom(2024)
    });

    for (const category of HAND_CATEGORIES) {
      if (exact.distribution[category] >= 0.05) {
        expect(Math.abs(sampled.distribution[category] - exact.distribution[category])).toBeLessThan(0.02);
      }
    }
  });

  it('reports progress every thousand trials', () => {
    const calls: [number, number][] = [];
    sampleDistribution(hole, flop, 2, { iterations: 3000, rng: createSeededRandom(5) }, (done, total) => {
      calls.push([done, total]);
    });
    expect(calls).toEqual([[1000, 3000], [2000, 3000], [3000, 3000]]);
  });

  it('rejects a non-positive iteration count', () => {
    expect(() => sampleDistribution(hole, [], 5, { iterations: 0 })).toThrow(RangeError);
    expect(() => sampleDistribution(hole, [], 5, { iterations: 2.5 })).toThrow(
      'Iterations must be a positive integer, got 2.5'
    );
  });

  it('rejects duplicate known cards', () => {
    expect(() => sampleDistribution(hole, Card.parseMany('Kh'), 4)).toThrow(DuplicateCardError);
  });

  it('stops when the signal is already aborted', () => {
    const controller = new AbortController();
    controller.abort();
    expect(() => sampleDistribution(hole, [], 5, { signal: controller.signal }))
      .toThrow(ComputationAbortedError);
  });
});

describe('sampleDistributionAsync', () => {
  it('matches the synchronous result for the same seed', async () => {
    const sync = sampleDistribution(hole, flop, 2, { iterations: 1500, rng: createSeededRandom(8) });
    const viaAsync = await sampleDistributionAsync(hole, flop, 2, {
      iterations: 1500,
      batchSize: 400,
      rng: createSeededRandom(8)
    });
    expect(viaAsync).toEqual(sync);
  });

  it('rejects once aborted between batches', async () => {
    const controller = new AbortController();
    const pending = sampleDistributionAsync(hole, [], 5, {
      iterations: 5000,
      batchSize: 100,
      signal: controller.signal
    });
    controller.abort();
    await expect(pending).rejects.toBeInstanceOf(ComputationAbortedError);
  });
});

describe('MonteCarloSampler', () => {
  it('runs trials incrementally up to the iteration count', () => {
    const sampler = new MonteCarloSampler(hole, flop, 2, { iterations: 250, rng: createSeededRandom(3) });
    expect(sampler.runTrials(100)).toBe(100);
    expect(sampler.pending).toBe(150);
    expect(sampler.runTrials(1000)).toBe(150);
    expect(sampler.pending).toBe(0);
    expect(sampler.result().samples).toBe(250);
  });
});
