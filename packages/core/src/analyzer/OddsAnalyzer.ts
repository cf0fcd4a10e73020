import { Card } from '../cards/Card.js';
import { assertDistinct } from '../cards/Deck.js';
import { evaluate } from '../evaluator/HandEvaluator.js';
import {
  HAND_CATEGORIES,
  HandCategory,
  ProbabilityDistribution,
  emptyCounts,
  normalizeCounts
} from '../evaluator/HandCategory.js';
import { InvalidBoardError, InvalidHandError } from '../errors.js';
import { exactDistribution } from '../simulator/ExactEnumerator.js';
import {
  ProgressCallback,
  sampleDistribution,
  sampleDistributionAsync
} from '../simulator/MonteCarloSampler.js';
import type { BoardState, OddsResult, SamplingOptions } from '../simulator/types.js';

export const HOLE_CARD_COUNT = 2;
export const BOARD_SIZE = 5;

/** Price of the hypothetical call used by the EV formula */
export const DEFAULT_CALL_COST = 20;

/** Largest unknown count still enumerated exhaustively */
export const EXACT_ENUMERATION_LIMIT = 2;

const DECIMAL_PATTERN = /^(\d+(\.\d*)?|\.\d+)$/;

/** A community slot: a revealed card, or null/undefined while pending */
export type CommunitySlot = Card | null | undefined;

export interface AnalyzeOptions extends SamplingOptions {
  onProgress?: ProgressCallback;
}

interface ResolvedBoard extends BoardState {
  missingCount: number;
}

/**
 * Validate a request and drop the unset community slots.
 */
export function resolveBoard(
  holeCards: readonly Card[],
  community: readonly CommunitySlot[] = []
): ResolvedBoard {
  if (holeCards.length !== HOLE_CARD_COUNT) {
    throw new InvalidHandError(`Expected ${HOLE_CARD_COUNT} hole cards, got ${holeCards.length}`);
  }
  if (community.length > BOARD_SIZE) {
    throw new InvalidBoardError(`A board has at most ${BOARD_SIZE} community cards, got ${community.length} slots`);
  }

  const knownCommunity = community.filter((slot): slot is Card => slot instanceof Card);
  assertDistinct([...holeCards, ...knownCommunity]);

  return {
    holeCards,
    knownCommunity,
    missingCount: BOARD_SIZE - knownCommunity.length
  };
}

function deterministicResult(board: ResolvedBoard): OddsResult {
  const category = evaluate([...board.holeCards, ...board.knownCommunity]);
  const counts = emptyCounts();
  counts[category] = 1;
  return {
    method: 'deterministic',
    missingCount: 0,
    samples: 1,
    counts,
    distribution: normalizeCounts(counts, 1)
  };
}

/**
 * Distribution of final categories with the strategy picked by how many
 * community cards are unknown: none → one evaluation, 1-2 → exhaustive
 * enumeration, 3+ → Monte Carlo sampling.
 */
export function analyzeOdds(
  holeCards: readonly Card[],
  community: readonly CommunitySlot[] = [],
  options: AnalyzeOptions = {}
): OddsResult {
  const board = resolveBoard(holeCards, community);

  if (board.missingCount <= 0) {
    return deterministicResult(board);
  }
  if (board.missingCount <= EXACT_ENUMERATION_LIMIT) {
    return exactDistribution(board.holeCards, board.knownCommunity, board.missingCount);
  }
  return sampleDistribution(
    board.holeCards,
    board.knownCommunity,
    board.missingCount,
    options,
    options.onProgress
  );
}

/**
 * Non-blocking variant of {@link analyzeOdds}. Sampling yields to the event
 * loop between batches and stops when `options.signal` is aborted.
 */
export async function analyzeOddsAsync(
  holeCards: readonly Card[],
  community: readonly CommunitySlot[] = [],
  options: AnalyzeOptions = {}
): Promise<OddsResult> {
  const board = resolveBoard(holeCards, community);

  if (board.missingCount <= 0) {
    return deterministicResult(board);
  }
  if (board.missingCount <= EXACT_ENUMERATION_LIMIT) {
    return exactDistribution(board.holeCards, board.knownCommunity, board.missingCount);
  }
  return sampleDistributionAsync(
    board.holeCards,
    board.knownCommunity,
    board.missingCount,
    options,
    options.onProgress
  );
}

/**
 * Probability of each final category given 2 hole cards and 0-5 community cards.
 */
export function computeDistribution(
  holeCards: readonly Card[],
  community: readonly CommunitySlot[] = [],
  options: AnalyzeOptions = {}
): ProbabilityDistribution {
  return analyzeOdds(holeCards, community, options).distribution;
}

/**
 * Probability mass of every category better than High Card.
 */
export function pairOrBetterProbability(distribution: ProbabilityDistribution): number {
  return HAND_CATEGORIES
    .filter(category => category > HandCategory.HIGH_CARD)
    .reduce((sum, category) => sum + distribution[category], 0);
}

/**
 * EV of a call: p * potSize - (1 - p) * cost, where p is the chance of
 * finishing with a Pair or better.
 */
export function computeExpectedValue(
  distribution: ProbabilityDistribution,
  potSize: number,
  cost: number = DEFAULT_CALL_COST
): number {
  if (!Number.isFinite(potSize) || potSize < 0) {
    throw new RangeError(`Pot size must be a non-negative number, got ${potSize}`);
  }
  if (!Number.isFinite(cost) || cost < 0) {
    throw new RangeError(`Cost must be a non-negative number, got ${cost}`);
  }
  const p = pairOrBetterProbability(distribution);
  return p * potSize - (1 - p) * cost;
}

/**
 * Coerce user-entered pot text to a number. Anything that is not a
 * non-negative finite number becomes 0.
 */
export function parsePotSize(input: string | number | null | undefined): number {
  if (input === null || input === undefined) {
    return 0;
  }
  if (typeof input === 'number') {
    return Number.isFinite(input) && input > 0 ? input : 0;
  }
  const text = input.trim();
  // Plain decimals only: no hex, binary or exponent forms
  if (!DECIMAL_PATTERN.test(text)) {
    return 0;
  }
  const value = Number(text);
  return value > 0 ? value : 0;
}
