import type { Card } from '../cards/Card.js';
import { remainingDeck } from '../cards/Deck.js';
import { evaluate } from '../evaluator/HandEvaluator.js';
import { emptyCounts, normalizeCounts } from '../evaluator/HandCategory.js';
import { combinations } from '../utils/combinations.js';
import type { OddsResult } from './types.js';

/**
 * Exhaustively evaluates every way to fill `missingCount` community cards.
 *
 * Intended for one or two unknown cards (at most C(47,2) = 1081 boards), but
 * works for any count. Deterministic: identical inputs give identical output.
 */
export function exactDistribution(
  holeCards: readonly Card[],
  knownCommunity: readonly Card[],
  missingCount: number
): OddsResult {
  const known = [...holeCards, ...knownCommunity];
  const remaining = remainingDeck(known);

  const counts = emptyCounts();
  let total = 0;

  for (const completion of combinations(remaining, missingCount)) {
    counts[evaluate([...known, ...completion])]++;
    total++;
  }

  return {
    method: 'exact',
    missingCount,
    samples: total,
    counts,
    distribution: normalizeCounts(counts, total)
  };
}
