import { Card, Rank, RANKS, SUITS } from '../cards/Card.js';
import { assertDistinct } from '../cards/Deck.js';
import { InvalidHandError } from '../errors.js';
import { HandCategory } from './HandCategory.js';

export const MIN_HAND_SIZE = 5;
export const MAX_HAND_SIZE = 7;

const ROYAL_RANKS: readonly Rank[] = [10, 11, 12, 13, 14];

/**
 * Classifies 5 to 7 distinct cards into the best category they contain.
 * Pure: depends only on the set of cards, not on their order.
 */
export function evaluate(cards: readonly Card[]): HandCategory {
  if (cards.length < MIN_HAND_SIZE || cards.length > MAX_HAND_SIZE) {
    throw new InvalidHandError(
      `Hand must contain ${MIN_HAND_SIZE} to ${MAX_HAND_SIZE} cards, got ${cards.length}`
    );
  }
  assertDistinct(cards);

  // Count tables indexed by rank ordinal (rank - 2) and suit ordinal
  const rankCounts = new Array<number>(RANKS.length).fill(0);
  const suitCounts = new Array<number>(SUITS.length).fill(0);
  for (const card of cards) {
    rankCounts[card.rank - 2]++;
    suitCounts[card.suitIndex]++;
  }

  // With at most 7 cards only one suit can reach 5
  const flushSuit = suitCounts.findIndex(count => count >= 5);
  const flushCards = flushSuit >= 0 ? cards.filter(c => c.suitIndex === flushSuit) : [];

  if (flushCards.length > 0 && straightHighCard(flushCards) !== null) {
    const flushRanks = new Set(flushCards.map(c => c.rank));
    return ROYAL_RANKS.every(rank => flushRanks.has(rank))
      ? HandCategory.ROYAL_FLUSH
      : HandCategory.STRAIGHT_FLUSH;
  }

  let quads = false;
  let tripGroups = 0;
  let pairCount = 0;
  for (const count of rankCounts) {
    if (count === 4) quads = true;
    if (count >= 3) tripGroups++;
    if (count === 2) pairCount++;
  }

  if (quads) {
    return HandCategory.FOUR_OF_A_KIND;
  }

  // A second trips group donates three cards as the pair
  if (tripGroups >= 1 && (pairCount >= 1 || tripGroups >= 2)) {
    return HandCategory.FULL_HOUSE;
  }

  if (flushCards.length > 0) {
    return HandCategory.FLUSH;
  }

  if (straightHighCard(cards) !== null) {
    return HandCategory.STRAIGHT;
  }

  if (tripGroups >= 1) {
    return HandCategory.THREE_OF_A_KIND;
  }

  if (pairCount >= 2) {
    return HandCategory.TWO_PAIR;
  }

  if (pairCount === 1) {
    return HandCategory.PAIR;
  }

  return HandCategory.HIGH_CARD;
}

/**
 * Highest card of the best run of five or more consecutive ranks, or null.
 * The ace also counts as 1, so A-2-3-4-5 (the wheel) is a straight with high card 5.
 */
export function straightHighCard(cards: readonly Card[]): number | null {
  // present[v] for v = 1..14, where 1 is the low ace
  const present = new Array<boolean>(15).fill(false);
  for (const card of cards) {
    present[card.rank] = true;
  }
  present[1] = present[14];

  let run = 0;
  let high: number | null = null;
  for (let value = 1; value <= 14; value++) {
    run = present[value] ? run + 1 : 0;
    if (run >= 5) {
      high = value;
    }
  }
  return high;
}
