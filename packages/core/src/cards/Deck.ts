import { Card, RANKS, SUITS } from './Card.js';
import { DuplicateCardError } from '../errors.js';

/** Source of uniform numbers in [0, 1), e.g. Math.random */
export type RandomSource = () => number;

/**
 * All 52 cards, suits outer (c, d, h, s) and ranks inner (2..A).
 * The order is fixed so that seeded runs are reproducible.
 */
export function fullDeck(): Card[] {
  const cards: Card[] = [];
  for (const suit of SUITS) {
    for (const rank of RANKS) {
      cards.push(Card.create(rank, suit));
    }
  }
  return cards;
}

/**
 * Throw DuplicateCardError if any card appears twice.
 */
export function assertDistinct(cards: readonly Card[]): void {
  const seen = new Set<number>();
  for (const card of cards) {
    if (seen.has(card.encoded)) {
      throw new DuplicateCardError(card);
    }
    seen.add(card.encoded);
  }
}

/**
 * The full deck minus the known cards (hole + revealed community).
 */
export function remainingDeck(known: readonly Card[]): Card[] {
  assertDistinct(known);
  const encodedToRemove = new Set(known.map(c => c.encoded));
  return fullDeck().filter(c => !encodedToRemove.has(c.encoded));
}

/**
 * A fixed pile of cards that random fills are drawn from.
 * Supports seeded random for reproducible simulations.
 */
export class Deck {
  private readonly cards: Card[];
  private readonly rng: RandomSource;

  private constructor(cards: Card[], rng: RandomSource) {
    this.cards = cards;
    this.rng = rng;
  }

  /** Create a deck from specific cards, e.g. the remaining deck of a board */
  static fromCards(cards: readonly Card[], rng: RandomSource = Math.random): Deck {
    return new Deck([...cards], rng);
  }

  /**
   * Draw `count` distinct cards uniformly at random without replacement.
   *
   * Only the first `count` positions are shuffled (partial Fisher-Yates), which
   * gives the same distribution as taking the prefix of a full shuffle. The deck
   * is not consumed: every call draws from all of its cards.
   */
  drawRandom(count: number): Card[] {
    const arr = this.cards;
    const n = arr.length;
    if (count > n) {
      throw new RangeError(`Cannot draw ${count} cards from a deck of ${n}`);
    }
    const drawn: Card[] = [];
    for (let i = 0; i < count; i++) {
      const j = i + Math.floor(this.rng() * (n - i));
      [arr[i], arr[j]] = [arr[j], arr[i]];
      drawn.push(arr[i]);
    }
    return drawn;
  }
}

/**
 * Seeded random number generator (mulberry32)
 * Produces deterministic sequence for reproducible simulations
 */
export function createSeededRandom(seed: number): RandomSource {
  let state = seed;
  return function() {
    state |= 0;
    state = state + 0x6D2B79F5 | 0;
    let t = Math.imul(state ^ state >>> 15, 1 | state);
    t = t + Math.imul(t ^ t >>> 7, 61 | t) ^ t;
    return ((t ^ t >>> 14) >>> 0) / 4294967296;
  };
}
