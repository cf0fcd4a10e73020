/**
 * Hand strength categories (ordered worst to best)
 */
export enum HandCategory {
  HIGH_CARD = 0,
  PAIR = 1,
  TWO_PAIR = 2,
  THREE_OF_A_KIND = 3,  // "Set" or "Trips"
  STRAIGHT = 4,
  FLUSH = 5,
  FULL_HOUSE = 6,
  FOUR_OF_A_KIND = 7,   // "Quads"
  STRAIGHT_FLUSH = 8,
  ROYAL_FLUSH = 9       // Ace-high straight flush, reported separately
}

/** Every category, worst to best */
export const HAND_CATEGORIES: readonly HandCategory[] = [
  HandCategory.HIGH_CARD,
  HandCategory.PAIR,
  HandCategory.TWO_PAIR,
  HandCategory.THREE_OF_A_KIND,
  HandCategory.STRAIGHT,
  HandCategory.FLUSH,
  HandCategory.FULL_HOUSE,
  HandCategory.FOUR_OF_A_KIND,
  HandCategory.STRAIGHT_FLUSH,
  HandCategory.ROYAL_FLUSH
];

/**
 * Short codes for categories
 */
export const HAND_CATEGORY_CODES: Record<HandCategory, string> = {
  [HandCategory.HIGH_CARD]: 'HC',
  [HandCategory.PAIR]: '1P',
  [HandCategory.TWO_PAIR]: '2P',
  [HandCategory.THREE_OF_A_KIND]: '3K',
  [HandCategory.STRAIGHT]: 'ST',
  [HandCategory.FLUSH]: 'FL',
  [HandCategory.FULL_HOUSE]: 'FH',
  [HandCategory.FOUR_OF_A_KIND]: '4K',
  [HandCategory.STRAIGHT_FLUSH]: 'SF',
  [HandCategory.ROYAL_FLUSH]: 'RF'
};

/**
 * Human-readable names for categories
 */
export const HAND_CATEGORY_NAMES: Record<HandCategory, string> = {
  [HandCategory.HIGH_CARD]: 'High Card',
  [HandCategory.PAIR]: 'Pair',
  [HandCategory.TWO_PAIR]: 'Two Pair',
  [HandCategory.THREE_OF_A_KIND]: 'Three of a Kind',
  [HandCategory.STRAIGHT]: 'Straight',
  [HandCategory.FLUSH]: 'Flush',
  [HandCategory.FULL_HOUSE]: 'Full House',
  [HandCategory.FOUR_OF_A_KIND]: 'Four of a Kind',
  [HandCategory.STRAIGHT_FLUSH]: 'Straight Flush',
  [HandCategory.ROYAL_FLUSH]: 'Royal Flush'
};

/** Tally of evaluations per category */
export type CategoryCounts = Record<HandCategory, number>;

/**
 * Probability of each category, each in [0, 1].
 * Sums to 1 (within floating-point or sampling tolerance).
 */
export type ProbabilityDistribution = Record<HandCategory, number>;

/** A table with every category set to zero */
export function emptyCounts(): CategoryCounts {
  return {
    [HandCategory.HIGH_CARD]: 0,
    [HandCategory.PAIR]: 0,
    [HandCategory.TWO_PAIR]: 0,
    [HandCategory.THREE_OF_A_KIND]: 0,
    [HandCategory.STRAIGHT]: 0,
    [HandCategory.FLUSH]: 0,
    [HandCategory.FULL_HOUSE]: 0,
    [HandCategory.FOUR_OF_A_KIND]: 0,
    [HandCategory.STRAIGHT_FLUSH]: 0,
    [HandCategory.ROYAL_FLUSH]: 0
  };
}

/**
 * Divide every count by `total`.
 */
export function normalizeCounts(counts: CategoryCounts, total: number): ProbabilityDistribution {
  const distribution = emptyCounts();
  if (total <= 0) {
    return distribution;
  }
  for (const category of HAND_CATEGORIES) {
    distribution[category] = counts[category] / total;
  }
  return distribution;
}

/**
 * Sum of all entries of a counts table or distribution
 */
export function totalOf(values: Record<HandCategory, number>): number {
  return HAND_CATEGORIES.reduce((sum, category) => sum + values[category], 0);
}
