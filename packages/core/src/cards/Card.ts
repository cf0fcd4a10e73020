import { InvalidCardError } from '../errors.js';

/**
 * Card ranks: 2-14 where 11=Jack, 12=Queen, 13=King, 14=Ace
 */
export type Rank = 2 | 3 | 4 | 5 | 6 | 7 | 8 | 9 | 10 | 11 | 12 | 13 | 14;

/**
 * Card suits: clubs, diamonds, hearts, spades
 */
export type Suit = 'c' | 'd' | 'h' | 's';

/**
 * String notation for a card, e.g., "Ah", "Kd", "7c", "10s"
 */
export type CardNotation = string;

export const RANKS: readonly Rank[] = [2, 3, 4, 5, 6, 7, 8, 9, 10, 11, 12, 13, 14] as const;
export const SUITS: readonly Suit[] = ['c', 'd', 'h', 's'] as const;

/** Tokens accepted by {@link Card.parseSlots} for a community slot not yet revealed */
export const UNSET_SLOT_TOKENS: readonly string[] = ['?', '-', 'x', 'X', '_'];

const RANK_CHARS: Record<Rank, string> = {
  2: '2', 3: '3', 4: '4', 5: '5', 6: '6', 7: '7', 8: '8', 9: '9', 10: 'T',
  11: 'J', 12: 'Q', 13: 'K', 14: 'A'
};

const CHAR_TO_RANK: Record<string, Rank> = {
  '2': 2, '3': 3, '4': 4, '5': 5, '6': 6, '7': 7, '8': 8, '9': 9, 'T': 10, '10': 10,
  'J': 11, 'Q': 12, 'K': 13, 'A': 14,
  'j': 11, 'q': 12, 'k': 13, 'a': 14, 't': 10
};

const SUIT_SYMBOLS: Record<string, Suit> = {
  '♣': 'c', '♦': 'd', '♥': 'h', '♠': 's'
};

function toSuit(char: string): Suit | undefined {
  const lower = char.toLowerCase();
  for (const suit of SUITS) {
    if (suit === lower) return suit;
  }
  return SUIT_SYMBOLS[char];
}

/**
 * Immutable representation of a playing card.
 * Equality is structural: two cards are equal iff rank and suit match,
 * which the compact numeric encoding captures in a single integer.
 */
export class Card {
  /** Compact encoding: rank in low bits, suit ordinal in high bits */
  private readonly _encoded: number;

  private constructor(encoded: number) {
    this._encoded = encoded;
  }

  /** Create a card from rank and suit */
  static create(rank: Rank, suit: Suit): Card {
    const suitIndex = SUITS.indexOf(suit);
    const encoded = (suitIndex << 4) | rank;
    return new Card(encoded);
  }

  /** Parse card from string notation like "Ah", "Kd", "7c", "10s" or "Q♠" */
  static parse(notation: CardNotation): Card {
    const trimmed = notation.trim();
    if (trimmed.length < 2 || trimmed.length > 3) {
      throw new InvalidCardError(`Invalid card notation: ${notation}`);
    }

    const suit = toSuit(trimmed[trimmed.length - 1]);
    const rank = CHAR_TO_RANK[trimmed.slice(0, -1)];

    if (rank === undefined) {
      throw new InvalidCardError(`Invalid rank in notation: ${notation}`);
    }
    if (suit === undefined) {
      throw new InvalidCardError(`Invalid suit in notation: ${notation}`);
    }

    return Card.create(rank, suit);
  }

  /** Parse multiple cards from space or comma separated string */
  static parseMany(notation: string): Card[] {
    return splitTokens(notation).map(s => Card.parse(s));
  }

  /**
   * Parse community slots, where an unset slot is written as "?", "-", "x" or "_".
   * "Qs Js ? ? 2c" gives [Q♠, J♠, null, null, 2♣].
   */
  static parseSlots(notation: string): (Card | null)[] {
    return splitTokens(notation).map(s => (UNSET_SLOT_TOKENS.includes(s) ? null : Card.parse(s)));
  }

  get rank(): Rank {
    return RANKS[(this._encoded & 0xF) - 2];
  }

  get suit(): Suit {
    return SUITS[(this._encoded >> 4) & 0x3];
  }

  /** Ordinal of the suit in {@link SUITS} */
  get suitIndex(): number {
    return (this._encoded >> 4) & 0x3;
  }

  get encoded(): number {
    return this._encoded;
  }

  /** String representation like "Ah", "Td" */
  toString(): CardNotation {
    return `${RANK_CHARS[this.rank]}${this.suit}`;
  }

  toJSON(): CardNotation {
    return this.toString();
  }

  /** Check if same card (rank and suit) */
  equals(other: Card): boolean {
    return this._encoded === other._encoded;
  }
}

function splitTokens(notation: string): string[] {
  return notation
    .split(/[\s,]+/)
    .filter(s => s.length > 0);
}

/** Format cards as space separated notation */
export function formatCards(cards: readonly Card[]): string {
  return cards.map(c => c.toString()).join(' ');
}
