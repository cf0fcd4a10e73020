import { describe, it, expect } from 'vitest';
import { Card, formatCards } from '../Card.js';
import { Deck, createSeededRandom, fullDeck, remainingDeck } from '../Deck.js';
import { DuplicateCardError } from '../../errors.js';

describe('fullDeck', () => {
  it('contains 52 distinct cards', () => {
    const deck = fullDeck();
    expect(deck).toHaveLength(52);
    expect(new Set(deck.map(c => c.encoded)).size).toBe(52);
    expect(new Set(deck.map(c => c.toString())).size).toBe(52);
  });

  it('enumerates suits outer and ranks inner in a fixed order', () => {
    const deck = fullDeck();
    expect(deck[0].toString()).toBe('2c');
    expect(deck[12].toString()).toBe('Ac');
    expect(deck[13].toString()).toBe('2d');
    expect(deck[51].toString()).toBe('As');
    expect(formatCards(fullDeck())).toBe(formatCards(deck));
  });
});

describe('remainingDeck', () => {
  it('removes every known card', () => {
    const known = Card.parseMany('As Ks Qh');
    const remaining = remainingDeck(known);
    expect(remaining).toHaveLength(49);
    for (const card of known) {
      expect(remaining.some(c => c.equals(card))).toBe(false);
    }
  });

  it('removes cards structurally equal to separately created ones', () => {
    const remaining = remainingDeck([Card.create(14, 's')]);
    expect(remaining.some(c => c.toString() === 'As')).toBe(false);
  });

  it('rejects duplicate known cards', () => {
    expect(() => remainingDeck(Card.parseMany('As Kd As'))).toThrow(DuplicateCardError);
    expect(() => remainingDeck(Card.parseMany('As Kd As'))).toThrow('Duplicate card: As');
  });
});

describe('Deck', () => {
  it('draws reproducibly with the same seed', () => {
    const a = Deck.fromCards(fullDeck(), createSeededRandom(42)).drawRandom(10);
    const b = Deck.fromCards(fullDeck(), createSeededRandom(42)).drawRandom(10);
    expect(formatCards(a)).toBe(formatCards(b));
  });

  it('draws distinct cards from its own pile without consuming it', () => {
    const pile = Card.parseMany('2c 3c 4c 5c 6c');
    const deck = Deck.fromCards(pile, createSeededRandom(1));
    for (let i = 0; i < 20; i++) {
      const drawn = deck.drawRandom(3);
      expect(drawn).toHaveLength(3);
      expect(new Set(drawn.map(c => c.encoded)).size).toBe(3);
      expect(drawn.every(d => pile.some(p => p.equals(d)))).toBe(true);
    }
    expect(deck.drawRandom(5)).toHaveLength(5);
  });

  it('refuses to draw more cards than it holds', () => {
    const deck = Deck.fromCards(Card.parseMany('2c 3c'));
    expect(() => deck.drawRandom(3)).toThrow(RangeError);
  });
});

describe('createSeededRandom', () => {
  it('produces the same sequence for the same seed, within [0, 1)', () => {
    const a = createSeededRandom(123);
    const b = createSeededRandom(123);
    for (let i = 0; i < 100; i++) {
      const value = a();
      expect(value).toBe(b());
      expect(value).toBeGreaterThanOrEqual(0);
      expect(value).toBeLessThan(1);
    }
  });
});
