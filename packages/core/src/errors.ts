import type { Card } from './cards/Card.js';

export type PokerOddsErrorCode =
  | 'DUPLICATE_CARD'
  | 'INVALID_CARD'
  | 'INVALID_HAND'
  | 'INVALID_BOARD'
  | 'ABORTED';

/**
 * Base class for every contract violation raised by the engine.
 * Boundaries (CLI, HTTP) switch on `code` rather than on message text.
 */
export abstract class PokerOddsError extends Error {
  abstract readonly code: PokerOddsErrorCode;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** The same (rank, suit) pair was supplied more than once */
export class DuplicateCardError extends PokerOddsError {
  readonly code = 'DUPLICATE_CARD';

  constructor(readonly card: Card) {
    super(`Duplicate card: ${card.toString()}`);
  }
}

/** Card notation that does not name one of the 52 cards */
export class InvalidCardError extends PokerOddsError {
  readonly code = 'INVALID_CARD';
}

/** Wrong number of cards for the operation */
export class InvalidHandError extends PokerOddsError {
  readonly code = 'INVALID_HAND';
}

/** More community slots than a board has */
export class InvalidBoardError extends PokerOddsError {
  readonly code = 'INVALID_BOARD';
}

export class ComputationAbortedError extends PokerOddsError {
  readonly code = 'ABORTED';

  constructor() {
    super('Computation aborted');
  }
}

export function isPokerOddsError(error: unknown): error is PokerOddsError {
  return error instanceof PokerOddsError;
}
