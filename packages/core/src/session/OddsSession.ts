import { Card } from '../cards/Card.js';
import type { RandomSource } from '../cards/Deck.js';
import {
  CommunitySlot,
  DEFAULT_CALL_COST,
  analyzeOddsAsync,
  computeExpectedValue
} from '../analyzer/OddsAnalyzer.js';
import { ComputationAbortedError } from '../errors.js';
import type { OddsResult } from '../simulator/types.js';

/**
 * One recompute request, e.g. fired by a card change, a pot change or a refresh tick
 */
export interface OddsRequest {
  holeCards: readonly Card[];
  community: readonly CommunitySlot[];
  potSize: number;
  cost?: number;
}

export interface CompletedOdds {
  status: 'completed';
  sequence: number;
  request: OddsRequest;
  result: OddsResult;
  expectedValue: number;
}

export interface SupersededOdds {
  status: 'superseded';
  sequence: number;
}

export type OddsOutcome = CompletedOdds | SupersededOdds;

export type OddsListener = (outcome: CompletedOdds) => void;

export interface OddsSessionOptions {
  iterations?: number;
  batchSize?: number;
  /** Called once per request; lets tests inject seeded sources */
  rngFactory?: () => RandomSource;
}

/**
 * Serializes recomputation for one interactive view.
 *
 * Every request gets the next sequence number and aborts the request still in
 * flight. A result is delivered only while its sequence number is the latest
 * issued, so a slow, stale computation can never overwrite a newer one.
 */
export class OddsSession {
  private sequence = 0;
  private controller: AbortController | null = null;
  private readonly listeners = new Set<OddsListener>();
  private _latest: CompletedOdds | null = null;

  constructor(private readonly options: OddsSessionOptions = {}) {}

  /** Newest delivered result */
  get latest(): CompletedOdds | null {
    return this._latest;
  }

  /** Sequence number of the most recent request */
  get currentSequence(): number {
    return this.sequence;
  }

  /** Register a listener; returns a function that removes it */
  onResult(listener: OddsListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  async request(request: OddsRequest): Promise<OddsOutcome> {
    const sequence = ++this.sequence;
    this.controller?.abort();
    const controller = new AbortController();
    this.controller = controller;

    try {
      const result = await analyzeOddsAsync(request.holeCards, request.community, {
        iterations: this.options.iterations,
        batchSize: this.options.batchSize,
        rng: this.options.rngFactory?.(),
        signal: controller.signal
      });

      if (sequence !== this.sequence) {
        return { status: 'superseded', sequence };
      }

      const outcome: CompletedOdds = {
        status: 'completed',
        sequence,
        request,
        result,
        expectedValue: computeExpectedValue(
          result.distribution,
          request.potSize,
          request.cost ?? DEFAULT_CALL_COST
        )
      };
      this._latest = outcome;
      this.listeners.forEach(listener => listener(outcome));
      return outcome;
    } catch (error) {
      if (sequence !== this.sequence || error instanceof ComputationAbortedError) {
        return { status: 'superseded', sequence };
      }
      throw error;
    } finally {
      if (this.controller === controller) {
        this.controller = null;
      }
    }
  }

  /** Abort the request in flight, if any */
  cancel(): void {
    this.controller?.abort();
    this.controller = null;
  }
}
