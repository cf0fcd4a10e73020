import { describe, it, expect } from 'vitest';
import { Card } from '../../cards/Card.js';
import { createSeededRandom } from '../../cards/Deck.js';
import { DuplicateCardError } from '../../errors.js';
import { CompletedOdds, OddsRequest, OddsSession } from '../OddsSession.js';

const turnRequest: OddsRequest = {
  holeCards: Card.parseMany('2c 7d'),
  community: Card.parseSlots('9h Jh Kc 3s ?'),
  potSize: 100
};

const preflopRequest: OddsRequest = {
  holeCards: Card.parseMany('As Ks'),
  community: [null, null, null, null, null],
  potSize: 50
};

function createSession(): OddsSession {
  let seed = 0;
  return new OddsSession({
    iterations: 2000,
    batchSize: 100,
    rngFactory: () => createSeededRandom(++seed)
  });
}

describe('OddsSession', () => {
  it('delivers a completed result with its EV', async () => {
    const session = createSession();
    const outcome = await session.request(turnRequest);

    expect(outcome.status).toBe('completed');
    if (outcome.status !== 'completed') return;
    expect(outcome.sequence).toBe(1);
    expect(outcome.result.samples).toBe(46);
    expect(outcome.expectedValue).toBeCloseTo((18 / 46) * 100 - (28 / 46) * 20, 10);
    expect(session.latest).toBe(outcome);
  });

  it('aborts and discards a sampling run superseded by a newer request', async () => {
    const session = createSession();
    const seen: CompletedOdds[] = [];
    session.onResult(outcome => seen.push(outcome));

    const first = session.request(preflopRequest);
    const second = session.request({ ...preflopRequest, potSize: 80 });

    await expect(first).resolves.toEqual({ status: 'superseded', sequence: 1 });
    const latest = await second;
    expect(latest.status).toBe('completed');
    expect(seen.map(o => o.sequence)).toEqual([2]);
    expect(seen[0].request.potSize).toBe(80);
    expect(seen[0].result.samples).toBe(2000);
  });

  it('never lets an older result overwrite a newer one', async () => {
    const session = createSession();
    const seen: number[] = [];
    session.onResult(outcome => seen.push(outcome.sequence));

    const outcomes = await Promise.all([
      session.request(turnRequest),
      session.request(turnRequest),
      session.request({ ...turnRequest, potSize: 10 })
    ]);

    expect(outcomes.map(o => o.status)).toEqual(['superseded', 'superseded', 'completed']);
    expect(seen).toEqual([3]);
    expect(session.latest?.request.potSize).toBe(10);
    expect(session.currentSequence).toBe(3);
  });

  it('rejects when the latest request is invalid', async () => {
    const session = createSession();
    await expect(session.request({
      holeCards: Card.parseMany('As As'),
      community: [],
      potSize: 0
    })).rejects.toBeInstanceOf(DuplicateCardError);
  });

  it('reports a cancelled request as superseded', async () => {
    const session = createSession();
    const pending = session.request(preflopRequest);
    session.cancel();
    await expect(pending).resolves.toEqual({ status: 'superseded', sequence: 1 });
    expect(session.latest).toBeNull();
  });

  it('stops notifying removed listeners', async () => {
    const session = createSession();
    const seen: number[] = [];
    const off = session.onResult(outcome => seen.push(outcome.sequence));

    await session.request(turnRequest);
    off();
    await session.request(turnRequest);

    expect(seen).toEqual([1]);
  });
});
