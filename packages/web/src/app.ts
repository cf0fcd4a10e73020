import express, { NextFunction, Request, Response } from 'express';
import { z, ZodError } from 'zod';
import {
  Card,
  ComputationAbortedError,
  DEFAULT_CALL_COST,
  DEFAULT_ITERATIONS,
  HAND_CATEGORIES,
  HAND_CATEGORY_CODES,
  HAND_CATEGORY_NAMES,
  UNSET_SLOT_TOKENS,
  analyzeOddsAsync,
  computeExpectedValue,
  createSeededRandom,
  evaluate,
  isPokerOddsError,
  parsePotSize,
  serializeOddsReport
} from '@poker-odds/core';

export interface AppOptions {
  /** Monte Carlo trials when the request names none */
  defaultIterations?: number;
  /** Upper bound on requested trials */
  maxIterations?: number;
  /** Call cost when the request names none */
  callCost?: number;
  log?: (message: string) => void;
}

const evaluateRequestSchema = z.object({
  cards: z.array(z.string()).min(5).max(7),
});

function oddsRequestSchema(maxIterations: number) {
  return z.object({
    holeCards: z.array(z.string()).length(2),
    board: z.array(z.string().nullable()).max(5).default([]),
    // Free text from an input box; coerced, never rejected
    potSize: z.union([z.string(), z.number()]).nullable().optional(),
    cost: z.number().nonnegative().optional(),
    iterations: z.number().int().positive().max(maxIterations).optional(),
    seed: z.number().int().optional(),
  });
}

function toSlot(notation: string | null): Card | null {
  if (notation === null || UNSET_SLOT_TOKENS.includes(notation.trim())) {
    return null;
  }
  return Card.parse(notation);
}

/**
 * Build the express app without listening, so tests can mount it on an
 * ephemeral port.
 */
export function createApp(options: AppOptions = {}): express.Express {
  const defaultIterations = options.defaultIterations ?? DEFAULT_ITERATIONS;
  const maxIterations = options.maxIterations ?? 200_000;
  const callCost = options.callCost ?? DEFAULT_CALL_COST;
  const log = options.log ?? ((message: string) => console.log(message));
  const oddsSchema = oddsRequestSchema(maxIterations);

  const app = express();

  // Middleware
  app.use(express.json());

  // API Routes

  // Category list in rank order
  app.get('/api/categories', (req: Request, res: Response) => {
    res.json(HAND_CATEGORIES.map(category => ({
      category,
      code: HAND_CATEGORY_CODES[category],
      name: HAND_CATEGORY_NAMES[category]
    })));
  });

  // Classify 5 to 7 cards
  app.post('/api/evaluate', (req: Request, res: Response) => {
    const { cards } = evaluateRequestSchema.parse(req.body);
    const parsed = cards.map(c => Card.parse(c));
    const category = evaluate(parsed);
    res.json({
      cards: parsed.map(c => c.toString()),
      category,
      code: HAND_CATEGORY_CODES[category],
      name: HAND_CATEGORY_NAMES[category]
    });
  });

  // Distribution of final categories and EV of a call
  app.post('/api/odds', async (req: Request, res: Response, next: NextFunction) => {
    const controller = new AbortController();
    // Stop sampling for clients that went away
    res.on('close', () => {
      if (!res.writableEnded) {
        controller.abort();
      }
    });

    try {
      const body = oddsSchema.parse(req.body);
      const holeCards = body.holeCards.map(c => Card.parse(c));
      const community = body.board.map(toSlot);
      const potSize = parsePotSize(body.potSize);
      const cost = body.cost ?? callCost;

      const startTime = Date.now();
      const result = await analyzeOddsAsync(holeCards, community, {
        iterations: body.iterations ?? defaultIterations,
        rng: body.seed !== undefined ? createSeededRandom(body.seed) : undefined,
        signal: controller.signal
      });
      log(`Odds for ${body.holeCards.join(' ')}: ${result.method}, ${result.samples} samples in ${Date.now() - startTime}ms`);

      res.json(serializeOddsReport({
        holeCards,
        community,
        potSize,
        cost,
        result,
        expectedValue: computeExpectedValue(result.distribution, potSize, cost)
      }));
    } catch (error) {
      if (error instanceof ComputationAbortedError) {
        log('Odds request aborted by client');
        return;
      }
      next(error);
    }
  });

  // Health check
  app.get('/api/health', (req: Request, res: Response) => {
    res.json({ status: 'ok', timestamp: new Date().toISOString() });
  });

  // Errors: caller mistakes are 400, everything else 500
  app.use((error: unknown, req: Request, res: Response, _next: NextFunction) => {
    if (error instanceof ZodError) {
      res.status(400).json({ error: 'Invalid request', details: error.issues });
      return;
    }
    if (isPokerOddsError(error)) {
      res.status(400).json({ error: error.message, code: error.code });
      return;
    }
    if (error instanceof SyntaxError) {
      res.status(400).json({ error: 'Malformed JSON body' });
      return;
    }
    console.error('Request error:', error);
    res.status(500).json({ error: 'Internal server error' });
  });

  return app;
}
