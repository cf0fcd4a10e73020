import { config } from 'dotenv';
import { z } from 'zod';
import { DEFAULT_CALL_COST, DEFAULT_ITERATIONS } from '@poker-odds/core';

const envSchema = z.object({
  PORT: z.coerce.number().int().positive().default(3000),
  DEFAULT_ITERATIONS: z.coerce.number().int().positive().default(DEFAULT_ITERATIONS),
  MAX_ITERATIONS: z.coerce.number().int().positive().default(200_000),
  CALL_COST: z.coerce.number().nonnegative().default(DEFAULT_CALL_COST),
}).refine(env => env.DEFAULT_ITERATIONS <= env.MAX_ITERATIONS, {
  message: 'DEFAULT_ITERATIONS must not exceed MAX_ITERATIONS',
  path: ['DEFAULT_ITERATIONS'],
});

export type Env = z.infer<typeof envSchema>;

export function parseEnv(source: NodeJS.ProcessEnv) {
  return envSchema.safeParse(source);
}

export function loadEnv(): Env {
  // Load .env file
  config();

  const result = parseEnv(process.env);

  if (!result.success) {
    console.error('Invalid environment variables:');
    console.error(result.error.format());
    process.exit(1);
  }

  return result.data;
}
