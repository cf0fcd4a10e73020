#!/usr/bin/env tsx

import { isPokerOddsError } from '@poker-odds/core';
import { UsageError, parseArgs } from './args.js';
import { HELP_TEXT, VERSION, runEvaluate, runOdds } from './commands.js';

function printHelp(): void {
  console.log(HELP_TEXT);
}

function printVersion(): void {
  console.log(`Poker Odds CLI v${VERSION}`);
}

async function main(): Promise<void> {
  const args = process.argv.slice(2);
  const options = parseArgs(args);

  switch (options.command) {
    case 'help':
      printHelp();
      break;

    case 'version':
      printVersion();
      break;

    case 'odds':
      runOdds(options);
      break;

    case 'evaluate':
      runEvaluate(options);
      break;
  }
}

main().catch((err: unknown) => {
  const message = err instanceof Error ? err.message : String(err);
  console.error(`Error: ${message}`);
  if (err instanceof UsageError) {
    console.error('Run "poker-odds help" for usage.');
  } else if (!isPokerOddsError(err)) {
    console.error(err);
  }
  process.exit(1);
});
