import * as fs from 'fs';
import * as path from 'path';
import {
  Card,
  HAND_CATEGORY_NAMES,
  HandCategory,
  OddsReport,
  buildOddsReport,
  createSeededRandom,
  evaluate,
  formatReportTable,
  generateHTMLReport,
  parsePotSize,
  serializeOddsReport
} from '@poker-odds/core';
import { CLIOptions, UsageError } from './args.js';

export const VERSION = '1.0.0';

/**
 * Where commands write. Tests pass an in-memory implementation.
 */
export interface CommandOutput {
  log(line: string): void;
  progress(text: string): void;
  writeFile(filePath: string, content: string): void;
}

export const consoleOutput: CommandOutput = {
  log: line => console.log(line),
  progress: text => {
    process.stdout.write(text);
  },
  writeFile: (filePath, content) => {
    const dir = path.dirname(filePath);
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true });
    }
    fs.writeFileSync(filePath, content, 'utf-8');
  }
};

export const HELP_TEXT = `
Poker Odds CLI v${VERSION}

USAGE:
  poker-odds <command> [options]

COMMANDS:
  odds             Distribution of final hands and EV of a call
  evaluate, eval   Classify 5 to 7 cards
  help             Show this help message

OPTIONS:
  -c, --hole <cards>       Your two cards, e.g. "As Ks"
  -b, --board <cards>      Community cards; "?" marks an unrevealed slot, e.g. "Qs Js ? ? ?"
  -p, --pot <amount>       Pot size (non-numeric input counts as 0)
  --cost <amount>          Price of the call (default: 20)
  -i, --iterations <n>     Monte Carlo trials with 3+ unknown cards (default: 10000)
  -s, --seed <n>           Random seed for reproducibility
  -f, --format <format>    Output format: table, json, html (default: table)
  -o, --output <file>      Write json/html output to a file

EXAMPLES:
  # Flop with two cards to come (exact enumeration)
  poker-odds odds --hole "As Ks" --board "Qs Js 2c" --pot 100

  # Preflop, seeded Monte Carlo, JSON
  poker-odds odds --hole "9d 9c" --pot 40 -i 50000 -s 7 -f json

  # HTML report
  poker-odds odds --hole "Ah 5h" --board "4h 3c 9h ? ?" --pot 60 -f html -o report.html

  # Classify a hand
  poker-odds evaluate As Ks Qs Js Ts
`;

/**
 * Run the odds command and emit the report in the requested format.
 */
export function runOdds(options: CLIOptions, out: CommandOutput = consoleOutput): OddsReport {
  if (!options.hole) {
    throw new UsageError('--hole is required for the odds command');
  }

  const holeCards = Card.parseMany(options.hole);
  const community = options.board ? Card.parseSlots(options.board) : [];
  const potSize = parsePotSize(options.pot);

  const report = buildOddsReport(holeCards, community, potSize, {
    cost: options.cost,
    iterations: options.iterations,
    rng: options.seed !== undefined ? createSeededRandom(options.seed) : undefined,
    onProgress: options.format === 'table'
      ? (completed, total) => {
          const pct = ((completed / total) * 100).toFixed(1);
          out.progress(`\r  Progress: ${pct}% (${completed.toLocaleString('en-US')}/${total.toLocaleString('en-US')})`);
        }
      : undefined
  });

  switch (options.format) {
    case 'table':
      if (report.result.method === 'monte-carlo') {
        out.progress('\r');
      }
      formatReportTable(report).forEach(line => out.log(line));
      break;

    case 'json': {
      const json = JSON.stringify(serializeOddsReport(report), null, 2);
      if (options.output) {
        out.writeFile(options.output, json);
        out.log(`Results saved to: ${options.output}`);
      } else {
        out.log(json);
      }
      break;
    }

    case 'html': {
      const html = generateHTMLReport(report);
      if (options.output) {
        out.writeFile(options.output, html);
        out.log(`HTML report saved to: ${options.output}`);
      } else {
        out.log(html);
      }
      break;
    }
  }

  return report;
}

/**
 * Classify the positional cards.
 */
export function runEvaluate(options: CLIOptions, out: CommandOutput = consoleOutput): HandCategory {
  const cards = Card.parseMany(options.cards.join(' '));
  const category = evaluate(cards);

  if (options.format === 'json') {
    out.log(JSON.stringify({ cards: cards.map(c => c.toString()), category, name: HAND_CATEGORY_NAMES[category] }));
  } else {
    out.log(HAND_CATEGORY_NAMES[category]);
  }
  return category;
}
