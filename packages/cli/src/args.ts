import { DEFAULT_CALL_COST, DEFAULT_ITERATIONS } from '@poker-odds/core';

export type Command = 'odds' | 'evaluate' | 'help' | 'version';
export type OutputFormat = 'table' | 'json' | 'html';

export const OUTPUT_FORMATS: readonly OutputFormat[] = ['table', 'json', 'html'];

export interface CLIOptions {
  command: Command;
  hole?: string;
  board?: string;
  /** Raw pot text; coerced with parsePotSize */
  pot: string;
  cost: number;
  iterations: number;
  format: OutputFormat;
  output?: string;
  seed?: number;
  /** Positional card notation (evaluate) */
  cards: string[];
}

/** Bad command line; printed without a stack trace */
export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

function requireValue(args: string[], index: number, flag: string): string {
  const value = args[index];
  if (value === undefined) {
    throw new UsageError(`Missing value for ${flag}`);
  }
  return value;
}

const INTEGER_PATTERN = /^-?\d+$/;
const DECIMAL_PATTERN = /^(\d+(\.\d*)?|\.\d+)$/;

function parseInteger(value: string, flag: string): number {
  if (!INTEGER_PATTERN.test(value)) {
    throw new UsageError(`Invalid value for ${flag}: ${value}`);
  }
  return Number(value);
}

function parsePositiveInteger(value: string, flag: string): number {
  const parsed = parseInteger(value, flag);
  if (parsed <= 0) {
    throw new UsageError(`Invalid value for ${flag}: ${value}`);
  }
  return parsed;
}

/** Non-negative decimal */
function parseAmount(value: string, flag: string): number {
  if (!DECIMAL_PATTERN.test(value)) {
    throw new UsageError(`Invalid value for ${flag}: ${value}`);
  }
  return Number(value);
}

function toFormat(value: string): OutputFormat {
  const format = OUTPUT_FORMATS.find(f => f === value);
  if (!format) {
    throw new UsageError(`Invalid format: ${value}. Supported: ${OUTPUT_FORMATS.join(', ')}`);
  }
  return format;
}

export function parseArgs(args: string[]): CLIOptions {
  const options: CLIOptions = {
    command: 'help',
    pot: '0',
    cost: DEFAULT_CALL_COST,
    iterations: DEFAULT_ITERATIONS,
    format: 'table',
    cards: []
  };

  let i = 0;
  while (i < args.length) {
    const arg = args[i];

    switch (arg) {
      case 'odds':
        options.command = 'odds';
        break;

      case 'evaluate':
      case 'eval':
        options.command = 'evaluate';
        break;

      case 'help':
      case '--help':
      case '-h':
        options.command = 'help';
        break;

      case '--version':
      case '-v':
        options.command = 'version';
        break;

      case '--hole':
      case '-c':
        i++;
        options.hole = requireValue(args, i, arg);
        break;

      case '--board':
      case '-b':
        i++;
        options.board = requireValue(args, i, arg);
        break;

      case '--pot':
      case '-p':
        i++;
        options.pot = requireValue(args, i, arg);
        break;

      case '--cost':
        i++;
        options.cost = parseAmount(requireValue(args, i, arg), arg);
        break;

      case '--iterations':
      case '-i':
        i++;
        options.iterations = parsePositiveInteger(requireValue(args, i, arg), arg);
        break;

      case '--seed':
      case '-s':
        i++;
        options.seed = parseInteger(requireValue(args, i, arg), arg);
        break;

      case '--format':
      case '-f':
        i++;
        options.format = toFormat(requireValue(args, i, arg));
        break;

      case '--output':
      case '-o':
        i++;
        options.output = requireValue(args, i, arg);
        break;

      default:
        if (arg.startsWith('-') && arg.length > 1) {
          throw new UsageError(`Unknown option: ${arg}`);
        }
        options.cards.push(arg);
    }

    i++;
  }

  return options;
}
