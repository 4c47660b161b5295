// src/utils/cliArgs.ts
// Argument parsing and configuration for the command line driver
import { SLEEP_DELAY_ENV, SLEEP_DELAY_MS } from '@utils/constants';

export type CliArgs = {
  help?: boolean;
  interactive?: boolean;
  sleep?: boolean;
  delayMs?: string;
  print?: boolean;
  graph?: boolean;
  clear?: boolean;
  debug?: boolean;
  positional: string[];
};

export type CliConfig = {
  multiplier: number;
  multiplicand: number;
  interactive: boolean;
  delayMs: number | null;
  printSteps: boolean;
  printGraph: boolean;
  clearScreen: boolean;
  debug: boolean;
};

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

export function parseCliArgs(args: string[]): CliArgs {
  const result: CliArgs = { positional: [] };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    if (arg === '--help' || arg === '-h') {
      result.help = true;
    } else if (arg === '--interactive' || arg === '-i') {
      result.interactive = true;
    } else if (arg === '--sleep' || arg === '-s') {
      result.sleep = true;
    } else if (arg === '--delay') {
      result.delayMs = args[++i] ?? '';
    } else if (arg === '--print' || arg === '-p') {
      result.print = true;
    } else if (arg === '--graph' || arg === '-g') {
      result.graph = true;
    } else if (arg === '--clear' || arg === '-c') {
      result.clear = true;
    } else if (arg === '--debug' || arg === '-d') {
      result.debug = true;
    } else if (/^-\d/.test(arg) || !arg.startsWith('-')) {
      // Negative numbers are kept so they fail as operands, not as unknown flags
      result.positional.push(arg);
    } else {
      console.warn(`Ignoring unknown option ${arg}`);
    }
  }

  return result;
}

export function getUsageText(): string {
  return `
Usage: multiply <multiplier> <multiplicand> [options]

Multiplies two non-negative integers in unary on a three-tape Turing machine.

OPTIONS:
  -i, --interactive      Wait for Enter after each step
  -s, --sleep            Pause ${SLEEP_DELAY_MS} ms between steps (${SLEEP_DELAY_ENV} overrides)
  --delay <ms>           Pause the given number of ms between steps
  -p, --print            Print tapes and the current transition before each step
  -g, --graph            Print the state diagram with the active state marked
  -c, --clear            Clear the screen before each print
  -d, --debug            Log every fired transition
  -h, --help             Show this help message

EXAMPLES:
  multiply 2 3           # prints: Computing done: 2 x 3 = 6 in 25 steps.
  multiply 3 3 -p -s -c  # animated run
`.trim();
}

function parseOperand(name: string, raw: string | undefined): number {
  if (raw === undefined) {
    throw new UsageError(`Missing ${name}.`);
  }
  if (!/^\d+$/.test(raw)) {
    throw new UsageError(`Invalid ${name}: ${raw}`);
  }
  const value = Number(raw);
  if (!Number.isSafeInteger(value)) {
    throw new UsageError(`Invalid ${name}: ${raw}`);
  }
  return value;
}

function parseDelay(raw: string, source: string): number {
  if (!/^\d+$/.test(raw)) {
    throw new UsageError(`Invalid delay from ${source}: ${raw}`);
  }
  return Number(raw);
}

export function resolveDefaultDelay(env: NodeJS.ProcessEnv): number {
  const raw = env[SLEEP_DELAY_ENV];
  if (raw === undefined || raw === '') return SLEEP_DELAY_MS;
  return parseDelay(raw, SLEEP_DELAY_ENV);
}

export function buildConfig(args: CliArgs, env: NodeJS.ProcessEnv = {}): CliConfig {
  if (args.positional.length > 2) {
    throw new UsageError(`Unexpected argument: ${args.positional[2]}`);
  }
  const multiplier = parseOperand('multiplier', args.positional[0]);
  const multiplicand = parseOperand('multiplicand', args.positional[1]);

  let delayMs: number | null = null;
  if (args.delayMs !== undefined) {
    delayMs = parseDelay(args.delayMs, '--delay');
  } else if (args.sleep) {
    delayMs = resolveDefaultDelay(env);
  }

  return {
    multiplier,
    multiplicand,
    interactive: args.interactive ?? false,
    delayMs,
    printSteps: args.print ?? false,
    printGraph: args.graph ?? false,
    clearScreen: args.clear ?? false,
    debug: args.debug ?? false,
  };
}
