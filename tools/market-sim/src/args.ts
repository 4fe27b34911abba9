export interface SimulationArgs {
  readonly days: number;
  readonly seed: number;
  readonly consumers: number;
  readonly tierId: string;
  readonly qualityId: string;
  readonly price: number;
  readonly balance: number;
}

export type ParseResult =
  | { readonly kind: 'run'; readonly args: SimulationArgs }
  | { readonly kind: 'help' }
  | { readonly kind: 'error'; readonly message: string };

export const DEFAULT_SEED = 4242;

export const USAGE =
  `Usage: market-sim --days <n> [options]\n\n` +
  `Options:\n` +
  `  --days <n>        Days to simulate (required)\n` +
  `  --seed <n>        Random seed (default: ${DEFAULT_SEED})\n` +
  `  --consumers <n>   Consumers submitting one search each (default: 1)\n` +
  `  --tier <id>       Search tier id (default: regional)\n` +
  `  --quality <id>    Quality tier id (default: any)\n` +
  `  --price <n>       Base price of the searched item (default: 50000)\n` +
  `  --balance <n>     Starting balance per consumer (default: 1000000)\n` +
  `  -h, --help        Show this help text\n`;

const KNOWN_FLAGS: ReadonlySet<string> = new Set([
  '--days',
  '--seed',
  '--consumers',
  '--tier',
  '--quality',
  '--price',
  '--balance',
]);

function parseCount(flag: string, value: string): number | string {
  const parsed = Number(value);
  return Number.isInteger(parsed) && parsed >= 0
    ? parsed
    : `${flag} <n> must be a non-negative integer`;
}

function parseAmount(flag: string, value: string): number | string {
  const parsed = Number(value);
  return Number.isFinite(parsed) && parsed >= 0
    ? parsed
    : `${flag} <n> must be a non-negative number`;
}

/**
 * Parses CLI flags. Never exits; the entry point maps `help` and `error` to
 * exit codes.
 */
export function parseArgs(argv: readonly string[]): ParseResult {
  let days: number | undefined;
  let seed = DEFAULT_SEED;
  let consumers = 1;
  let tierId = 'regional';
  let qualityId = 'any';
  let price = 50_000;
  let balance = 1_000_000;

  for (let index = 0; index < argv.length; index += 1) {
    const flag = argv[index] ?? '';
    if (flag === '--help' || flag === '-h') {
      return { kind: 'help' };
    }
    if (!KNOWN_FLAGS.has(flag)) {
      return { kind: 'error', message: `Unknown option ${flag}` };
    }
    index += 1;
    const value = argv[index];
    if (value === undefined) {
      return { kind: 'error', message: `${flag} requires a value` };
    }

    if (flag === '--tier') {
      tierId = value;
      continue;
    }
    if (flag === '--quality') {
      qualityId = value;
      continue;
    }

    const parsed =
      flag === '--price' || flag === '--balance'
        ? parseAmount(flag, value)
        : parseCount(flag, value);
    if (typeof parsed === 'string') {
      return { kind: 'error', message: parsed };
    }
    if (flag === '--days') {
      days = parsed;
    } else if (flag === '--seed') {
      seed = parsed;
    } else if (flag === '--consumers') {
      consumers = parsed;
    } else if (flag === '--price') {
      price = parsed;
    } else {
      balance = parsed;
    }
  }

  if (days === undefined || days === 0) {
    return { kind: 'error', message: '--days <n> must be a positive integer' };
  }
  if (consumers === 0) {
    return { kind: 'error', message: '--consumers <n> must be a positive integer' };
  }

  return { kind: 'run', args: { days, seed, consumers, tierId, qualityId, price, balance } };
}
