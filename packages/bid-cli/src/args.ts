import { CliUsageError } from './errors.js';

export function usageText(): string {
  return [
    'bidledger: sealed-bid commitment and ledger replay tool',
    '',
    'Usage:',
    '  bidledger commit  --amount <n> --description <text> --bidder <id>',
    '  bidledger verify  --commitment <hex> --amount <n> --description <text> --bidder <id>',
    '  bidledger replay  --input <ops.json> [--config <path>] [--strict]',
    '  bidledger explain <REASON_CODE>',
    '  bidledger version',
    '',
    'Exit codes:',
    '  0 = PASS',
    '  1 = FAIL (commitment mismatch, or a rejected operation under --strict)',
    '  2 = USAGE/CONFIG/INPUT error',
    '',
    'Examples:',
    '  bidledger commit --amount 1000 --description "Rebuild school" --bidder bidder1',
    '  bidledger replay --input tender-42.json --strict',
    '  bidledger explain INVALID_REVEAL',
  ].join('\n');
}

function readFlag(args: string[], name: string): string | undefined {
  const idx = args.indexOf(name);
  if (idx === -1) return undefined;
  const value = args[idx + 1];
  if (value === undefined || value.startsWith('--')) return undefined;
  return value;
}

function requireFlag(args: string[], name: string, placeholder: string): string {
  const value = readFlag(args, name);
  if (value === undefined) {
    throw new CliUsageError(`Missing required flag: ${name} <${placeholder}>\n\nRun: bidledger --help`);
  }
  return value;
}

function hasFlag(args: string[], name: string): boolean {
  return args.includes(name);
}

export interface BidContentArgs {
  amount: string;
  description: string;
  bidder: string;
}

export type ParsedArgs =
  | { command: 'commit'; content: BidContentArgs }
  | { command: 'verify'; content: BidContentArgs; commitmentHex: string }
  | { command: 'replay'; inputPath: string; configPath?: string; strict: boolean }
  | { command: 'explain'; code: string }
  | { command: 'version' };

function readContent(argv: string[]): BidContentArgs {
  return {
    amount: requireFlag(argv, '--amount', 'n'),
    // An empty description is legal, so `--description ""` must be accepted.
    description: requireFlag(argv, '--description', 'text'),
    bidder: requireFlag(argv, '--bidder', 'id'),
  };
}

export function parseCliArgs(argv: string[]): ParsedArgs {
  if (argv.length === 0 || hasFlag(argv, '--help') || hasFlag(argv, '-h')) {
    throw new CliUsageError(usageText());
  }

  if (argv[0] === 'version' || hasFlag(argv, '--version')) {
    return { command: 'version' };
  }

  if (argv[0] === 'explain') {
    const code = argv[1];
    if (!code) throw new CliUsageError('Usage: bidledger explain <REASON_CODE>');
    return { command: 'explain', code: code.toUpperCase() };
  }

  if (argv[0] === 'commit') {
    return { command: 'commit', content: readContent(argv) };
  }

  if (argv[0] === 'verify') {
    return {
      command: 'verify',
      content: readContent(argv),
      commitmentHex: requireFlag(argv, '--commitment', 'hex'),
    };
  }

  if (argv[0] === 'replay') {
    return {
      command: 'replay',
      inputPath: requireFlag(argv, '--input', 'path'),
      configPath: readFlag(argv, '--config'),
      strict: hasFlag(argv, '--strict'),
    };
  }

  throw new CliUsageError(usageText());
}
