// Command-line parsing for the desk CLI
// Numeric flags are kept as strings and validated together with the environment

import type { DeskEnvKey } from '../config/env.js';

export type DeskCommand = 'run' | 'batch' | 'roles' | 'help';

export interface ParsedArgs {
  command: DeskCommand;
  instruments: string[];
  overrides: Partial<Record<DeskEnvKey, string>>;
  json: boolean;
  concurrency?: string;
}

const VALUE_FLAGS = new Map<string, DeskEnvKey>([
  ['--rounds', 'DESK_DEBATE_ROUNDS'],
  ['--max-attempts', 'DESK_MAX_ATTEMPTS'],
  ['--timeout', 'DESK_STAGE_TIMEOUT_MS'],
  ['--server', 'DESK_MCP_SERVER'],
  ['--tool', 'DESK_MCP_TOOL'],
]);

const COMMANDS = new Map<string, DeskCommand>([['run', 'run'], ['batch', 'batch'], ['roles', 'roles'], ['help', 'help']]);

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

export function parseArgs(argv: readonly string[]): ParsedArgs {
  const parsed: ParsedArgs = { command: 'help', instruments: [], overrides: {}, json: false };
  if (argv.length === 0) return parsed;

  const [first, ...rest] = argv;
  if (first === '--help' || first === '-h') return parsed;

  const command = COMMANDS.get(first);
  if (!command) throw new UsageError(`Unknown command: ${first}`);
  parsed.command = command;

  for (let i = 0; i < rest.length; i++) {
    const arg = rest[i];
    if (arg === '--help' || arg === '-h') {
      return { ...parsed, command: 'help' };
    }
    if (arg === '--json') {
      parsed.json = true;
      continue;
    }

    const key = VALUE_FLAGS.get(arg);
    if (key !== undefined || arg === '--concurrency') {
      const value = rest[i + 1];
      if (value === undefined || value.startsWith('--')) {
        throw new UsageError(`${arg} needs a value`);
      }
      i++;
      if (key !== undefined) parsed.overrides[key] = value;
      else parsed.concurrency = value;
      continue;
    }

    if (arg.startsWith('--')) throw new UsageError(`Unknown option: ${arg}`);
    parsed.instruments.push(arg.toUpperCase());
  }

  if (parsed.command === 'run' && parsed.instruments.length !== 1) {
    throw new UsageError('desk run takes exactly one instrument');
  }
  if (parsed.command === 'batch' && parsed.instruments.length === 0) {
    throw new UsageError('desk batch needs at least one instrument');
  }
  return parsed;
}
