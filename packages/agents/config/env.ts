// Desk settings from DESK_* environment variables, with command-line overrides on top
// Only the CLI calls this; the library takes every setting as an argument

import { z } from 'zod';
import { MAX_TIMEOUT_MS } from '../kernel/composition.js';
import { ConfigurationError } from '../kernel/errors.js';

const unsetIfBlank = (value: unknown): unknown =>
  typeof value === 'string' && value.trim() === '' ? undefined : value;

const text = (fallback: string) => z.preprocess(unsetIfBlank, z.string().default(fallback));
const count = (fallback: number, max = Number.MAX_SAFE_INTEGER) =>
  z.preprocess(unsetIfBlank, z.coerce.number().int().positive().max(max).default(fallback));

const envSchema = z.object({
  DESK_MCP_SERVER: z.preprocess(unsetIfBlank, z.string().optional()),
  DESK_MCP_COMMAND: text('node'),
  DESK_MCP_TOOL: text('complete'),
  DESK_MAX_ATTEMPTS: count(3),
  DESK_STAGE_TIMEOUT_MS: count(120_000, MAX_TIMEOUT_MS),
  DESK_DEBATE_ROUNDS: count(1),
});

export type DeskEnvKey = keyof z.input<typeof envSchema>;

export interface DeskSettings {
  mcpServer?: string;
  mcpCommand: string;
  mcpTool: string;
  maxAttempts: number;
  stageTimeoutMs: number;
  debateRounds: number;
}

export function loadDeskSettings(
  env: Readonly<Record<string, string | undefined>> = process.env,
  overrides: Partial<Record<DeskEnvKey, string>> = {},
): DeskSettings {
  const parsed = envSchema.safeParse({ ...pick(env), ...overrides });
  if (!parsed.success) {
    const issues = parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`);
    throw new ConfigurationError(`Invalid desk settings (${issues.join('; ')})`);
  }

  const s = parsed.data;
  return {
    mcpServer: s.DESK_MCP_SERVER,
    mcpCommand: s.DESK_MCP_COMMAND,
    mcpTool: s.DESK_MCP_TOOL,
    maxAttempts: s.DESK_MAX_ATTEMPTS,
    stageTimeoutMs: s.DESK_STAGE_TIMEOUT_MS,
    debateRounds: s.DESK_DEBATE_ROUNDS,
  };
}

function pick(env: Readonly<Record<string, string | undefined>>): Partial<Record<DeskEnvKey, string>> {
  const out: Partial<Record<DeskEnvKey, string>> = {};
  for (const key of envSchema.keyof().options) {
    const value = env[key];
    if (value !== undefined) out[key] = value;
  }
  return out;
}
