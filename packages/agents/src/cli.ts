#!/usr/bin/env node
// Trading desk CLI
//
// Usage:
//   desk run AAPL                        # one pipeline run, decision to stdout
//   desk run AAPL --rounds 2 --json      # two bull/bear rounds, JSON output
//   desk batch AAPL MSFT NVDA            # several instruments, comparative table
//   desk roles                           # list desk roles
//   desk --help                          # usage

import 'dotenv/config';
import { createReasonerBridge } from '../bridge/mcp-client.js';
import { loadDeskSettings } from '../config/env.js';
import { ROLE_DESCRIPTIONS } from '../config/desk-roles.js';
import { TradingPipeline, type PipelineConfig, type RunResult } from '../orchestrator/coordinator.js';
import { createTradingDesk } from '../orchestrator/desk-factory.js';
import { BatchRunner } from '../orchestrator/batch-runner.js';
import { ConfigurationError } from '../kernel/errors.js';
import { createLogger } from '../utils/logger.js';
import { parseArgs, UsageError, type ParsedArgs } from './args.js';

// ── ANSI helpers (no chalk dependency) ──────────────────────────────

const isTTY = process.stdout.isTTY ?? false;

const ansi = {
  reset: isTTY ? '\x1b[0m' : '',
  bold: isTTY ? '\x1b[1m' : '',
  dim: isTTY ? '\x1b[2m' : '',
  cyan: isTTY ? '\x1b[36m' : '',
  green: isTTY ? '\x1b[32m' : '',
  yellow: isTTY ? '\x1b[33m' : '',
  red: isTTY ? '\x1b[31m' : '',
};

function c(color: keyof typeof ansi, text: string): string {
  return `${ansi[color]}${text}${ansi.reset}`;
}

const ACTION_COLORS = { BUY: 'green', HOLD: 'yellow', SELL: 'red' } as const;

// ── CLI class ───────────────────────────────────────────────────────

class DeskCli {
  async start(argv: string[]): Promise<number> {
    let args: ParsedArgs;
    try {
      args = parseArgs(argv);
    } catch (err) {
      if (!(err instanceof UsageError)) throw err;
      console.error(`  ${c('red', 'Error:')} ${err.message}\n`);
      this.printHelp();
      return 1;
    }

    switch (args.command) {
      case 'help':
        this.printHelp();
        return 0;
      case 'roles':
        this.listRoles();
        return 0;
      case 'run':
      case 'batch':
        return this.withDesk(args, config => args.command === 'run'
          ? this.runOne(config, args.instruments[0], args.json)
          : this.runBatch(config, args));
    }
  }

  // ── Pipeline wiring ─────────────────────────────────────────────

  private async withDesk(args: ParsedArgs, body: (config: PipelineConfig) => Promise<number>): Promise<number> {
    const settings = loadDeskSettings(process.env, args.overrides);
    const serverPath = settings.mcpServer;
    if (!serverPath) {
      throw new ConfigurationError('DESK_MCP_SERVER (or --server) must point at the completion MCP server');
    }

    process.stderr.write(`  ${c('dim', 'Connecting to MCP server...')}\n`);
    const { reasoner, bridge } = await createReasonerBridge(
      { serverPath, command: settings.mcpCommand },
      settings.mcpTool,
    );

    try {
      return await body(createTradingDesk({
        reasoner,
        debateRounds: settings.debateRounds,
        maxAttempts: settings.maxAttempts,
        stageTimeoutMs: settings.stageTimeoutMs,
        logger: createLogger('Desk', { level: args.json ? 'warn' : 'info' }),
        onEvent: (event) => this.progress(event.type, event.payload),
      }));
    } finally {
      await bridge.disconnect();
    }
  }

  private progress(type: string, payload: unknown): void {
    if (type !== 'StageSucceeded' && type !== 'RevisionRequested') return;
    const stage = typeof payload === 'object' && payload !== null ? Reflect.get(payload, 'stage') : undefined;
    const label = type === 'RevisionRequested' ? c('yellow', 'revision requested') : c('dim', String(stage));
    process.stderr.write(`    ${c('dim', '●')} ${label}\n`);
  }

  // ── Subcommand: run ─────────────────────────────────────────────

  private async runOne(config: PipelineConfig, instrument: string, json: boolean): Promise<number> {
    const result = await new TradingPipeline(config).run(instrument);
    if (json) {
      console.log(JSON.stringify(toJson(result), null, 2));
    } else {
      this.printResult(instrument, result);
    }
    return result.ok ? 0 : 1;
  }

  private printResult(instrument: string, result: RunResult): void {
    if (!result.ok) {
      console.error(`\n  ${c('red', 'Run failed')} ${c('dim', `(${result.error.phase})`)}: ${result.error.message}\n`);
      return;
    }
    const { decision } = result;
    const status = decision.status === 'accepted' ? c('green', 'accepted') : c('yellow', 'unverified');
    console.log(`\n  ${c('bold', instrument)}  ${c(ACTION_COLORS[decision.action], decision.action)}`
      + `  ${c('dim', `confidence ${decision.confidence.toFixed(2)} | ${status} | attempts ${decision.attempts}`)}\n`);
    console.log(decision.rationale);
    console.log();
  }

  // ── Subcommand: batch ───────────────────────────────────────────

  private async runBatch(config: PipelineConfig, args: ParsedArgs): Promise<number> {
    const concurrency = args.concurrency === undefined ? undefined : Number(args.concurrency);
    const runner = new BatchRunner(new TradingPipeline(config));
    const batch = await runner.run(args.instruments, {
      concurrency,
      onProgress: (p) => {
        if (p.status !== 'running') {
          process.stderr.write(`  ${c('dim', `[${p.completed}/${p.total}]`)} ${p.current} ${p.status}\n`);
        }
      },
    });

    if (args.json) {
      console.log(JSON.stringify(batch, null, 2));
    } else {
      console.log(`\n${batch.comparative}`);
    }
    return batch.instruments.every(r => r.decision !== undefined) ? 0 : 1;
  }

  // ── Subcommand: roles ───────────────────────────────────────────

  private listRoles(): void {
    console.log(`\n  ${c('bold', 'Desk roles')}\n`);
    for (const [role, description] of Object.entries(ROLE_DESCRIPTIONS)) {
      console.log(`    ${c('cyan', role.padEnd(28, ' '))} ${c('dim', description)}`);
    }
    console.log();
  }

  // ── Help screen ─────────────────────────────────────────────────

  printHelp(): void {
    console.log(`
  ${c('bold', 'Trading desk')}: multi-role BUY/HOLD/SELL decisions

  ${c('bold', 'Usage:')}
    desk run <TICKER> [options]       Run the desk for one instrument
    desk batch <TICKER...> [options]  Run several instruments
    desk roles                        List desk roles
    desk --help                       Show this help

  ${c('bold', 'Options:')}
    --rounds <n>          Bull/bear debate rounds (DESK_DEBATE_ROUNDS, default 1)
    --max-attempts <n>    Trader attempts under reflection (DESK_MAX_ATTEMPTS, default 3)
    --timeout <ms>        Per-stage timeout (DESK_STAGE_TIMEOUT_MS, default 120000)
    --server <path>       Completion MCP server entry (DESK_MCP_SERVER)
    --tool <name>         Completion tool name (DESK_MCP_TOOL, default complete)
    --concurrency <n>     Parallel runs for batch (default 3)
    --json                Machine-readable output
`);
  }
}

function toJson(result: RunResult): unknown {
  if (result.ok) return { ok: true, decision: result.decision };
  return {
    ok: false,
    error: { message: result.error.message, phase: result.error.phase, stages: result.error.stages },
  };
}

// ── Entry point ─────────────────────────────────────────────────────

const cli = new DeskCli();
cli.start(process.argv.slice(2)).then((code) => {
  process.exitCode = code;
}, (err: unknown) => {
  console.error(`${c('red', 'Fatal:')} ${err instanceof Error ? err.message : String(err)}`);
  process.exit(1);
});
