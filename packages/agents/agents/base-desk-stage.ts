// Base desk stage: render a prompt from the read view, ask the reasoner, turn the reply into writes
// All desk roles extend this class

import type { Context, ContextUpdate, DebateRecord } from '../types/context.js';
import type { Reasoner } from '../types/reasoner.js';
import type { Stage, StageRunOptions } from '../types/stages.js';
import { ROLE_DESCRIPTIONS, ROLE_INSTRUCTIONS, type DeskRole } from '../config/desk-roles.js';

export interface DeskStageOptions {
  reasoner: Reasoner;
  /** Overrides the role name, e.g. 'bull-researcher-r2' for a later debate round */
  name?: string;
  timeoutMs?: number;
}

export interface DeskStageContract {
  reads: readonly string[];
  optionalReads?: readonly string[];
  writes: readonly string[];
}

export abstract class BaseDeskStage implements Stage {
  readonly name: string;
  readonly role: DeskRole;
  readonly description: string;
  readonly reads: readonly string[];
  readonly optionalReads: readonly string[];
  readonly writes: readonly string[];
  readonly timeoutMs?: number;
  private readonly reasoner: Reasoner;

  constructor(role: DeskRole, contract: DeskStageContract, options: DeskStageOptions) {
    this.role = role;
    this.name = options.name ?? role;
    this.description = ROLE_DESCRIPTIONS[role];
    this.reads = Object.freeze([...contract.reads]);
    this.optionalReads = Object.freeze([...(contract.optionalReads ?? [])]);
    this.writes = Object.freeze([...contract.writes]);
    this.timeoutMs = options.timeoutMs;
    this.reasoner = options.reasoner;
  }

  async execute(view: Context, options: StageRunOptions): Promise<ContextUpdate> {
    const reply = await this.reasoner({
      role: this.role,
      instructions: ROLE_INSTRUCTIONS[this.role],
      prompt: this.buildPrompt(view),
      signal: options.signal,
    });

    const text = typeof reply === 'string' ? reply.trim() : '';
    if (!text) {
      throw new Error(`${this.name}: reasoner returned an empty reply`);
    }
    return this.interpret(text, view);
  }

  protected abstract buildPrompt(view: Context): string;

  protected abstract interpret(reply: string, view: Context): ContextUpdate;

  /** Titled prompt sections for the given fields; absent fields are skipped */
  protected sections(view: Context, fields: ReadonlyArray<readonly [title: string, field: string]>): string {
    const parts: string[] = [];
    for (const [title, field] of fields) {
      if (!Object.prototype.hasOwnProperty.call(view, field)) continue;
      parts.push(`## ${title}\n${formatValue(view[field])}`);
    }
    return parts.join('\n\n');
  }
}

export function isDebateRecord(value: unknown): value is DebateRecord {
  return Array.isArray(value) && value.every(entry =>
    typeof entry === 'object' && entry !== null
    && typeof Reflect.get(entry, 'role') === 'string'
    && typeof Reflect.get(entry, 'argument') === 'string');
}

export function formatValue(value: unknown): string {
  if (typeof value === 'string') return value;
  if (isDebateRecord(value)) {
    return value.map(entry => `${entry.role}: ${entry.argument}`).join('\n\n');
  }
  return JSON.stringify(value, null, 2) ?? String(value);
}
