// MCP client bridge: lets desk stages reason through a completion tool on an MCP server
// The server is launched over stdio; the desk only sees a Reasoner

import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { StdioClientTransport } from '@modelcontextprotocol/sdk/client/stdio.js';
import { z } from 'zod';
import type { Reasoner } from '../types/reasoner.js';

export const DEFAULT_COMPLETION_TOOL = 'complete';

export interface McpBridgeConfig {
  /** Path to the MCP server entry point */
  serverPath: string;
  /** Command to launch the server (default: 'node') */
  command?: string;
  /** Extra arguments after the server path */
  args?: string[];
  env?: Record<string, string>;
}

export interface ToolCallOptions {
  signal?: AbortSignal;
}

/** Anything that can call a named tool; McpBridge in production, a fake in tests */
export interface ToolCaller {
  callTool(toolName: string, params: Record<string, unknown>, options?: ToolCallOptions): Promise<unknown>;
}

export class McpBridge implements ToolCaller {
  private client: Client;
  private transport: StdioClientTransport | null = null;
  private connected = false;

  constructor() {
    this.client = new Client(
      { name: 'trading-desk', version: '1.0.0' },
      { capabilities: {} },
    );
  }

  async connect(config: McpBridgeConfig): Promise<void> {
    if (this.connected) return;

    this.transport = new StdioClientTransport({
      command: config.command ?? 'node',
      args: [config.serverPath, ...(config.args ?? [])],
      env: config.env,
    });

    await this.client.connect(this.transport);
    this.connected = true;
  }

  async disconnect(): Promise<void> {
    if (!this.connected) return;
    await this.client.close();
    this.transport = null;
    this.connected = false;
  }

  /** List all available tools from the MCP server */
  async listTools(): Promise<Array<{ name: string; description?: string }>> {
    if (!this.connected) throw new Error('MCP bridge not connected');
    const result = await this.client.listTools();
    return result.tools.map(t => ({ name: t.name, description: t.description }));
  }

  /** Returns the raw tool result; see extractToolText */
  async callTool(toolName: string, params: Record<string, unknown>, options: ToolCallOptions = {}): Promise<unknown> {
    if (!this.connected) throw new Error('MCP bridge not connected');
    return this.client.callTool({ name: toolName, arguments: params }, undefined, { signal: options.signal });
  }

  get isConnected(): boolean {
    return this.connected;
  }
}

const toolResultSchema = z.object({
  content: z.array(z.object({ type: z.string(), text: z.string().optional() })).default([]),
  isError: z.boolean().optional(),
});

/** Joins the text parts of an MCP tool result; an error result throws */
export function extractToolText(toolName: string, result: unknown): string {
  if (typeof result === 'string') return result;

  const parsed = toolResultSchema.safeParse(result);
  if (!parsed.success) {
    throw new Error(`Tool ${toolName} returned an unrecognised result`);
  }

  const text = parsed.data.content
    .filter(part => part.type === 'text' && part.text !== undefined)
    .map(part => part.text ?? '')
    .join('\n');

  if (parsed.data.isError) {
    throw new Error(`Tool ${toolName} failed: ${text || 'no details'}`);
  }
  return text;
}

/**
 * Reasoner backed by a completion tool. The tool receives
 * `{ role, instructions, prompt }` and answers with text content.
 */
export function createMcpReasoner(caller: ToolCaller, toolName = DEFAULT_COMPLETION_TOOL): Reasoner {
  return async ({ role, instructions, prompt, signal }) => {
    const result = await caller.callTool(toolName, { role, instructions, prompt }, { signal });
    return extractToolText(toolName, result);
  };
}

/** Connects a bridge and wraps it as a Reasoner. The caller owns disconnect. */
export async function createReasonerBridge(config: McpBridgeConfig, toolName?: string): Promise<{
  reasoner: Reasoner;
  bridge: McpBridge;
}> {
  const bridge = new McpBridge();
  await bridge.connect(config);
  return { reasoner: createMcpReasoner(bridge, toolName), bridge };
}
