// Tests for the MCP reasoner bridge, with a fake tool caller in place of a server

import { describe, it, expect, vi } from 'vitest';
import { McpBridge, createMcpReasoner, extractToolText, type ToolCaller } from '../bridge/mcp-client.js';

describe('extractToolText', () => {
  it('joins the text parts of a tool result', () => {
    const result = {
      content: [
        { type: 'text', text: 'BUY' },
        { type: 'image', data: 'aGk=', mimeType: 'image/png' },
        { type: 'text', text: 'Confidence: 0.7' },
      ],
    };
    expect(extractToolText('complete', result)).toBe('BUY\nConfidence: 0.7');
  });

  it('passes plain strings through', () => {
    expect(extractToolText('complete', 'HOLD')).toBe('HOLD');
  });

  it('throws on an error result', () => {
    const result = { content: [{ type: 'text', text: 'model overloaded' }], isError: true };
    expect(() => extractToolText('complete', result)).toThrow('Tool complete failed: model overloaded');
  });

  it('throws on a result it cannot read', () => {
    expect(() => extractToolText('complete', 42)).toThrow('Tool complete returned an unrecognised result');
  });
});

describe('createMcpReasoner', () => {
  it('calls the completion tool with role, instructions and prompt', async () => {
    const caller: ToolCaller = {
      callTool: vi.fn().mockResolvedValue({ content: [{ type: 'text', text: 'Bull wins' }] }),
    };
    const signal = new AbortController().signal;

    const reply = await createMcpReasoner(caller)({
      role: 'debate-judge',
      instructions: 'Pick a side',
      prompt: 'transcript',
      signal,
    });

    expect(reply).toBe('Bull wins');
    expect(caller.callTool).toHaveBeenCalledWith(
      'complete',
      { role: 'debate-judge', instructions: 'Pick a side', prompt: 'transcript' },
      { signal },
    );
  });

  it('uses a custom tool name', async () => {
    const caller: ToolCaller = { callTool: vi.fn().mockResolvedValue('ok') };
    await createMcpReasoner(caller, 'llm_complete')({
      role: 'trader', instructions: '', prompt: '', signal: new AbortController().signal,
    });
    expect(caller.callTool).toHaveBeenCalledWith('llm_complete', expect.any(Object), expect.any(Object));
  });

  it('propagates a failing tool call', async () => {
    const caller: ToolCaller = { callTool: vi.fn().mockRejectedValue(new Error('server exited')) };
    const reasoner = createMcpReasoner(caller);

    await expect(reasoner({ role: 'trader', instructions: '', prompt: '', signal: new AbortController().signal }))
      .rejects.toThrow('server exited');
  });
});

describe('McpBridge', () => {
  it('refuses calls before connect', async () => {
    const bridge = new McpBridge();

    expect(bridge.isConnected).toBe(false);
    await expect(bridge.listTools()).rejects.toThrow('MCP bridge not connected');
    await expect(bridge.callTool('complete', {})).rejects.toThrow('MCP bridge not connected');
  });

  it('treats disconnect without a connection as a no-op', async () => {
    await expect(new McpBridge().disconnect()).resolves.toBeUndefined();
  });
});
