export {
  McpBridge,
  createMcpReasoner,
  createReasonerBridge,
  extractToolText,
  DEFAULT_COMPLETION_TOOL,
  type McpBridgeConfig,
  type ToolCaller,
  type ToolCallOptions,
} from './mcp-client.js';
