/**
 * @switchboard/mcp
 *
 * Tool provider gateway: discover and call tools on MCP servers.
 */

// ============================================================================
// GATEWAY
// ============================================================================

export { ToolGateway, type ToolGatewayOptions } from "./gateway/tool-gateway.js";

// ============================================================================
// BRIDGE
// ============================================================================

export { McpBridge } from "./bridge/mcp-bridge.js";
export type { McpContent, McpServerInfo, McpTool, McpToolResult } from "./bridge/types.js";

// ============================================================================
// CONFIG
// ============================================================================

export { loadMcpConfigFile, McpServerConfigSchema, parseMcpConfig } from "./config/config.js";
export type {
  McpHttpConfig,
  McpServerConfig,
  McpStdioConfig,
  TransportFactory,
} from "./transport/types.js";

// ============================================================================
// TRANSPORT
// ============================================================================

export { createTransport } from "./transport/create-transport.js";
