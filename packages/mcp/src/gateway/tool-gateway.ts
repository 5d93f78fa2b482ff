/**
 * ToolGateway: tools from every configured server behind one name space.
 *
 * Channels are ephemeral: discovery and each invocation open a bridge to
 * the owning server and disconnect it when done, on failure too.
 */

import { getErrorMessage, UnknownCapabilityError } from "@switchboard/errors";
import { McpBridge } from "../bridge/mcp-bridge.js";
import type { McpTool, McpToolResult } from "../bridge/types.js";
import { createTransport } from "../transport/create-transport.js";
import type { McpServerConfig, TransportFactory } from "../transport/types.js";

export interface ToolGatewayOptions {
  /** Server configs by name, in priority order */
  readonly servers: ReadonlyMap<string, McpServerConfig>;
  readonly createTransport?: TransportFactory;
}

export class ToolGateway {
  private readonly servers: ReadonlyMap<string, McpServerConfig>;
  private readonly createTransport: TransportFactory;
  private tools: ReadonlyMap<string, McpTool> = new Map();

  constructor(options: ToolGatewayOptions) {
    this.servers = options.servers;
    this.createTransport = options.createTransport ?? createTransport;
  }

  /**
   * List the tools of every server. A server that cannot be reached is
   * skipped; when two servers expose the same tool name the earlier server
   * keeps it.
   */
  async discoverTools(): Promise<readonly McpTool[]> {
    const perServer = await Promise.all(
      [...this.servers].map(async ([serverName, config]) => {
        try {
          return await this.withBridge(serverName, config, (bridge) => bridge.listTools());
        } catch (error) {
          console.warn(`[ToolGateway] Skipping server "${serverName}": ${getErrorMessage(error)}`);
          return [];
        }
      }),
    );

    const tools = new Map<string, McpTool>();
    for (const tool of perServer.flat()) {
      const existing = tools.get(tool.name);
      if (existing) {
        console.warn(
          `[ToolGateway] Tool "${tool.name}" from "${tool.serverName}" ignored; already provided by "${existing.serverName}"`,
        );
        continue;
      }
      tools.set(tool.name, tool);
    }

    this.tools = tools;
    console.info(`[ToolGateway] Discovered ${tools.size} tool(s) from ${this.servers.size} server(s)`);
    return this.listTools();
  }

  /** Tools found by the last discovery */
  listTools(): readonly McpTool[] {
    return Object.freeze([...this.tools.values()]);
  }

  getTool(name: string): McpTool | undefined {
    return this.tools.get(name);
  }

  async invoke(
    toolName: string,
    args: Readonly<Record<string, unknown>> = {},
    signal?: AbortSignal,
  ): Promise<McpToolResult> {
    const tool = this.tools.get(toolName);
    const config = tool ? this.servers.get(tool.serverName) : undefined;
    if (!tool || !config) {
      throw new UnknownCapabilityError(toolName, [...this.tools.keys()]);
    }
    return this.withBridge(tool.serverName, config, (bridge) =>
      bridge.callTool(toolName, args, signal),
    );
  }

  private async withBridge<T>(
    serverName: string,
    config: McpServerConfig,
    fn: (bridge: McpBridge) => Promise<T>,
  ): Promise<T> {
    const bridge = new McpBridge(serverName, config, this.createTransport);
    await bridge.connect();
    try {
      return await fn(bridge);
    } finally {
      await bridge.disconnect();
    }
  }
}
